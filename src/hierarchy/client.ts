/**
 * Cached access to the organization hierarchy
 *
 * The only component that talks to a provider. Every operation has its own
 * TtlCache so that heavy use of one lookup never evicts another's entries.
 * Paginated listings are read to the last page before being cached.
 */

import { TtlCache, type TtlCacheOptions, type TtlCacheStats } from '../cache/ttl-cache.js';
import {
  createChildLogger,
  getLogger,
  logCacheLookup,
  type OrgViewLogger,
} from '../logging/logger.js';
import type { Account, HierarchyProvider, Page, ProviderSupplier } from '../provider/types.js';
import {
  HierarchyError,
  HierarchyErrorCode,
  ParentResolutionError,
  ROOT_NODE_NAME,
  isRootId,
  type NodeDescription,
  type NodeId,
} from './types.js';

const ROOT_CACHE_KEY = 'root';

/**
 * Read every page of a listing, in order
 */
export async function collectPages<T>(
  fetchPage: (nextToken?: string) => Promise<Page<T>>
): Promise<T[]> {
  const items: T[] = [];
  let nextToken: string | undefined;

  do {
    const page = await fetchPage(nextToken);
    items.push(...page.items);
    nextToken = page.nextToken;
  } while (nextToken !== undefined && nextToken !== '');

  return items;
}

export type HierarchyCacheName =
  | 'parents'
  | 'root'
  | 'descriptions'
  | 'accounts'
  | 'childNodes';

export interface CachedHierarchyClientOptions {
  supplier: ProviderSupplier;
  cache: TtlCacheOptions;
  logger?: OrgViewLogger;
}

export class CachedHierarchyClient {
  private readonly supplier: ProviderSupplier;
  private readonly logger: OrgViewLogger;

  private readonly parentCache: TtlCache<NodeId, NodeId>;
  private readonly rootCache: TtlCache<typeof ROOT_CACHE_KEY, NodeId>;
  private readonly describeCache: TtlCache<NodeId, NodeDescription>;
  private readonly accountsCache: TtlCache<NodeId, readonly Account[]>;
  private readonly childNodesCache: TtlCache<NodeId, readonly NodeId[]>;

  constructor(options: CachedHierarchyClientOptions) {
    this.supplier = options.supplier;
    this.logger = createChildLogger(options.logger ?? getLogger(), {
      operation: 'hierarchy-client',
    });

    this.parentCache = new TtlCache<NodeId, NodeId>(options.cache);
    // An organization has a single root for the client's lifetime
    this.rootCache = new TtlCache<typeof ROOT_CACHE_KEY, NodeId>({ ...options.cache, maxSize: 1 });
    this.describeCache = new TtlCache<NodeId, NodeDescription>(options.cache);
    this.accountsCache = new TtlCache<NodeId, readonly Account[]>(options.cache);
    this.childNodesCache = new TtlCache<NodeId, readonly NodeId[]>(options.cache);
  }

  /**
   * Resolve the single parent of a node
   *
   * @throws ParentResolutionError when the provider reports zero or several
   *   parents, or a parent without an id
   */
  async getParent(nodeId: NodeId): Promise<NodeId> {
    return this.cached('parents', this.parentCache, nodeId, async (provider) => {
      const parents = await collectPages((token) => provider.listParents(nodeId, token));

      const parent = parents[0];
      if (parents.length !== 1 || parent === undefined) {
        throw new ParentResolutionError(nodeId, parents.length);
      }
      if (parent.Id === undefined || parent.Id === '') {
        throw new ParentResolutionError(nodeId, 1);
      }
      return parent.Id;
    });
  }

  /**
   * Resolve the organization's root id
   */
  async getRoot(): Promise<NodeId> {
    return this.cached('root', this.rootCache, ROOT_CACHE_KEY, async (provider) => {
      const roots = await collectPages((token) => provider.listRoots(token));

      const rootId = roots.length === 1 ? roots[0]?.Id : undefined;
      if (rootId === undefined || rootId === '') {
        throw new HierarchyError(
          `Expected exactly one organization root, got ${roots.length}`,
          HierarchyErrorCode.ROOT_RESOLUTION_FAILED
        );
      }
      return rootId;
    });
  }

  /**
   * Describe a root or organizational unit
   *
   * Roots are never sent to the provider; they describe as ROOT_NODE_NAME.
   * The returned description is frozen.
   */
  async describeNode(nodeId: NodeId): Promise<NodeDescription> {
    if (isRootId(nodeId)) {
      return Object.freeze({ id: nodeId, name: ROOT_NODE_NAME });
    }

    return this.cached('descriptions', this.describeCache, nodeId, async (provider) => {
      const unit = await provider.describeOrganizationalUnit(nodeId);
      return Object.freeze({ id: unit?.Id ?? nodeId, name: unit?.Name, arn: unit?.Arn });
    });
  }

  /**
   * All accounts directly under a root or organizational unit
   *
   * The list and every account in it are frozen copies of what the provider
   * returned, shared by every caller until the entry expires.
   */
  async listAccountsUnder(nodeId: NodeId): Promise<readonly Account[]> {
    return this.cached('accounts', this.accountsCache, nodeId, async (provider) => {
      const accounts = await collectPages((token) =>
        provider.listAccountsForParent(nodeId, token)
      );
      return Object.freeze(accounts.map((account) => Object.freeze({ ...account })));
    });
  }

  /**
   * Ids of all organizational units directly under a root or unit
   */
  async listChildNodesUnder(nodeId: NodeId): Promise<readonly NodeId[]> {
    return this.cached('childNodes', this.childNodesCache, nodeId, async (provider) => {
      const units = await collectPages((token) =>
        provider.listOrganizationalUnitsForParent(nodeId, token)
      );
      const ids: NodeId[] = [];
      for (const unit of units) {
        if (unit.Id !== undefined && unit.Id !== '') {
          ids.push(unit.Id);
        }
      }
      return Object.freeze(ids);
    });
  }

  /**
   * Hits, misses and live entries of each cache
   */
  cacheStats(): Record<HierarchyCacheName, TtlCacheStats> {
    return {
      parents: this.parentCache.stats(),
      root: this.rootCache.stats(),
      descriptions: this.describeCache.stats(),
      accounts: this.accountsCache.stats(),
      childNodes: this.childNodesCache.stats(),
    };
  }

  /**
   * Serve `key` from `cache`, asking the supplier for a provider only on a miss
   */
  private async cached<K extends string, V>(
    name: HierarchyCacheName,
    cache: TtlCache<K, V>,
    key: K,
    load: (provider: HierarchyProvider) => Promise<V>
  ): Promise<V> {
    logCacheLookup(this.logger, { cache: name, key, hit: cache.has(key) });
    return cache.getOrLoad(key, async () => load(await this.supplier.getHandle()));
  }
}
