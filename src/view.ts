/**
 * OrgView: cached queries over an AWS organization
 *
 * Wires one CachedHierarchyClient into the ancestry resolver and the
 * hierarchy builder, and logs each public query.
 */

import { AncestryResolver, type AccountInHaystackOptions } from './hierarchy/ancestry.js';
import { HierarchyBuilder, type GetOuHierarchyOptions } from './hierarchy/builder.js';
import { CachedHierarchyClient } from './hierarchy/client.js';
import type { HierarchyResult } from './hierarchy/result.js';
import type { NodeId } from './hierarchy/types.js';
import { DEFAULT_CONFIG, ViewOptionsSchema, type OrgViewConfig } from './config/schema.js';
import {
  createLogger,
  getLogger,
  setDefaultLogger,
  withLogging,
  type OrgViewLogger,
} from './logging/logger.js';
import { resolveProviderSupplier, type ProviderInput } from './provider/supplier.js';

export interface OrgViewOptions {
  /** Seconds before a cache entry expires */
  cacheTtl?: number;
  /** Entries per cache before least-recently-used eviction */
  cacheMaxsize?: number;
  /** Region for the default SDK client, used only when no client is given */
  region?: string;
  logger?: OrgViewLogger;
}

export class OrgView {
  /** Cached lookups shared by every query on this view */
  readonly client: CachedHierarchyClient;
  private readonly ancestry: AncestryResolver;
  private readonly builder: HierarchyBuilder;
  private readonly logger: OrgViewLogger;

  /**
   * @param client - SDK client, provider, provider supplier, or undefined to
   *   build a default SDK client on first use
   * @throws TypeError for any other client value
   * @throws ZodError for invalid cache options
   */
  constructor(
    client?: ProviderInput,
    options: OrgViewOptions = {}
  ) {
    const { cacheTtl, cacheMaxsize } = ViewOptionsSchema.parse({
      cacheTtl: options.cacheTtl,
      cacheMaxsize: options.cacheMaxsize,
    });

    this.logger = options.logger ?? getLogger();
    this.client = new CachedHierarchyClient({
      supplier: resolveProviderSupplier(client, { region: options.region }),
      cache: {
        ttlSeconds: cacheTtl ?? DEFAULT_CONFIG.cache.ttlSeconds,
        maxSize: cacheMaxsize ?? DEFAULT_CONFIG.cache.maxSize,
      },
      logger: this.logger,
    });
    this.ancestry = new AncestryResolver(this.client);
    this.builder = new HierarchyBuilder(this.client);
  }

  /**
   * Whether the account, or any of its ancestors, is one of the haystack ids
   */
  async accountInHaystack(
    accountId: NodeId,
    haystack: Iterable<NodeId>,
    options: AccountInHaystackOptions = {}
  ): Promise<boolean> {
    const targets = new Set(haystack);
    return withLogging(
      this.logger,
      'accountInHaystack',
      () => this.ancestry.accountInHaystack(accountId, targets, options),
      { nodeId: accountId, haystackSize: targets.size },
      (matched) => ({ matched })
    );
  }

  /**
   * Tree of units and accounts under `parentId`, or under the root
   */
  async getOuHierarchy(options: GetOuHierarchyOptions = {}): Promise<HierarchyResult> {
    return withLogging(
      this.logger,
      'getOuHierarchy',
      () => this.builder.getOuHierarchy(options),
      { nodeId: options.parentId, directDescendantsOnly: options.directDescendantsOnly === true },
      (result) => ({
        nodeId: result.rootId,
        accountCount: result.getAccounts().length,
      })
    );
  }
}

/**
 * Build a view from loaded configuration
 *
 * The configured logger also becomes the process default.
 */
export function createOrgView(
  config: OrgViewConfig = DEFAULT_CONFIG,
  client?: ProviderInput
): OrgView {
  const logger = createLogger(config.logging);
  setDefaultLogger(logger);
  return new OrgView(client, {
    cacheTtl: config.cache.ttlSeconds,
    cacheMaxsize: config.cache.maxSize,
    region: config.aws.region,
    logger,
  });
}
