/**
 * Provider abstractions for orgview
 *
 * A provider answers the five raw hierarchy queries, one page at a time.
 * A supplier hands out a provider on demand, so callers can refresh
 * credentials or assume roles underneath the cache.
 */

import type {
  Account,
  OrganizationalUnit,
  Parent,
  Root,
} from '@aws-sdk/client-organizations';

export type { Account, OrganizationalUnit, Parent, Root };

/**
 * One page of a paginated listing
 */
export interface Page<T> {
  items: T[];
  /** Token for the next page; absent on the last page */
  nextToken?: string;
}

/**
 * Raw read access to an organization hierarchy
 */
export interface HierarchyProvider {
  listParents(childId: string, nextToken?: string): Promise<Page<Parent>>;

  listRoots(nextToken?: string): Promise<Page<Root>>;

  /**
   * Describe an organizational unit. Resolves to undefined when the
   * provider returns no unit in its response.
   */
  describeOrganizationalUnit(ouId: string): Promise<OrganizationalUnit | undefined>;

  listAccountsForParent(parentId: string, nextToken?: string): Promise<Page<Account>>;

  listOrganizationalUnitsForParent(
    parentId: string,
    nextToken?: string
  ): Promise<Page<OrganizationalUnit>>;
}

/**
 * Source of a provider, asked every time a remote call is needed
 */
export interface ProviderSupplier {
  getHandle(): HierarchyProvider | Promise<HierarchyProvider>;
}
