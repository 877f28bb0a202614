/**
 * Ancestor-chain membership checks
 */

import type { CachedHierarchyClient } from './client.js';
import { MAX_ANCESTRY_DEPTH, isRootId, type NodeId } from './types.js';

export interface AccountInHaystackOptions {
  /** Only the account's immediate parent may match */
  requireDirectDescendant?: boolean;
}

export class AncestryResolver {
  constructor(private readonly client: CachedHierarchyClient) {}

  /**
   * Whether an account, or any node on its path to the root, is in the haystack.
   *
   * The walk stops at the first matching ancestor, at the root, or after
   * MAX_ANCESTRY_DEPTH parent lookups, whichever comes first. Parent
   * resolution errors propagate.
   *
   * @param haystack - Account, unit and root ids; order and duplicates are irrelevant
   */
  async accountInHaystack(
    accountId: NodeId,
    haystack: Iterable<NodeId>,
    options: AccountInHaystackOptions = {}
  ): Promise<boolean> {
    const targets = new Set(haystack);

    if (targets.has(accountId)) {
      return true;
    }
    // Roots have no parent to resolve
    if (isRootId(accountId)) {
      return false;
    }

    if (options.requireDirectDescendant === true) {
      return targets.has(await this.client.getParent(accountId));
    }

    let current = accountId;
    for (let step = 0; step < MAX_ANCESTRY_DEPTH; step++) {
      current = await this.client.getParent(current);
      if (targets.has(current)) {
        return true;
      }
      if (isRootId(current)) {
        return false;
      }
    }

    return false;
  }
}
