/**
 * Organizational unit tree builder
 */

import type { Account } from '../provider/types.js';
import type { CachedHierarchyClient } from './client.js';
import { HierarchyResult } from './result.js';
import {
  HierarchyError,
  HierarchyErrorCode,
  type NodeId,
  type OrgNode,
} from './types.js';

export interface GetOuHierarchyOptions {
  /** Node to start from; the organization root when omitted */
  parentId?: NodeId;
  /** Describe immediate child units only, without their accounts or children */
  directDescendantsOnly?: boolean;
}

export class HierarchyBuilder {
  constructor(private readonly client: CachedHierarchyClient) {}

  /**
   * Build the tree of units and accounts under a node.
   *
   * Children are visited one at a time in listing order. In shallow mode a
   * child costs a single describe call and is emitted with no accounts and
   * no child units.
   */
  async getOuHierarchy(options: GetOuHierarchyOptions = {}): Promise<HierarchyResult> {
    const startId = options.parentId ?? (await this.client.getRoot());
    const root = await this.buildNode(startId, options.directDescendantsOnly === true);
    return new HierarchyResult(startId, root);
  }

  private async buildNode(nodeId: NodeId, shallow: boolean): Promise<OrgNode> {
    const name = await this.nodeName(nodeId);
    const accounts = await this.client.listAccountsUnder(nodeId);
    const childIds = await this.client.listChildNodesUnder(nodeId);

    const orgUnits: Record<NodeId, OrgNode> = {};
    for (const childId of childIds) {
      orgUnits[childId] = shallow
        ? leafNode(childId, await this.nodeName(childId))
        : await this.buildNode(childId, false);
    }

    return Object.freeze({
      id: nodeId,
      name,
      accounts,
      orgUnits: Object.freeze(orgUnits),
    });
  }

  private async nodeName(nodeId: NodeId): Promise<string> {
    const description = await this.client.describeNode(nodeId);
    if (description.name === undefined || description.name === '') {
      throw new HierarchyError(
        `Unable to determine name for organizational unit ${nodeId}`,
        HierarchyErrorCode.NODE_DESCRIPTION_FAILED
      );
    }
    return description.name;
  }
}

function leafNode(id: NodeId, name: string): OrgNode {
  const accounts: readonly Account[] = Object.freeze([]);
  const orgUnits: Record<NodeId, OrgNode> = {};
  return Object.freeze({ id, name, accounts, orgUnits: Object.freeze(orgUnits) });
}
