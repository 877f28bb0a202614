/**
 * Built hierarchy trees
 */

import type { Account } from '../provider/types.js';
import type { NodeId, OrgNode, OrgNodeRecord } from './types.js';

function toRecord(node: OrgNode): OrgNodeRecord {
  const orgUnits: Record<NodeId, OrgNodeRecord> = {};
  for (const [id, child] of Object.entries(node.orgUnits)) {
    orgUnits[id] = toRecord(child);
  }
  return { name: node.name, accounts: [...node.accounts], org_units: orgUnits };
}

/**
 * A tree of organizational units and accounts under one starting node.
 *
 * Nodes are frozen; the result never changes after it is built.
 */
export class HierarchyResult {
  constructor(
    readonly rootId: NodeId,
    readonly root: OrgNode
  ) {}

  /**
   * Every account in the tree, pre-order: a node's own accounts first,
   * then each child unit's in listing order
   */
  getAccounts(): Account[] {
    const accounts: Account[] = [];
    const visit = (node: OrgNode): void => {
      accounts.push(...node.accounts);
      for (const child of Object.values(node.orgUnits)) {
        visit(child);
      }
    };
    visit(this.root);
    return accounts;
  }

  /**
   * Find a node anywhere in the tree
   */
  findNode(nodeId: NodeId): OrgNode | undefined {
    const search = (node: OrgNode): OrgNode | undefined => {
      if (node.id === nodeId) {
        return node;
      }
      for (const child of Object.values(node.orgUnits)) {
        const found = search(child);
        if (found !== undefined) {
          return found;
        }
      }
      return undefined;
    };
    return search(this.root);
  }

  /**
   * Mapping form: `{ [rootId]: { name, accounts, org_units } }`
   */
  toJSON(): Record<NodeId, OrgNodeRecord> {
    return { [this.rootId]: toRecord(this.root) };
  }
}
