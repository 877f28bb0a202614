/**
 * Types for hierarchy traversal
 */

import type { Account } from '../provider/types.js';

/**
 * Identifier of a root, organizational unit or account
 */
export type NodeId = string;

/**
 * Prefix AWS gives every organization root id
 */
export const ROOT_ID_PREFIX = 'r-';

/**
 * Display name used for roots, which have no description of their own
 */
export const ROOT_NODE_NAME = 'Organization Root';

/**
 * Deepest parent chain: an account, up to five nested OUs, then the root
 */
export const MAX_ANCESTRY_DEPTH = 6;

export function isRootId(nodeId: NodeId): boolean {
  return nodeId.startsWith(ROOT_ID_PREFIX);
}

/**
 * Descriptive metadata for a root or organizational unit
 */
export interface NodeDescription {
  id: NodeId;
  name?: string;
  arn?: string;
}

/**
 * A root or organizational unit with its direct accounts and child units
 */
export interface OrgNode {
  readonly id: NodeId;
  readonly name: string;
  readonly accounts: readonly Account[];
  /** Child units keyed by id, in provider listing order */
  readonly orgUnits: Readonly<Record<NodeId, OrgNode>>;
}

/**
 * Plain mapping form of an OrgNode
 */
export interface OrgNodeRecord {
  name: string;
  accounts: Account[];
  org_units: Record<NodeId, OrgNodeRecord>;
}

/**
 * Hierarchy error codes
 */
export enum HierarchyErrorCode {
  /** A node did not resolve to exactly one parent */
  PARENT_RESOLUTION_FAILED = 'PARENT_RESOLUTION_FAILED',
  /** The organization did not resolve to exactly one root */
  ROOT_RESOLUTION_FAILED = 'ROOT_RESOLUTION_FAILED',
  /** An organizational unit has no usable description */
  NODE_DESCRIPTION_FAILED = 'NODE_DESCRIPTION_FAILED',
}

/**
 * Error thrown when hierarchy data is inconsistent
 */
export class HierarchyError extends Error {
  constructor(
    message: string,
    public readonly code: HierarchyErrorCode
  ) {
    super(message);
    this.name = 'HierarchyError';
  }
}

/**
 * A node reported zero parents, several parents, or a parent without an id
 */
export class ParentResolutionError extends HierarchyError {
  constructor(
    public readonly childId: NodeId,
    public readonly parentCount: number
  ) {
    super(
      parentCount === 1
        ? `Parent of ${childId} has no id`
        : `Expected exactly one parent for ${childId}, got ${parentCount}`,
      HierarchyErrorCode.PARENT_RESOLUTION_FAILED
    );
    this.name = 'ParentResolutionError';
  }
}
