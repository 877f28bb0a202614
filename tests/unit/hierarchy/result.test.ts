import { describe, it, expect } from 'vitest';
import { HierarchyResult } from '../../../src/hierarchy/result.js';
import type { OrgNode } from '../../../src/hierarchy/types.js';
import { account } from '../../fixtures/fake-organizations.js';

function node(id: string, accountIds: string[], children: OrgNode[] = []): OrgNode {
  const orgUnits: Record<string, OrgNode> = {};
  for (const child of children) {
    orgUnits[child.id] = child;
  }
  return { id, name: id.toUpperCase(), accounts: accountIds.map((a) => account(a)), orgUnits };
}

describe('HierarchyResult', () => {
  const tree = node('r-root', ['111'], [
    node('ou-a', ['222'], [node('ou-b', ['333']), node('ou-c', ['444', '555'])]),
    node('ou-d', []),
  ]);

  it('should flatten accounts in pre-order', () => {
    const result = new HierarchyResult('r-root', tree);

    expect(result.getAccounts().map((a) => a.Id)).toEqual(['111', '222', '333', '444', '555']);
  });

  it('should return the same order on every call', () => {
    const result = new HierarchyResult('r-root', tree);

    expect(result.getAccounts()).toEqual(result.getAccounts());
  });

  it('should find nested nodes', () => {
    const result = new HierarchyResult('r-root', tree);

    expect(result.findNode('ou-c')?.accounts.map((a) => a.Id)).toEqual(['444', '555']);
    expect(result.findNode('r-root')).toBe(tree);
    expect(result.findNode('ou-missing')).toBeUndefined();
  });

  it('should serialise to the single-entry mapping form', () => {
    const result = new HierarchyResult('ou-d', node('ou-d', ['999']));

    expect(JSON.parse(JSON.stringify(result))).toEqual({
      'ou-d': {
        name: 'OU-D',
        accounts: [{ Id: '999', Name: 'account-999', Email: '999@example.com' }],
        org_units: {},
      },
    });
  });
});
