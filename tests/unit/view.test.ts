import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ZodError } from 'zod';
import { OrgView, createOrgView } from '../../src/view.js';
import { ParentResolutionError } from '../../src/hierarchy/types.js';
import { DEFAULT_CONFIG } from '../../src/config/schema.js';
import { getLogger } from '../../src/logging/logger.js';
import {
  FakeOrganizations,
  FakeProviderSupplier,
  account,
  silentLogger,
} from '../fixtures/fake-organizations.js';

describe('OrgView', () => {
  let org: FakeOrganizations;
  let supplier: FakeProviderSupplier;
  let view: OrgView;

  beforeEach(() => {
    // 111111111111 -> ou-a -> r-root, as in the default fake
    org = new FakeOrganizations();
    org.roots = [{ Id: 'r-1' }];
    org.parentsByChild['ou-a'] = [[{ Id: 'r-1' }]];
    supplier = new FakeProviderSupplier(org);
    view = new OrgView(supplier, { cacheTtl: 3600, cacheMaxsize: 32, logger: silentLogger() });
  });

  describe('accountInHaystack', () => {
    it('should match a direct parent with one lookup', async () => {
      expect(await view.accountInHaystack('111111111111', ['ou-a'])).toBe(true);
      expect(org.callsTo('listParents')).toEqual(['111111111111']);
    });

    it('should match the root with two lookups', async () => {
      expect(await view.accountInHaystack('111111111111', ['r-1'])).toBe(true);
      expect(org.callsTo('listParents')).toEqual(['111111111111', 'ou-a']);
    });

    it('should report no match once the chain reaches the root', async () => {
      expect(await view.accountInHaystack('111111111111', ['ou-b'])).toBe(false);
      expect(org.callsTo('listParents')).toEqual(['111111111111', 'ou-a']);
    });

    it('should log and rethrow parent resolution errors', async () => {
      const logger = silentLogger();
      const errorSpy = vi.spyOn(logger, 'error');
      const failing = new OrgView(supplier, { logger });
      org.parentsByChild['111111111111'] = [[]];

      await expect(failing.accountInHaystack('111111111111', ['ou-a'])).rejects.toThrow(
        ParentResolutionError
      );
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('should log the match and haystack size on completion', async () => {
      const logger = silentLogger();
      const debugSpy = vi.spyOn(logger, 'debug');
      const logged = new OrgView(supplier, { logger });

      await logged.accountInHaystack('111111111111', ['ou-a', 'ou-a', 'ou-b']);

      expect(debugSpy).toHaveBeenLastCalledWith(
        expect.objectContaining({
          operation: 'accountInHaystack',
          nodeId: '111111111111',
          haystackSize: 2,
          matched: true,
        }),
        expect.stringMatching(/^Completed accountInHaystack in \d+ms$/)
      );
    });

    it('should report no match for a root id without a lookup', async () => {
      expect(await view.accountInHaystack('r-1', ['ou-a'])).toBe(false);
      expect(org.calls).toEqual([]);
    });
  });

  describe('getOuHierarchy', () => {
    it('should return a one-level view of a unit', async () => {
      org.addUnit('ou-a', 'ou-c', 'OU-C');
      org.addUnit('ou-c', 'ou-d', 'OU-D');
      org.accountPagesByParent['ou-a'] = [[account('acct1')], [account('acct2')]];

      const result = await view.getOuHierarchy({ parentId: 'ou-a', directDescendantsOnly: true });

      expect(result.toJSON()).toEqual({
        'ou-a': {
          name: 'OU-A',
          accounts: [account('acct1'), account('acct2')],
          org_units: { 'ou-c': { name: 'OU-C', accounts: [], org_units: {} } },
        },
      });
      expect(org.callsTo('listAccountsForParent')).toEqual(['ou-a', 'ou-a']);
    });

    it('should default to the organization root', async () => {
      const result = await view.getOuHierarchy();

      expect(result.rootId).toBe('r-1');
    });

    it('should log the resolved root and account count on completion', async () => {
      const logger = silentLogger();
      const debugSpy = vi.spyOn(logger, 'debug');
      const logged = new OrgView(supplier, { logger });
      org.addUnit('r-1', 'ou-a', 'OU-A');
      org.accountPagesByParent['r-1'] = [[account('acct1')]];
      org.accountPagesByParent['ou-a'] = [[account('acct2'), account('acct3')]];

      await logged.getOuHierarchy();

      expect(debugSpy).toHaveBeenLastCalledWith(
        expect.objectContaining({
          operation: 'getOuHierarchy',
          nodeId: 'r-1',
          directDescendantsOnly: false,
          accountCount: 3,
        }),
        expect.stringMatching(/^Completed getOuHierarchy in \d+ms$/)
      );
    });
  });

  describe('construction', () => {
    it('should accept a bare provider', async () => {
      const direct = new OrgView(org, { logger: silentLogger() });

      expect(await direct.accountInHaystack('111111111111', ['ou-a'])).toBe(true);
    });

    it('should ask the supplier for a handle on each cache miss only', async () => {
      await view.accountInHaystack('111111111111', ['r-1']);
      await view.accountInHaystack('111111111111', ['r-1']);

      expect(supplier.getHandleCalls).toBe(2);
    });

    it('should reject an unknown client', () => {
      expect(() => new OrgView(Object.create(null), { logger: silentLogger() })).toThrow(
        TypeError
      );
    });

    it('should reject invalid cache options', () => {
      expect(() => new OrgView(org, { cacheTtl: 0, logger: silentLogger() })).toThrow(ZodError);
    });

    it('should build a view from configuration', async () => {
      const configured = createOrgView(
        { ...DEFAULT_CONFIG, logging: { level: 'silent', pretty: false } },
        org
      );

      expect(await configured.accountInHaystack('111111111111', ['ou-a'])).toBe(true);
    });

    it('should install the configured logger as the default', () => {
      createOrgView({ ...DEFAULT_CONFIG, logging: { level: 'silent', pretty: false } }, org);

      expect(getLogger().level).toBe('silent');
    });
  });
});
