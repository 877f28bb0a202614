import { describe, it, expect } from 'vitest';
import { OrganizationsClient } from '@aws-sdk/client-organizations';
import { OrganizationsProvider } from '../../../src/provider/organizations.js';
import {
  DefaultProviderSupplier,
  StaticProviderSupplier,
  isHierarchyProvider,
  isProviderSupplier,
  resolveProviderSupplier,
} from '../../../src/provider/supplier.js';
import { FakeOrganizations, FakeProviderSupplier } from '../../fixtures/fake-organizations.js';

describe('provider suppliers', () => {
  describe('type guards', () => {
    it('should recognise providers and suppliers structurally', () => {
      const org = new FakeOrganizations();

      expect(isHierarchyProvider(org)).toBe(true);
      expect(isProviderSupplier(org)).toBe(false);
      expect(isProviderSupplier(new FakeProviderSupplier(org))).toBe(true);
      expect(isHierarchyProvider({ listParents: () => undefined })).toBe(false);
      expect(isHierarchyProvider(null)).toBe(false);
    });
  });

  describe('resolveProviderSupplier', () => {
    it('should use a supplier as given', () => {
      const supplier = new FakeProviderSupplier(new FakeOrganizations());

      expect(resolveProviderSupplier(supplier)).toBe(supplier);
    });

    it('should wrap a provider in a static supplier', async () => {
      const org = new FakeOrganizations();
      const supplier = resolveProviderSupplier(org);

      expect(supplier).toBeInstanceOf(StaticProviderSupplier);
      expect(await supplier.getHandle()).toBe(org);
    });

    it('should wrap an SDK client in an OrganizationsProvider', async () => {
      const client = new OrganizationsClient({ region: 'us-east-1' });
      const handle = await resolveProviderSupplier(client).getHandle();

      expect(handle).toBeInstanceOf(OrganizationsProvider);
      expect(handle instanceof OrganizationsProvider && handle.sdkClient).toBe(client);
    });

    it('should build a default supplier when no client is given', () => {
      expect(resolveProviderSupplier(undefined)).toBeInstanceOf(DefaultProviderSupplier);
    });

    it('should reject anything else', () => {
      expect(() => resolveProviderSupplier('organizations')).toThrow(TypeError);
      expect(() => resolveProviderSupplier({ send: () => undefined })).toThrow(TypeError);
    });
  });

  describe('DefaultProviderSupplier', () => {
    it('should create one SDK client lazily and reuse it', async () => {
      const supplier = new DefaultProviderSupplier({ region: 'eu-west-1' });

      const first = supplier.getHandle();
      const second = supplier.getHandle();

      expect(first).toBe(second);
      expect(first).toBeInstanceOf(OrganizationsProvider);
      expect(first instanceof OrganizationsProvider && (await first.sdkClient.config.region())).toBe(
        'eu-west-1'
      );
    });
  });
});
