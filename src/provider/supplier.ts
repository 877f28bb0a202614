/**
 * Provider suppliers and resolution of the view's client argument
 */

import { OrganizationsClient } from '@aws-sdk/client-organizations';
import { OrganizationsProvider } from './organizations.js';
import type { HierarchyProvider, ProviderSupplier } from './types.js';

/**
 * Anything OrgView accepts as its data source
 */
export type ProviderInput = OrganizationsClient | HierarchyProvider | ProviderSupplier;

const PROVIDER_METHODS = [
  'listParents',
  'listRoots',
  'describeOrganizationalUnit',
  'listAccountsForParent',
  'listOrganizationalUnitsForParent',
] as const;

/**
 * Supplier that always returns the same provider
 */
export class StaticProviderSupplier implements ProviderSupplier {
  constructor(private readonly provider: HierarchyProvider) {}

  getHandle(): HierarchyProvider {
    return this.provider;
  }
}

/**
 * Options for the default supplier
 */
export interface DefaultSupplierOptions {
  /** AWS region; the SDK's own resolution chain applies when unset */
  region?: string;
}

/**
 * Supplier that builds one SDK client on first use and reuses it
 */
export class DefaultProviderSupplier implements ProviderSupplier {
  private provider: OrganizationsProvider | null = null;

  constructor(private readonly options: DefaultSupplierOptions = {}) {}

  getHandle(): HierarchyProvider {
    this.provider ??= new OrganizationsProvider(
      new OrganizationsClient(
        this.options.region !== undefined ? { region: this.options.region } : {}
      )
    );
    return this.provider;
  }
}

function hasFunction(value: object, name: string): boolean {
  return typeof Reflect.get(value, name) === 'function';
}

export function isProviderSupplier(value: unknown): value is ProviderSupplier {
  return typeof value === 'object' && value !== null && hasFunction(value, 'getHandle');
}

export function isHierarchyProvider(value: unknown): value is HierarchyProvider {
  return (
    typeof value === 'object' &&
    value !== null &&
    PROVIDER_METHODS.every((method) => hasFunction(value, method))
  );
}

/**
 * Turn the view's client argument into a supplier
 *
 * @param input - SDK client, provider, supplier, or undefined for the default
 * @param options - Used only when a default supplier is built
 * @throws TypeError when the input is none of the accepted kinds
 */
export function resolveProviderSupplier(
  input: unknown,
  options: DefaultSupplierOptions = {}
): ProviderSupplier {
  if (input === undefined || input === null) {
    return new DefaultProviderSupplier(options);
  }
  if (input instanceof OrganizationsClient) {
    return new StaticProviderSupplier(new OrganizationsProvider(input));
  }
  if (isProviderSupplier(input)) {
    return input;
  }
  if (isHierarchyProvider(input)) {
    return new StaticProviderSupplier(input);
  }
  throw new TypeError(
    'client must be an OrganizationsClient, a HierarchyProvider, a ProviderSupplier, or undefined'
  );
}
