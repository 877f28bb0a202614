/**
 * AWS Organizations provider
 *
 * Sends one SDK command per provider call. Pagination tokens are passed
 * through untouched; exhausting them is the caller's job.
 */

import {
  OrganizationsClient,
  ListParentsCommand,
  ListRootsCommand,
  DescribeOrganizationalUnitCommand,
  ListAccountsForParentCommand,
  ListOrganizationalUnitsForParentCommand,
  type Account,
  type OrganizationalUnit,
  type Parent,
  type Root,
} from '@aws-sdk/client-organizations';
import type { HierarchyProvider, Page } from './types.js';

export class OrganizationsProvider implements HierarchyProvider {
  constructor(private readonly client: OrganizationsClient) {}

  /**
   * The wrapped SDK client
   */
  get sdkClient(): OrganizationsClient {
    return this.client;
  }

  async listParents(childId: string, nextToken?: string): Promise<Page<Parent>> {
    const response = await this.client.send(
      new ListParentsCommand({ ChildId: childId, NextToken: nextToken })
    );
    return { items: response.Parents ?? [], nextToken: response.NextToken };
  }

  async listRoots(nextToken?: string): Promise<Page<Root>> {
    const response = await this.client.send(new ListRootsCommand({ NextToken: nextToken }));
    return { items: response.Roots ?? [], nextToken: response.NextToken };
  }

  async describeOrganizationalUnit(ouId: string): Promise<OrganizationalUnit | undefined> {
    const response = await this.client.send(
      new DescribeOrganizationalUnitCommand({ OrganizationalUnitId: ouId })
    );
    return response.OrganizationalUnit;
  }

  async listAccountsForParent(parentId: string, nextToken?: string): Promise<Page<Account>> {
    const response = await this.client.send(
      new ListAccountsForParentCommand({ ParentId: parentId, NextToken: nextToken })
    );
    return { items: response.Accounts ?? [], nextToken: response.NextToken };
  }

  async listOrganizationalUnitsForParent(
    parentId: string,
    nextToken?: string
  ): Promise<Page<OrganizationalUnit>> {
    const response = await this.client.send(
      new ListOrganizationalUnitsForParentCommand({ ParentId: parentId, NextToken: nextToken })
    );
    return { items: response.OrganizationalUnits ?? [], nextToken: response.NextToken };
  }
}
