import { DescribeWorkspacesCommand, type Workspace, type WorkSpacesClient } from '@aws-sdk/client-workspaces';

import { BaseCollector, type CollectContext } from './base-collector.class.js';
import { SERVICE_CATALOG } from '../regions.js';
import type { ResourceRecord } from '../types/inventory.types.js';

export class WorkspacesCollector extends BaseCollector<'workspaces'> {
  readonly serviceName = 'workspaces' as const;
  readonly sheetName = SERVICE_CATALOG.workspaces.sheetName;

  protected async collectRecords(client: WorkSpacesClient, context: CollectContext): Promise<ResourceRecord[]> {
    const records: ResourceRecord[] = [];
    const pages = this.paginate(
      ({ token }) => client.send(new DescribeWorkspacesCommand({ NextToken: token })),
      page => page.NextToken,
      context.signal
    );

    for await (const page of pages) {
      for (const workspace of page.Workspaces ?? []) {
        records.push(this.normalize(workspace));
      }
    }

    return records;
  }

  normalize(workspace: Workspace): ResourceRecord {
    return {
      WorkspaceID: workspace.WorkspaceId ?? '',
      UserName: workspace.UserName ?? '',
      ComputerName: workspace.ComputerName ?? '',
      IPAddress: workspace.IpAddress ?? '',
      State: workspace.State ?? '',
      BundleId: workspace.BundleId ?? '',
      DirectoryId: workspace.DirectoryId ?? '',
      AccountID: this.accountId,
    };
  }
}

export default WorkspacesCollector;
