import {
  DescribeDBInstancesCommand,
  ListTagsForResourceCommand,
  type DBInstance,
  type RDSClient
} from '@aws-sdk/client-rds';

import { BaseCollector, extractNameTag, type CollectContext } from './base-collector.class.js';
import { SecondaryLookupError } from '../errors.js';
import { tryFn } from '../concerns/try-fn.js';
import { SERVICE_CATALOG } from '../regions.js';
import type { ResourceRecord } from '../types/inventory.types.js';

export class RdsCollector extends BaseCollector<'rds'> {
  readonly serviceName = 'rds' as const;
  readonly sheetName = SERVICE_CATALOG.rds.sheetName;

  protected async collectRecords(client: RDSClient, context: CollectContext): Promise<ResourceRecord[]> {
    const records: ResourceRecord[] = [];
    const pages = this.paginate(
      ({ token }) => client.send(new DescribeDBInstancesCommand({ Marker: token })),
      page => page.Marker,
      context.signal
    );

    for await (const page of pages) {
      for (const instance of page.DBInstances ?? []) {
        context.signal?.throwIfAborted();
        const name = await this.lookupNameTag(client, instance);
        records.push(this.normalize(instance, name));
      }
    }

    return records;
  }

  normalize(instance: DBInstance, name: string): ResourceRecord {
    return {
      AccountID: this.accountId,
      AvailabilityZone: instance.AvailabilityZone ?? '',
      ClusterID: instance.DBClusterIdentifier ?? '',
      InstanceID: name,
      Engine: instance.Engine ?? '',
      EngineVersion: instance.EngineVersion ?? '',
      Endpoint: instance.Endpoint?.Address ?? '',
      Port: instance.Endpoint?.Port ?? '',
      BackupRetentionPeriod: instance.BackupRetentionPeriod ?? 0,
    };
  }

  /**
   * The Name tag needs one extra call per instance. A failed lookup is logged
   * and leaves the name blank; it never fails the listing.
   */
  private async lookupNameTag(client: RDSClient, instance: DBInstance): Promise<string> {
    const arn = instance.DBInstanceArn;
    if (!arn) return '';

    const [ok, err, output] = await tryFn(() => client.send(new ListTagsForResourceCommand({ ResourceName: arn })));
    if (ok) {
      return extractNameTag(output.TagList);
    }

    const lookupError = new SecondaryLookupError(
      `Failed to list tags for ${instance.DBInstanceIdentifier ?? arn}`,
      { service: this.serviceName, resource: arn, original: err }
    );
    this.logger.warn({ err: lookupError, arn }, 'rds tag lookup failed');
    return '';
  }
}

export default RdsCollector;
