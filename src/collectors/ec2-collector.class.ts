import { DescribeInstancesCommand, type EC2Client, type Instance } from '@aws-sdk/client-ec2';

import { BaseCollector, extractNameTag, type CollectContext } from './base-collector.class.js';
import { SERVICE_CATALOG } from '../regions.js';
import type { ResourceRecord } from '../types/inventory.types.js';

/** AWS leaves `Platform` unset for Linux instances */
const DEFAULT_PLATFORM = 'Linux';

export class Ec2Collector extends BaseCollector<'ec2'> {
  readonly serviceName = 'ec2' as const;
  readonly sheetName = SERVICE_CATALOG.ec2.sheetName;

  protected async collectRecords(client: EC2Client, context: CollectContext): Promise<ResourceRecord[]> {
    const records: ResourceRecord[] = [];
    const pages = this.paginate(
      ({ token }) => client.send(new DescribeInstancesCommand({ NextToken: token })),
      page => page.NextToken,
      context.signal
    );

    for await (const page of pages) {
      for (const reservation of page.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          records.push(this.normalize(instance));
        }
      }
    }

    return records;
  }

  normalize(instance: Instance): ResourceRecord {
    return {
      AccountID: this.accountId,
      AvailabilityZone: instance.Placement?.AvailabilityZone ?? '',
      InstanceID: instance.InstanceId ?? '',
      Name: extractNameTag(instance.Tags),
      Platform: instance.Platform ?? DEFAULT_PLATFORM,
      PrivateIPAddress: instance.PrivateIpAddress ?? '',
      PublicIPAddress: instance.PublicIpAddress ?? '',
    };
  }
}

export default Ec2Collector;
