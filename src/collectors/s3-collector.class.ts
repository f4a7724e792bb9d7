import { ListBucketsCommand, type Bucket, type S3Client } from '@aws-sdk/client-s3';

import { BaseCollector, type CollectContext } from './base-collector.class.js';
import { SERVICE_CATALOG } from '../regions.js';
import type { ResourceRecord } from '../types/inventory.types.js';

export class S3Collector extends BaseCollector<'s3'> {
  readonly serviceName = 's3' as const;
  readonly sheetName = SERVICE_CATALOG.s3.sheetName;

  protected async collectRecords(client: S3Client, context: CollectContext): Promise<ResourceRecord[]> {
    const records: ResourceRecord[] = [];
    const pages = this.paginate(
      ({ token }) => client.send(new ListBucketsCommand({ ContinuationToken: token })),
      page => page.ContinuationToken,
      context.signal
    );

    for await (const page of pages) {
      for (const bucket of page.Buckets ?? []) {
        records.push(this.normalize(bucket));
      }
    }

    return records;
  }

  normalize(bucket: Bucket): ResourceRecord {
    return {
      AccountID: this.accountId,
      BucketName: bucket.Name ?? '',
      CreationDate: bucket.CreationDate ? bucket.CreationDate.toISOString() : '',
    };
  }
}

export default S3Collector;
