import { describe, it, expect } from 'vitest';

import { flattenResults, formatPartitionDate, partitionRecords } from '../../src/partitioning/partitioner.js';
import type { CollectionResult, TaggedRecord } from '../../src/types/inventory.types.js';

describe('partitioner', () => {
  describe('flattenResults', () => {
    it('should tag rows of successful results and skip failed ones', () => {
      const results: CollectionResult[] = [
        {
          service: 'ec2',
          sheetName: 'EC2_Instances',
          region: 'us-east-1',
          accountId: '111111111111',
          rows: [{ AccountID: '111111111111', InstanceID: 'i-001' }],
          count: 1,
        },
        {
          service: 's3',
          sheetName: 'S3_Buckets',
          region: 'us-east-1',
          accountId: '111111111111',
          rows: [],
          count: 0,
          error: 'cancelled',
          errorType: 'Cancelled',
        },
      ];

      expect(flattenResults(results)).toEqual([
        {
          AccountID: '111111111111',
          InstanceID: 'i-001',
          _service_type: 'ec2',
          _account_id: '111111111111',
          _region: 'us-east-1',
        },
      ]);
    });
  });

  describe('formatPartitionDate', () => {
    it('should format the local date as YYYYMMDD', () => {
      expect(formatPartitionDate(new Date(2024, 11, 31, 23, 59))).toBe('20241231');
      expect(formatPartitionDate(new Date(2025, 0, 9))).toBe('20250109');
    });
  });

  describe('partitionRecords', () => {
    const date = new Date(2025, 0, 9);

    it('should group records by service and clean their columns', () => {
      const records: TaggedRecord[] = [
        {
          _service_type: 'ec2',
          _account_id: '111111111111',
          _region: 'us-east-1',
          AccountID: '111111111111',
          InstanceID: 'i-001',
          Name: 'web',
          PublicIPAddress: '',
        },
        {
          _service_type: 's3',
          _account_id: '111111111111',
          _region: 'us-east-1',
          AccountID: '111111111111',
          BucketName: 'app-logs',
          CreationDate: '2024-03-01T12:00:00.000Z',
        },
        { InstanceID: 'i-777', Name: '' },
        { Owner: 'team-a' },
      ];

      const partitions = partitionRecords(records, { date });

      expect(partitions).toEqual([
        {
          name: 'ec2-20250109',
          service: 'ec2',
          headers: ['AccountID', 'InstanceID', 'Name', 'service'],
          rows: [
            ['111111111111', 'i-001', 'web', 'ec2'],
            ['', 'i-777', '', 'ec2'],
          ],
        },
        {
          name: 's3-20250109',
          service: 's3',
          headers: ['AccountID', 'BucketName', 'CreationDate', 'service', 'Owner'],
          rows: [
            ['111111111111', 'app-logs', '2024-03-01T12:00:00.000Z', 's3', ''],
            ['', '', '', 's3', 'team-a'],
          ],
        },
      ]);
    });

    it('should keep numeric cells as numbers', () => {
      const [partition] = partitionRecords([{ _service_type: 'rds', Engine: 'postgres', Port: 5432, BackupRetentionPeriod: 0 }], { date });

      expect(partition?.headers).toEqual(['Engine', 'Port', 'BackupRetentionPeriod', 'service']);
      expect(partition?.rows).toEqual([['postgres', 5432, 0, 'rds']]);
    });

    it('should fall back to an unknown partition when nothing classifies', () => {
      const partitions = partitionRecords([{ Owner: 'team-a' }], { date });

      expect(partitions.map(partition => partition.name)).toEqual(['unknown-20250109']);
    });

    it('should return no partitions for no records', () => {
      expect(partitionRecords([], { date })).toEqual([]);
    });
  });
});
