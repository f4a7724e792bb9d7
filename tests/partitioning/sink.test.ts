import { describe, it, expect } from 'vitest';

import { MemoryPartitionSink } from '../../src/partitioning/memory-sink.class.js';
import { publishPartitions, type PartitionedSink } from '../../src/partitioning/sink.js';
import type { Partition } from '../../src/partitioning/partitioner.js';

const EC2_PARTITION: Partition = {
  name: 'ec2-20250109',
  service: 'ec2',
  headers: ['InstanceID', 'service'],
  rows: [['i-001', 'ec2']],
};

const S3_PARTITION: Partition = {
  name: 's3-20250109',
  service: 's3',
  headers: ['BucketName', 'service'],
  rows: [['app-logs', 's3']],
};

describe('publishPartitions', () => {
  it('should write every partition to the sink', async () => {
    const sink = new MemoryPartitionSink();

    const report = await publishPartitions(sink, [EC2_PARTITION, S3_PARTITION]);

    expect(report).toEqual({ written: ['ec2-20250109', 's3-20250109'], failed: [] });
    expect(sink.names()).toEqual(['ec2-20250109', 's3-20250109']);
    expect(sink.get('s3-20250109')).toEqual(S3_PARTITION);
  });

  it('should keep writing after a partition fails', async () => {
    const written: string[] = [];
    const sink: PartitionedSink = {
      async writePartition(partition) {
        if (partition.service === 'ec2') throw new Error('quota exceeded');
        written.push(partition.name);
      },
    };

    const report = await publishPartitions(sink, [EC2_PARTITION, S3_PARTITION]);

    expect(written).toEqual(['s3-20250109']);
    expect(report.written).toEqual(['s3-20250109']);
    expect(report.failed).toHaveLength(1);
    expect(report.failed[0]?.name).toBe('ec2-20250109');
    expect(report.failed[0]?.error.message).toBe('quota exceeded');
  });
});

describe('MemoryPartitionSink', () => {
  it('should replace a partition written twice under the same name', async () => {
    const sink = new MemoryPartitionSink();

    await sink.writePartition(EC2_PARTITION);
    await sink.writePartition({ ...EC2_PARTITION, rows: [['i-002', 'ec2']] });

    expect(sink.size).toBe(1);
    expect(sink.get('ec2-20250109')?.rows).toEqual([['i-002', 'ec2']]);
  });

  it('should store a copy of the partition', async () => {
    const sink = new MemoryPartitionSink();
    const partition: Partition = { ...EC2_PARTITION, rows: [['i-001', 'ec2']] };

    await sink.writePartition(partition);
    partition.rows.push(['i-999', 'ec2']);

    expect(sink.get('ec2-20250109')?.rows).toEqual([['i-001', 'ec2']]);
  });

  it('should forget everything on clear', async () => {
    const sink = new MemoryPartitionSink();
    await sink.writePartition(EC2_PARTITION);

    sink.clear();

    expect(sink.size).toBe(0);
    expect(sink.get('ec2-20250109')).toBeUndefined();
  });
});
