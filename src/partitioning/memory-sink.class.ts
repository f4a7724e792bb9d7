import type { Partition } from './partitioner.js';
import type { PartitionedSink } from './sink.js';

/**
 * In-process sink. A write replaces any partition of the same name, the way a
 * worksheet is cleared before new values are written.
 */
export class MemoryPartitionSink implements PartitionedSink {
  private readonly partitions = new Map<string, Partition>();

  async writePartition(partition: Partition): Promise<void> {
    this.partitions.set(partition.name, {
      ...partition,
      headers: [...partition.headers],
      rows: partition.rows.map(row => [...row]),
    });
  }

  get(name: string): Partition | undefined {
    return this.partitions.get(name);
  }

  names(): string[] {
    return [...this.partitions.keys()];
  }

  get size(): number {
    return this.partitions.size;
  }

  clear(): void {
    this.partitions.clear();
  }
}

export default MemoryPartitionSink;
