import { tryFn } from '../concerns/try-fn.js';
import { createSilentLogger, type Logger } from '../concerns/logger.js';
import type { Partition } from './partitioner.js';

/** Destination for finished partitions, such as a spreadsheet or a file store */
export interface PartitionedSink {
  writePartition(partition: Partition): Promise<void>;
}

export interface PublishFailure {
  name: string;
  error: Error;
}

export interface PublishReport {
  written: string[];
  failed: PublishFailure[];
}

/**
 * Writes partitions one after another. A failing partition is reported and
 * does not stop the others.
 */
export async function publishPartitions(
  sink: PartitionedSink,
  partitions: readonly Partition[],
  logger: Logger = createSilentLogger()
): Promise<PublishReport> {
  const report: PublishReport = { written: [], failed: [] };

  for (const [index, partition] of partitions.entries()) {
    logger.info({ partition: partition.name, rows: partition.rows.length, step: `${index + 1}/${partitions.length}` }, 'writing partition');
    const [ok, err] = await tryFn(() => sink.writePartition(partition));
    if (ok) {
      report.written.push(partition.name);
    } else {
      logger.error({ err, partition: partition.name }, 'partition write failed');
      report.failed.push({ name: partition.name, error: err });
    }
  }

  logger.info({ written: report.written.length, failed: report.failed.length }, 'partitions published');
  return report;
}
