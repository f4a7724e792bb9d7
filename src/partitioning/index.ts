export {
  ACCOUNT_TAG_FIELD,
  REGION_TAG_FIELD,
  flattenResults,
  formatPartitionDate,
  partitionRecords,
  type Partition,
  type PartitionOptions
} from './partitioner.js';
export { publishPartitions, type PartitionedSink, type PublishFailure, type PublishReport } from './sink.js';
export { MemoryPartitionSink } from './memory-sink.class.js';
