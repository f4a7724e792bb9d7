import { classifyBatch, classifyRecord, SERVICE_FIELD, SERVICE_TAG_FIELD, type ServiceLabel } from '../classifier.js';
import type { CollectionResult, RecordValue, TaggedRecord } from '../types/inventory.types.js';

export const ACCOUNT_TAG_FIELD = '_account_id';
export const REGION_TAG_FIELD = '_region';

export interface Partition {
  /** `<service>-<YYYYMMDD>` */
  name: string;
  service: ServiceLabel;
  headers: string[];
  rows: RecordValue[][];
}

export interface PartitionOptions {
  date?: Date;
}

/**
 * Turns collection results into one record stream. Failed results contribute
 * nothing; every row is tagged with the identity of the unit that produced it.
 */
export function flattenResults(results: readonly CollectionResult[]): TaggedRecord[] {
  const records: TaggedRecord[] = [];
  for (const result of results) {
    if (result.error !== undefined) continue;
    for (const row of result.rows) {
      records.push({
        ...row,
        [SERVICE_TAG_FIELD]: result.service,
        [ACCOUNT_TAG_FIELD]: result.accountId,
        [REGION_TAG_FIELD]: result.region,
      });
    }
  }
  return records;
}

/** Local calendar date as `YYYYMMDD` */
export function formatPartitionDate(date: Date): string {
  const year = String(date.getFullYear());
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}

function isBlank(value: TaggedRecord[string]): boolean {
  return value === null || value === undefined || String(value).trim() === '';
}

function toCells(records: readonly TaggedRecord[]): { headers: string[]; rows: RecordValue[][] } {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (seen.has(key)) continue;
      seen.add(key);
      columns.push(key);
    }
  }

  const headers = columns
    .filter(column => !column.startsWith('_'))
    .filter(column => records.some(record => !isBlank(record[column])));

  const rows = records.map(record => headers.map(header => record[header] ?? ''));
  return { headers, rows };
}

/**
 * Groups records by service and date. Each record is classified on its own
 * and falls back to the classification of the whole batch's columns.
 */
export function partitionRecords(records: readonly TaggedRecord[], options: PartitionOptions = {}): Partition[] {
  if (records.length === 0) return [];

  const { date = new Date() } = options;
  const stamp = formatPartitionDate(date);
  const columns = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) columns.add(key);
  }
  const batchDefault = classifyBatch(columns);

  const groups = new Map<ServiceLabel, TaggedRecord[]>();
  for (const record of records) {
    const classified = classifyRecord(record);
    const service = classified === 'unknown' ? batchDefault : classified;
    const group = groups.get(service) ?? [];
    group.push({ ...record, [SERVICE_FIELD]: service });
    groups.set(service, group);
  }

  return [...groups].map(([service, group]) => ({
    name: `${service}-${stamp}`,
    service,
    ...toCells(group),
  }));
}
