import { isServiceName, type ServiceName } from './regions.js';
import type { TaggedRecord } from './types/inventory.types.js';

export const UNKNOWN_SERVICE = 'unknown';

export type ServiceLabel = ServiceName | typeof UNKNOWN_SERVICE;

/** Internal tag written by `flattenResults`; stripped before rows reach a sink */
export const SERVICE_TAG_FIELD = '_service_type';
export const SERVICE_FIELD = 'service';
export const RESOURCE_TYPE_FIELD = 'resource_type';

interface KeywordRule {
  service: ServiceName;
  keywords: readonly string[];
}

// Order is significant: names such as "bucket_instance" match more than one rule.
const COLUMN_RULES: readonly KeywordRule[] = [
  { service: 's3', keywords: ['bucket'] },
  { service: 'ec2', keywords: ['instance'] },
  { service: 'rds', keywords: ['database', 'rds', 'db'] },
  { service: 'workspaces', keywords: ['workspace'] },
];

const RESOURCE_TYPE_RULES: readonly KeywordRule[] = [
  { service: 's3', keywords: ['bucket', 's3'] },
  { service: 'ec2', keywords: ['instance', 'ec2'] },
  { service: 'rds', keywords: ['database', 'rds', 'db'] },
  { service: 'workspaces', keywords: ['workspace'] },
];

const INSTANCE_ID_PREFIXES = ['i-', 'ami-'];
const STORAGE_DOMAIN = 'amazonaws.com';
const DATABASE_KEY_TERMS = ['database', 'rds', 'mysql', 'postgres', 'oracle'];

type Pair = readonly [key: string, value: string];

interface PairRule {
  service: ServiceName;
  matches: (pair: Pair) => boolean;
}

const PAIR_RULES: readonly PairRule[] = [
  {
    service: 'ec2',
    matches: ([, value]) => INSTANCE_ID_PREFIXES.some(prefix => value.startsWith(prefix)),
  },
  {
    service: 's3',
    matches: ([key, value]) => key.includes('bucket') || (value.includes('bucket') && value.includes(STORAGE_DOMAIN)),
  },
  {
    service: 'rds',
    matches: ([key, value]) => value !== '' && DATABASE_KEY_TERMS.some(term => key.includes(term)),
  },
  {
    service: 'workspaces',
    matches: ([key, value]) => value !== '' && key.includes('workspace'),
  },
];

function normalizeValue(value: TaggedRecord[string]): string {
  if (value === null || value === undefined) return '';
  const text = String(value).trim().toLowerCase();
  return text === 'nan' ? '' : text;
}

function matchKeywords(text: string, rules: readonly KeywordRule[]): ServiceLabel {
  const rule = rules.find(candidate => candidate.keywords.some(keyword => text.includes(keyword)));
  return rule ? rule.service : UNKNOWN_SERVICE;
}

function explicitService(record: TaggedRecord, field: string): ServiceName | undefined {
  const value = normalizeValue(record[field]);
  return isServiceName(value) ? value : undefined;
}

/**
 * Picks a service from the union of a batch's column names. The first rule
 * with a matching column wins.
 */
export function classifyBatch(columns: Iterable<string>): ServiceLabel {
  const names = [...columns].map(column => column.toLowerCase());
  const rule = COLUMN_RULES.find(candidate =>
    names.some(name => candidate.keywords.some(keyword => name.includes(keyword)))
  );
  return rule ? rule.service : UNKNOWN_SERVICE;
}

/**
 * Classifies a single record. Explicit tags win, then `resource_type`, then
 * value and key heuristics. Each heuristic scans every field before the next
 * one is tried, so field order never decides the result.
 */
export function classifyRecord(record: TaggedRecord): ServiceLabel {
  const tagged = explicitService(record, SERVICE_TAG_FIELD) ?? explicitService(record, SERVICE_FIELD);
  if (tagged) return tagged;

  const resourceType = normalizeValue(record[RESOURCE_TYPE_FIELD]);
  if (resourceType) {
    const byType = matchKeywords(resourceType, RESOURCE_TYPE_RULES);
    if (byType !== UNKNOWN_SERVICE) return byType;
  }

  const pairs: Pair[] = Object.entries(record).map(([key, value]) => [key.toLowerCase(), normalizeValue(value)]);
  const rule = PAIR_RULES.find(candidate => pairs.some(pair => candidate.matches(pair)));
  return rule ? rule.service : UNKNOWN_SERVICE;
}
