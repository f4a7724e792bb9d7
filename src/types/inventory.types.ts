/**
 * Data model shared by the broker, collectors, orchestrator and partitioner.
 */

import type { ServiceName } from '../regions.js';

/** Scalar cell value of a normalized resource record */
export type RecordValue = string | number;

/** Flat field-name → value mapping produced by a collector */
export type ResourceRecord = Record<string, RecordValue>;

/** Record as it travels to the sink: may carry internal `_`-prefixed tags and loose values */
export type TaggedRecord = Record<string, RecordValue | null | undefined>;

/** Short-lived credentials obtained from an assume-role exchange. Never persisted. */
export interface DelegatedCredential {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken: string;
  expiration?: Date;
}

/** One account to inventory, resolved by the configuration layer */
export interface AccountTarget {
  readonly accountId: string;
  readonly roleArn: string;
  readonly sessionName: string;
  readonly externalId?: string;
  /** Trust policy requires an external id; only valid together with `externalId` */
  readonly crossAccount?: boolean;
}

/** One (account, region, service) work item */
export interface CollectionUnit {
  index: number;
  account: AccountTarget;
  region: string;
  service: ServiceName;
}

/** Outcome of executing one collection unit */
export interface CollectionResult {
  service: ServiceName;
  sheetName: string;
  region: string;
  accountId: string;
  rows: ResourceRecord[];
  count: number;
  error?: string;
  errorType?: string;
}

export interface AccountSummary {
  total: number;
  success: number;
  error: number;
}

export interface CollectionSummary {
  totalResources: number;
  successCount: number;
  failureCount: number;
  accounts: Record<string, AccountSummary>;
}
