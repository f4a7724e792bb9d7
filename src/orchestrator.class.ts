import EventEmitter from 'events';
import { PromisePool } from '@supercharge/promise-pool';

import { ConfigurationError } from './errors.js';
import { createSilentLogger, type Logger } from './concerns/logger.js';
import { tryFn } from './concerns/try-fn.js';
import { createCollector, type CollectorFactory } from './collectors/index.js';
import { DEFAULT_MAX_PAGES } from './collectors/base-collector.class.js';
import { DEFAULT_CONCURRENCY, type InventoryConfig } from './config.js';
import {
  SERVICE_CATALOG,
  SERVICE_NAMES,
  getRegionDisplayName,
  regionsForService,
  type ServiceName
} from './regions.js';
import type { CredentialProvider } from './credentials/credential-broker.class.js';
import type {
  AccountTarget,
  CollectionResult,
  CollectionSummary,
  CollectionUnit,
  DelegatedCredential,
  ResourceRecord
} from './types/inventory.types.js';

export const CANCELLED = 'cancelled';

export interface CollectionOrchestratorOptions {
  broker: CredentialProvider;
  collectorFactory?: CollectorFactory;
  logger?: Logger;
  concurrency?: number;
  timeoutMs?: number;
  maxPages?: number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface UnitEvent {
  unit: CollectionUnit;
  total: number;
}

export interface UnitCompleteEvent extends UnitEvent {
  result: CollectionResult;
}

/**
 * Expands accounts × regions × services into collection units. Order is
 * accounts, then regions, then services in catalogue order; a global service
 * only appears with the first region. Repeated regions are collected once.
 */
export function expandUnits(
  accounts: readonly AccountTarget[],
  regions: readonly string[],
  enabledServices: Iterable<ServiceName>
): CollectionUnit[] {
  const enabled = new Set(enabledServices);
  const services = SERVICE_NAMES.filter(name => enabled.has(name));
  const uniqueRegions = [...new Set(regions)];
  const units: CollectionUnit[] = [];

  for (const account of accounts) {
    for (const region of uniqueRegions) {
      for (const service of services) {
        if (!regionsForService(service, uniqueRegions).includes(region)) continue;
        units.push({ index: units.length, account, region, service });
      }
    }
  }

  return units;
}

export function summarizeResults(results: readonly CollectionResult[]): CollectionSummary {
  const summary: CollectionSummary = {
    totalResources: 0,
    successCount: 0,
    failureCount: 0,
    accounts: {},
  };

  for (const result of results) {
    const account = summary.accounts[result.accountId] ?? { total: 0, success: 0, error: 0 };
    summary.accounts[result.accountId] = account;

    if (result.error !== undefined) {
      summary.failureCount += 1;
      account.error += 1;
    } else {
      summary.successCount += 1;
      summary.totalResources += result.count;
      account.total += result.count;
      account.success += 1;
    }
  }

  return summary;
}

function errorName(err: unknown): string {
  return err instanceof Error ? err.name : 'Error';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class CollectionOrchestrator extends EventEmitter {
  private readonly broker: CredentialProvider;
  private readonly collectorFactory: CollectorFactory;
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly timeoutMs?: number;
  private readonly maxPages: number;

  constructor(options: CollectionOrchestratorOptions) {
    super();
    const {
      broker,
      collectorFactory = createCollector,
      logger,
      concurrency = DEFAULT_CONCURRENCY,
      timeoutMs,
      maxPages = DEFAULT_MAX_PAGES
    } = options;

    this.broker = broker;
    this.collectorFactory = collectorFactory;
    this.logger = (logger ?? createSilentLogger()).child({ component: 'CollectionOrchestrator' });
    this.concurrency = concurrency;
    this.timeoutMs = timeoutMs;
    this.maxPages = maxPages;
  }

  async runWithConfig(config: InventoryConfig, options: RunOptions = {}): Promise<CollectionResult[]> {
    return this.run(config.accounts, config.regions, config.services, options);
  }

  /**
   * Collects every unit and returns one result per unit, in expansion order.
   * Unit failures are recorded on their result; only an empty account, region
   * or service list throws.
   */
  async run(
    accounts: readonly AccountTarget[],
    regions: readonly string[],
    enabledServices: Iterable<ServiceName>,
    options: RunOptions = {}
  ): Promise<CollectionResult[]> {
    const services = [...new Set(enabledServices)];
    const violations: string[] = [];
    if (accounts.length === 0) violations.push('accounts');
    if (regions.length === 0) violations.push('regions');
    if (services.length === 0) violations.push('services');
    if (violations.length > 0) {
      throw new ConfigurationError(`Nothing to collect: no ${violations.join(', no ')} configured`, { violations });
    }

    const units = expandUnits(accounts, regions, services);
    const [defaultRegion] = regions;
    const results = new Array<CollectionResult | undefined>(units.length).fill(undefined);
    // Keyed by target: two targets may share an account id with different roles.
    const credentials = new Map<AccountTarget, Promise<DelegatedCredential>>();

    const controller = new AbortController();
    const abort = (): void => controller.abort();
    if (options.signal?.aborted) {
      abort();
    } else {
      options.signal?.addEventListener('abort', abort, { once: true });
    }
    const timer = this.timeoutMs !== undefined ? setTimeout(abort, this.timeoutMs) : null;

    const cancelled = new Promise<typeof CANCELLED>(resolve => {
      if (controller.signal.aborted) resolve(CANCELLED);
      controller.signal.addEventListener('abort', () => resolve(CANCELLED), { once: true });
    });

    const credentialFor = (account: AccountTarget): Promise<DelegatedCredential> => {
      let pending = credentials.get(account);
      if (!pending) {
        pending = this.broker.assume({
          roleArn: account.roleArn,
          sessionName: account.sessionName,
          externalId: account.externalId,
          region: defaultRegion,
        });
        credentials.set(account, pending);
      }
      return pending;
    };

    this.logger.info(
      { accounts: accounts.length, regions, services, units: units.length },
      'collection started'
    );

    try {
      await PromisePool
        .for(units)
        .withConcurrency(this.concurrency)
        .handleError(async (error, unit) => {
          this.logger.error({ err: error, unit: this.describe(unit) }, 'unexpected collection failure');
          results[unit.index] = this.failedResult(unit, error);
        })
        .process(async unit => {
          if (controller.signal.aborted) {
            results[unit.index] = this.cancelledResult(unit);
            return;
          }

          this.emit('unit:start', { unit, total: units.length } satisfies UnitEvent);
          const outcome = await Promise.race([
            this.executeUnit(unit, credentialFor, controller.signal),
            cancelled,
          ]);

          const result = outcome === CANCELLED ? this.cancelledResult(unit) : outcome;
          results[unit.index] = result;

          if (result.error !== undefined) {
            this.emit('unit:error', { unit, total: units.length, result } satisfies UnitCompleteEvent);
          } else {
            this.emit('unit:complete', { unit, total: units.length, result } satisfies UnitCompleteEvent);
          }
        });
    } finally {
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener('abort', abort);
      // Settles the race promise so nothing stays pending after the run.
      controller.abort();
    }

    const finalResults = units.map(unit => results[unit.index] ?? this.cancelledResult(unit));
    const summary = summarizeResults(finalResults);
    this.logger.info(summary, 'collection finished');
    return finalResults;
  }

  private async executeUnit(
    unit: CollectionUnit,
    credentialFor: (account: AccountTarget) => Promise<DelegatedCredential>,
    signal: AbortSignal
  ): Promise<CollectionResult> {
    const { account, region, service } = unit;
    const [ok, err, rows] = await tryFn(async (): Promise<ResourceRecord[]> => {
      const credential = await credentialFor(account);
      const collector = this.collectorFactory(service, {
        accountId: account.accountId,
        region,
        logger: this.logger,
        maxPages: this.maxPages,
      });
      const client = this.broker.buildClient(service, credential, region);
      try {
        return await collector.collect(client, { signal });
      } finally {
        client.destroy();
      }
    });

    if (!ok) {
      if (signal.aborted) {
        return this.cancelledResult(unit);
      }
      this.logger.warn({ err, unit: this.describe(unit) }, 'collection unit failed');
      return this.failedResult(unit, err);
    }

    this.logger.debug({ unit: this.describe(unit), count: rows.length }, 'collection unit finished');
    return {
      service,
      sheetName: SERVICE_CATALOG[service].sheetName,
      region,
      accountId: account.accountId,
      rows,
      count: rows.length,
    };
  }

  private failedResult(unit: CollectionUnit, err: unknown): CollectionResult {
    return {
      service: unit.service,
      sheetName: SERVICE_CATALOG[unit.service].sheetName,
      region: unit.region,
      accountId: unit.account.accountId,
      rows: [],
      count: 0,
      error: errorMessage(err),
      errorType: errorName(err),
    };
  }

  private cancelledResult(unit: CollectionUnit): CollectionResult {
    return {
      service: unit.service,
      sheetName: SERVICE_CATALOG[unit.service].sheetName,
      region: unit.region,
      accountId: unit.account.accountId,
      rows: [],
      count: 0,
      error: CANCELLED,
      errorType: 'Cancelled',
    };
  }

  private describe(unit: CollectionUnit): Record<string, string> {
    return {
      accountId: unit.account.accountId,
      region: unit.region,
      regionName: getRegionDisplayName(unit.region),
      service: unit.service,
    };
  }
}

export default CollectionOrchestrator;
