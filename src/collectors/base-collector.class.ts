import { CollectionError } from '../errors.js';
import { createSilentLogger, type Logger } from '../concerns/logger.js';
import type { ServiceName } from '../regions.js';
import type { ServiceClientMap } from '../credentials/credential-broker.class.js';
import type { ResourceRecord } from '../types/inventory.types.js';

export const DEFAULT_MAX_PAGES = 1000;

export interface CollectorOptions {
  accountId: string;
  region: string;
  logger?: Logger;
  maxPages?: number;
}

export interface CollectContext {
  signal?: AbortSignal;
}

/**
 * Capability set every service variant provides. The orchestrator only ever
 * sees collectors through this interface.
 */
export interface ResourceCollector<S extends ServiceName = ServiceName> {
  readonly serviceName: S;
  readonly sheetName: string;
  readonly accountId: string;
  readonly region: string;
  collect(client: ServiceClientMap[S], context?: CollectContext): Promise<ResourceRecord[]>;
}

export interface PageRequest {
  token: string | undefined;
  page: number;
}

export abstract class BaseCollector<S extends ServiceName> implements ResourceCollector<S> {
  abstract readonly serviceName: S;
  abstract readonly sheetName: string;

  readonly accountId: string;
  readonly region: string;
  protected readonly maxPages: number;
  private readonly baseLogger: Logger;
  private boundLogger: Logger | null = null;

  constructor(options: CollectorOptions) {
    const { accountId, region, logger, maxPages = DEFAULT_MAX_PAGES } = options;
    this.accountId = accountId;
    this.region = region;
    this.maxPages = maxPages;
    this.baseLogger = logger ?? createSilentLogger();
  }

  protected get logger(): Logger {
    if (!this.boundLogger) {
      this.boundLogger = this.baseLogger.child({ service: this.serviceName, accountId: this.accountId, region: this.region });
    }
    return this.boundLogger;
  }

  async collect(client: ServiceClientMap[S], context: CollectContext = {}): Promise<ResourceRecord[]> {
    try {
      const records = await this.collectRecords(client, context);
      this.logger.debug({ count: records.length }, 'collection finished');
      return records;
    } catch (err) {
      if (err instanceof CollectionError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new CollectionError(`${this.serviceName} listing failed in ${this.accountId}/${this.region}: ${reason}`, {
        service: this.serviceName,
        accountId: this.accountId,
        region: this.region,
        original: err,
      });
    }
  }

  protected abstract collectRecords(client: ServiceClientMap[S], context: CollectContext): Promise<ResourceRecord[]>;

  /**
   * Walks a cursor-paginated listing. Pages are requested strictly in sequence
   * and iteration stops when a page carries no continuation token; a listing
   * that keeps returning tokens past `maxPages` fails the collection.
   */
  protected async *paginate<TPage>(
    fetchPage: (request: PageRequest) => Promise<TPage>,
    nextToken: (page: TPage) => string | undefined,
    signal?: AbortSignal
  ): AsyncGenerator<TPage> {
    let token: string | undefined;
    for (let page = 1; page <= this.maxPages; page++) {
      signal?.throwIfAborted();
      const response = await fetchPage({ token, page });
      yield response;
      token = nextToken(response) || undefined;
      if (!token) return;
    }

    throw new CollectionError(
      `${this.serviceName} pagination did not terminate after ${this.maxPages} pages`,
      {
        service: this.serviceName,
        accountId: this.accountId,
        region: this.region,
        maxPages: this.maxPages,
      }
    );
  }
}

/** Reads the `Name` tag out of an AWS tag list */
export function extractNameTag(tags: ReadonlyArray<{ Key?: string; Value?: string }> | undefined): string {
  if (!tags) return '';
  const nameTag = tags.find(tag => tag.Key === 'Name');
  return nameTag?.Value ?? '';
}

export default BaseCollector;
