import { ConfigurationError } from './errors.js';
import { createSilentLogger, type Logger } from './concerns/logger.js';
import { tryFnSync } from './concerns/try-fn.js';
import {
  DEFAULT_REGION,
  DEFAULT_REGIONS,
  SERVICE_NAMES,
  isServiceName,
  type ServiceName
} from './regions.js';
import { DEFAULT_MAX_PAGES } from './collectors/base-collector.class.js';
import type { AccountTarget } from './types/inventory.types.js';

export const DEFAULT_SESSION_NAME = 'inventory-collector';
export const DEFAULT_CONCURRENCY = 8;

export interface InventoryConfig {
  readonly accounts: readonly AccountTarget[];
  readonly regions: readonly string[];
  readonly services: readonly ServiceName[];
  readonly defaultRegion: string;
  readonly concurrency: number;
  readonly timeoutMs?: number;
  readonly maxPages: number;
}

export interface InventoryConfigInput {
  accounts: AccountTarget[];
  regions?: string[];
  services?: ServiceName[];
  defaultRegion?: string;
  concurrency?: number;
  timeoutMs?: number;
  maxPages?: number;
}

/** Structured account entry, accepting both snake_case and camelCase keys */
export interface AccountEntry {
  account_id?: string;
  accountId?: string;
  role_arn?: string;
  roleArn?: string;
  session_name?: string;
  sessionName?: string;
  external_id?: string;
  externalId?: string;
  cross_account?: boolean;
  crossAccount?: boolean;
}

export interface AccountDefaults {
  sessionName?: string;
  externalId?: string;
  /** Single-account fallback used when no account list is given */
  accountId?: string;
  roleArn?: string;
}

const ACCOUNT_ID_PATTERN = /^\d{12}$/;
const ROLE_ARN_MARKER = ':arn:aws:iam::';

function clean(value: unknown): string | undefined {
  if (typeof value === 'number') value = String(value);
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function buildTarget(
  accountId: string,
  roleArn: string,
  sessionName: string | undefined,
  externalId: string | undefined,
  crossAccount?: boolean
): AccountTarget {
  const target: AccountTarget = {
    accountId,
    roleArn,
    sessionName: sessionName ?? DEFAULT_SESSION_NAME,
    ...(externalId ? { externalId } : {}),
    ...(crossAccount !== undefined ? { crossAccount } : {}),
  };
  return Object.freeze(target);
}

/**
 * Normalizes every accepted account notation into `AccountTarget` values:
 * the `"id:arn,id:arn"` string, a structured list, or the single-account
 * fallback from `defaults`.
 */
export function parseAccounts(
  input: string | AccountEntry[] | undefined | null,
  defaults: AccountDefaults = {}
): AccountTarget[] {
  const sessionName = clean(defaults.sessionName);
  const externalId = clean(defaults.externalId);

  if (Array.isArray(input)) {
    const targets: AccountTarget[] = [];
    for (const entry of input) {
      if (!entry || typeof entry !== 'object') continue;
      const accountId = clean(entry.account_id ?? entry.accountId);
      const roleArn = clean(entry.role_arn ?? entry.roleArn);
      if (!accountId || !roleArn) continue;
      targets.push(buildTarget(
        accountId,
        roleArn,
        clean(entry.session_name ?? entry.sessionName) ?? sessionName,
        clean(entry.external_id ?? entry.externalId) ?? externalId,
        entry.cross_account ?? entry.crossAccount
      ));
    }
    return targets;
  }

  const raw = clean(input);
  if (raw) {
    const targets: AccountTarget[] = [];
    for (const part of raw.split(',')) {
      if (!part.includes(ROLE_ARN_MARKER)) continue;
      const separator = part.indexOf(':');
      const accountId = clean(part.slice(0, separator));
      const roleArn = clean(part.slice(separator + 1));
      if (!accountId || !roleArn) continue;
      targets.push(buildTarget(accountId, roleArn, sessionName, externalId));
    }
    return targets;
  }

  const accountId = clean(defaults.accountId);
  const roleArn = clean(defaults.roleArn);
  if (accountId && roleArn) {
    return [buildTarget(accountId, roleArn, sessionName, externalId)];
  }

  return [];
}

/**
 * Parses a comma-separated service list. Unknown names are dropped with a
 * warning; an empty result falls back to every supported service.
 */
export function parseServices(value: string | undefined, logger: Logger = createSilentLogger()): ServiceName[] {
  const requested = (value ?? '')
    .split(',')
    .map(name => name.trim().toLowerCase())
    .filter(Boolean);

  const valid: ServiceName[] = [];
  const unknown: string[] = [];
  for (const name of requested) {
    if (isServiceName(name)) {
      if (!valid.includes(name)) valid.push(name);
    } else {
      unknown.push(name);
    }
  }

  if (unknown.length > 0) {
    logger.warn({ unknown, available: SERVICE_NAMES }, 'ignoring unknown services');
  }

  if (valid.length === 0) {
    if (requested.length > 0) {
      logger.warn({ fallback: SERVICE_NAMES }, 'no valid service requested, collecting all services');
    }
    return [...SERVICE_NAMES];
  }

  return valid;
}

function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

function parsePositiveInt(name: string, value: string | undefined, violations: string[]): number | undefined {
  const raw = clean(value);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    violations.push(`${name} must be a positive integer, got "${raw}"`);
    return undefined;
  }
  return parsed;
}

function validateAccount(target: AccountTarget, index: number, violations: string[]): void {
  const prefix = `accounts[${index}]`;
  if (!target.accountId) {
    violations.push(`${prefix}.accountId is required`);
  } else if (!ACCOUNT_ID_PATTERN.test(target.accountId)) {
    violations.push(`${prefix}.accountId must be a 12-digit account id, got "${target.accountId}"`);
  }
  if (!target.roleArn) {
    violations.push(`${prefix}.roleArn is required`);
  }
  if (!target.sessionName) {
    violations.push(`${prefix}.sessionName is required`);
  }
  if (target.crossAccount && !target.externalId) {
    violations.push(`${prefix}.externalId is required for a cross-account role`);
  }
}

/**
 * Validates the input and returns a frozen configuration value.
 * Every violation is reported in a single `ConfigurationError`.
 */
export function createInventoryConfig(input: InventoryConfigInput): InventoryConfig {
  const violations: string[] = [];
  const accounts = input.accounts ?? [];
  const regions = input.regions?.length ? input.regions : [...DEFAULT_REGIONS];
  const services = input.services?.length ? input.services : [...SERVICE_NAMES];
  const {
    defaultRegion = regions[0] ?? DEFAULT_REGION,
    concurrency = DEFAULT_CONCURRENCY,
    timeoutMs,
    maxPages = DEFAULT_MAX_PAGES
  } = input;

  if (accounts.length === 0) {
    violations.push('at least one account target is required');
  }
  accounts.forEach((target, index) => validateAccount(target, index, violations));

  const seen = new Set<string>();
  for (const target of accounts) {
    if (seen.has(target.accountId)) {
      violations.push(`account ${target.accountId} is listed more than once`);
    }
    seen.add(target.accountId);
  }

  for (const service of services) {
    if (!isServiceName(service)) {
      violations.push(`unknown service "${String(service)}"`);
    }
  }
  if (regions.some(region => !region.trim())) {
    violations.push('regions must not contain empty entries');
  }
  if (!Number.isInteger(concurrency) || concurrency <= 0) {
    violations.push('concurrency must be a positive integer');
  }
  if (!Number.isInteger(maxPages) || maxPages <= 0) {
    violations.push('maxPages must be a positive integer');
  }
  if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0)) {
    violations.push('timeoutMs must be a positive number');
  }

  if (violations.length > 0) {
    throw new ConfigurationError(`Invalid inventory configuration: ${violations.join('; ')}`, { violations });
  }

  // Global services are collected in the first region, so the default region leads when it is listed.
  const orderedRegions = regions.includes(defaultRegion)
    ? [defaultRegion, ...regions.filter(region => region !== defaultRegion)]
    : [...regions];

  return Object.freeze({
    accounts: Object.freeze([...accounts]),
    regions: Object.freeze(orderedRegions),
    services: Object.freeze([...new Set(services)]),
    defaultRegion,
    concurrency,
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    maxPages,
  });
}

/**
 * Builds the configuration from environment variables. Secret loading and
 * merging happens before this point; the values are taken as given.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = createSilentLogger()
): InventoryConfig {
  const violations: string[] = [];
  const accountsRaw = clean(env.AWS_ACCOUNTS);

  let accountInput: string | AccountEntry[] | undefined = accountsRaw;
  if (accountsRaw?.startsWith('[')) {
    const [ok, err, parsed] = tryFnSync((): unknown => JSON.parse(accountsRaw));
    if (!ok) {
      throw new ConfigurationError('AWS_ACCOUNTS is not valid JSON', { original: err, violations: ['AWS_ACCOUNTS'] });
    }
    accountInput = Array.isArray(parsed) ? parsed : undefined;
  }

  const accounts = parseAccounts(accountInput, {
    sessionName: env.AWS_SESSION_NAME,
    externalId: env.AWS_EXTERNAL_ID,
    accountId: env.AWS_ACCOUNT_ID,
    roleArn: env.AWS_ROLE_ARN,
  });

  const regions = parseList(env.INVENTORY_REGIONS);
  const concurrency = parsePositiveInt('INVENTORY_CONCURRENCY', env.INVENTORY_CONCURRENCY, violations);
  const timeoutMs = parsePositiveInt('INVENTORY_TIMEOUT_MS', env.INVENTORY_TIMEOUT_MS, violations);
  const maxPages = parsePositiveInt('INVENTORY_MAX_PAGES', env.INVENTORY_MAX_PAGES, violations);

  if (violations.length > 0) {
    throw new ConfigurationError(`Invalid inventory environment: ${violations.join('; ')}`, { violations });
  }

  return createInventoryConfig({
    accounts,
    regions,
    services: parseServices(env.AWS_SERVICES, logger),
    defaultRegion: clean(env.AWS_DEFAULT_REGION) ?? DEFAULT_REGION,
    concurrency,
    timeoutMs,
    maxPages,
  });
}
