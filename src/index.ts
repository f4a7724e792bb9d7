// =============================================================================
// Configuration & catalogue
// =============================================================================

export {
  DEFAULT_CONCURRENCY,
  DEFAULT_SESSION_NAME,
  createInventoryConfig,
  loadConfigFromEnv,
  parseAccounts,
  parseServices,
  type AccountDefaults,
  type AccountEntry,
  type InventoryConfig,
  type InventoryConfigInput
} from './config.js';

export {
  DEFAULT_REGION,
  DEFAULT_REGIONS,
  GLOBAL_SERVICES,
  SERVICE_CATALOG,
  SERVICE_NAMES,
  getRegionDisplayName,
  isGlobalService,
  isServiceName,
  regionsForService,
  type ServiceDescriptor,
  type ServiceName,
  type ServiceScope
} from './regions.js';

export type * from './types/inventory.types.js';

// =============================================================================
// Errors & logging
// =============================================================================

export * from './errors.js';

export {
  createLogger,
  createSilentLogger,
  getLoggerOptionsFromEnv,
  serializeError,
  type LogFormat,
  type LogLevel,
  type Logger,
  type LoggerOptions
} from './concerns/logger.js';

export { tryFn, tryFnSync, type TryResult } from './concerns/try-fn.js';

// =============================================================================
// Collection pipeline
// =============================================================================

export {
  CredentialBroker,
  type AssumeRoleParams,
  type CredentialBrokerOptions,
  type CredentialProvider,
  type ServiceClientConfig,
  type ServiceClientMap,
  type ServiceHandle
} from './credentials/credential-broker.class.js';

export * from './collectors/index.js';

export {
  CANCELLED,
  CollectionOrchestrator,
  expandUnits,
  summarizeResults,
  type CollectionOrchestratorOptions,
  type RunOptions,
  type UnitCompleteEvent,
  type UnitEvent
} from './orchestrator.class.js';

// =============================================================================
// Classification & partitioning
// =============================================================================

export {
  RESOURCE_TYPE_FIELD,
  SERVICE_FIELD,
  SERVICE_TAG_FIELD,
  UNKNOWN_SERVICE,
  classifyBatch,
  classifyRecord,
  type ServiceLabel
} from './classifier.js';

export * from './partitioning/index.js';
