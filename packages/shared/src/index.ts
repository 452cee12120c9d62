// Types
export type {
  MetricCategory,
  MemoryReading,
  DiskReading,
  NetworkCounters,
  Sample,
  DerivedRates,
  CounterName,
  SystemInfo,
  AlertThreshold,
  VitalsConfig,
  AlertStatus,
  AlertEventType,
  AlertEvent,
  AlertState,
  SeriesSnapshot,
  TickResult,
  ExportSnapshot,
  EventBusMessage,
} from './types/index.js';

// Constants
export {
  VITALS_HOME,
  VITALS_CONFIG_FILES,
  DEFAULT_INTERVAL_SECONDS,
  MIN_INTERVAL_SECONDS,
  DEFAULT_HISTORY_CAPACITY,
  MAX_PROVIDER_TIMEOUT_MS,
  DEFAULT_MAX_CONSUMER_FAILURES,
  DEFAULT_CPU_THRESHOLD,
  DEFAULT_MEMORY_THRESHOLD,
  VITALS_VERSION,
} from './constants.js';

// Schemas
export {
  alertThresholdSchema,
  quantityNameSchema,
  logLevelSchema,
  vitalsConfigSchema,
  vitalsConfigPatchSchema,
} from './schemas/config.schema.js';

export type {
  ValidatedVitalsConfig,
  VitalsConfigInput,
  VitalsConfigPatch,
} from './schemas/config.schema.js';

// Utilities
export {
  parseDuration,
  parseIntervalSeconds,
  formatBytes,
  formatRate,
  formatPercent,
  formatUptime,
} from './utils/parser.js';

export { parseConfig, parseConfigPatch } from './utils/config.js';

export { createLogger, getLogger, setDefaultLogger } from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  VitalsError,
  ProviderUnavailableError,
  ProviderTimeoutError,
  ConsumerFailureError,
  ConfigValidationError,
  EngineStateError,
} from './utils/errors.js';
