export type {
  MetricCategory,
  MemoryReading,
  DiskReading,
  NetworkCounters,
  Sample,
  DerivedRates,
  CounterName,
  SystemInfo,
} from './metrics.js';

export type { AlertThreshold, VitalsConfig } from './config.js';

export type { AlertStatus, AlertEventType, AlertEvent, AlertState } from './alerts.js';

export type { SeriesSnapshot, TickResult, ExportSnapshot } from './tick.js';

export type { EventBusMessage } from './events.js';
