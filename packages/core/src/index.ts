// Engine
export { MonitorEngine } from './engine/MonitorEngine.js';
export type { MonitorEngineDeps, ResetOptions } from './engine/MonitorEngine.js';

// Pipeline stages
export { Sampler } from './sampler/Sampler.js';
export type { SamplerOptions, SampleHandler } from './sampler/Sampler.js';

export { deriveRates, RateTracker, ZERO_RATES } from './rates/RateDeriver.js';
export type { RateDerivation, RateUpdate } from './rates/RateDeriver.js';

export { HistoryBuffer, SERIES } from './history/HistoryBuffer.js';
export { RingBuffer } from './history/RingBuffer.js';

export { ThresholdAlerter } from './alerts/ThresholdAlerter.js';
export {
  LoggerAlertSink,
  describeQuantity,
  formatAlertMessage,
} from './alerts/AlertSink.js';
export type { AlertSink } from './alerts/AlertSink.js';

// Fan-out
export { TickDispatcher } from './dispatch/TickDispatcher.js';
export type { TickConsumer, TickDispatcherOptions } from './dispatch/TickDispatcher.js';

// Events
export { EventBus } from './events/EventBus.js';
export type {
  EventName,
  ProviderUnavailableEvent,
  RateClampedEvent,
  ClockAnomalyEvent,
  ConsumerFailedEvent,
  ConsumerRemovedEvent,
} from './events/EventBus.js';

// Providers
export { OsMetricsProvider } from './provider/OsMetricsProvider.js';
export type { OsMetricsProviderOptions } from './provider/OsMetricsProvider.js';
export type { MetricsProvider } from './provider/MetricsProvider.js';

// Export
export { toExportSnapshot, meanCpuSeries } from './export/snapshot.js';
