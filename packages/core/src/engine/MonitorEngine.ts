import type pino from 'pino';
import {
  EngineStateError,
  getLogger,
  parseConfig,
  parseConfigPatch,
} from '@sysvitals/shared';
import type {
  AlertEvent,
  ExportSnapshot,
  Sample,
  SeriesSnapshot,
  TickResult,
  VitalsConfig,
} from '@sysvitals/shared';
import { LoggerAlertSink, type AlertSink } from '../alerts/AlertSink.js';
import { ThresholdAlerter } from '../alerts/ThresholdAlerter.js';
import { TickDispatcher, type TickConsumer } from '../dispatch/TickDispatcher.js';
import { EventBus } from '../events/EventBus.js';
import { toExportSnapshot } from '../export/snapshot.js';
import { HistoryBuffer, SERIES } from '../history/HistoryBuffer.js';
import { RingBuffer } from '../history/RingBuffer.js';
import type { MetricsProvider } from '../provider/MetricsProvider.js';
import { OsMetricsProvider } from '../provider/OsMetricsProvider.js';
import { RateTracker } from '../rates/RateDeriver.js';
import { Sampler } from '../sampler/Sampler.js';

export interface MonitorEngineDeps {
  provider?: MetricsProvider;
  alertSink?: AlertSink;
  eventBus?: EventBus;
  logger?: pino.Logger;
  clock?: () => Date;
}

export interface ResetOptions {
  /** Also return every alert quantity to `normal`. */
  alerts?: boolean;
}

function mean(values: number[]): number {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : Number.NaN;
}

/**
 * One monitoring pipeline: provider → sampler → rates → history → alerts →
 * dispatcher. The sampler is the only writer of history and alert state; all
 * of that happens synchronously in `processSample`, so a consumer never sees
 * a half-applied tick. Unavailable readings are stored as NaN gaps so every
 * series stays aligned with the timestamp series.
 */
export class MonitorEngine {
  readonly eventBus: EventBus;
  private readonly logger: pino.Logger;
  private readonly provider: MetricsProvider;
  private readonly alertSink: AlertSink;
  private readonly sampler: Sampler;
  private readonly rates = new RateTracker();
  private readonly history: HistoryBuffer;
  private readonly timestamps: RingBuffer<Date>;
  private readonly alerter: ThresholdAlerter;
  private readonly dispatcher: TickDispatcher;
  private config: VitalsConfig;
  private coreCount = 0;
  private latest: TickResult | null = null;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private fatalError: unknown = null;

  constructor(config: unknown = {}, deps: MonitorEngineDeps = {}) {
    this.config = parseConfig(config);
    this.eventBus = deps.eventBus ?? new EventBus();
    if (deps.logger) {
      this.logger = deps.logger;
    } else {
      this.logger = getLogger('engine');
      this.logger.level = this.config.log_level;
    }
    this.provider =
      deps.provider ?? new OsMetricsProvider({ logger: this.logger.child({ component: 'provider' }) });
    this.alertSink = deps.alertSink ?? new LoggerAlertSink(this.logger.child({ component: 'alerts' }));

    this.history = new HistoryBuffer(this.config.history_capacity);
    this.timestamps = new RingBuffer<Date>(this.config.history_capacity);
    this.alerter = new ThresholdAlerter(this.config.alert_thresholds);
    this.dispatcher = new TickDispatcher({
      eventBus: this.eventBus,
      logger: this.logger.child({ component: 'dispatcher' }),
      maxConsecutiveFailures: this.config.max_consecutive_failures,
    });
    this.sampler = new Sampler({
      provider: this.provider,
      intervalSeconds: this.config.interval_seconds,
      providerTimeoutMs: this.config.provider_timeout_ms,
      eventBus: this.eventBus,
      logger: this.logger.child({ component: 'sampler' }),
      clock: deps.clock,
      onSample: (sample) => this.handleSample(sample),
    });
  }

  start(): void {
    if (this.controller) {
      throw new EngineStateError('Monitor engine is already running');
    }

    const controller = new AbortController();
    this.controller = controller;
    this.fatalError = null;
    this.eventBus.emit('engine:start', { intervalSeconds: this.sampler.getIntervalSeconds() });

    this.loop = this.sampler.run(controller.signal).catch((err: unknown) => {
      this.fatalError = err;
      this.controller = null;
      this.logger.fatal({ err }, 'Sampling loop crashed');
    });
  }

  /** Stop sampling, let the current tick finish, and wait for consumers to catch up. */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller && !this.loop) return;

    controller?.abort();
    await this.loop;
    this.controller = null;
    this.loop = null;
    await this.dispatcher.drain();
    this.eventBus.emit('engine:stop', undefined);
  }

  /** Resolves when the loop ends; rejects if it ended because of a crash. */
  async wait(): Promise<void> {
    await this.loop;
    if (this.fatalError) {
      throw this.fatalError;
    }
  }

  isRunning(): boolean {
    return this.controller !== null;
  }

  register(consumer: TickConsumer): void {
    this.dispatcher.register(consumer);
  }

  unregister(consumer: TickConsumer): boolean {
    return this.dispatcher.unregister(consumer);
  }

  /** Collect and process a single tick without starting the loop. */
  async tickOnce(): Promise<TickResult | null> {
    if (this.controller) {
      throw new EngineStateError('Cannot take a one-off tick while the monitor engine is running');
    }
    await this.sampler.runTick();
    return this.latest;
  }

  /** Wait for every consumer to handle the ticks dispatched so far. */
  drain(): Promise<void> {
    return this.dispatcher.drain();
  }

  resetHistory(options: ResetOptions = {}): void {
    this.history.resetAll();
    this.timestamps.clear();
    if (options.alerts) {
      this.alerter.reset();
    }
    this.logger.info({ alerts: options.alerts ?? false }, 'History reset');
    this.eventBus.emit('history:reset', { timestamp: new Date() });
  }

  configure(patch: unknown): VitalsConfig {
    const changes = parseConfigPatch(patch);

    if (changes.interval_seconds !== undefined) {
      this.sampler.setIntervalSeconds(changes.interval_seconds);
    }
    if (changes.provider_timeout_ms !== undefined) {
      this.sampler.setProviderTimeoutMs(changes.provider_timeout_ms);
    }
    if (changes.history_capacity !== undefined) {
      this.history.setCapacity(changes.history_capacity);
      this.timestamps.resize(changes.history_capacity);
    }
    if (changes.alert_thresholds !== undefined) {
      this.alerter.setThresholds(changes.alert_thresholds);
    }
    if (changes.max_consecutive_failures !== undefined) {
      this.dispatcher.setMaxConsecutiveFailures(changes.max_consecutive_failures);
    }
    if (changes.log_level !== undefined) {
      this.logger.level = changes.log_level;
    }

    this.config = { ...this.config, ...changes };
    this.logger.info({ changes }, 'Configuration updated');
    this.eventBus.emit('config:changed', this.getConfig());
    return this.getConfig();
  }

  getConfig(): VitalsConfig {
    return {
      ...this.config,
      alert_thresholds: Object.fromEntries(
        Object.entries(this.config.alert_thresholds).map(([q, t]) => [q, { ...t }]),
      ),
    };
  }

  getLatest(): TickResult | null {
    return this.latest;
  }

  getSeries(): SeriesSnapshot {
    const cpuPerCore: number[][] = [];
    for (let core = 0; core < this.coreCount; core++) {
      cpuPerCore.push(this.history.snapshot(SERIES.cpuCore(core)));
    }

    return {
      timestamps: this.timestamps.toArray(),
      cpuPerCore,
      cpuMean: this.history.snapshot(SERIES.cpuMean),
      memoryPercent: this.history.snapshot(SERIES.memoryPercent),
      networkSent: this.history.snapshot(SERIES.networkSent),
      networkReceived: this.history.snapshot(SERIES.networkReceived),
    };
  }

  exportSnapshot(): ExportSnapshot {
    return toExportSnapshot(this.getSeries());
  }

  /**
   * Apply one sample to rates, history and alert state and build the tick
   * result. Everything in here is synchronous.
   */
  processSample(sample: Sample): TickResult {
    const update = this.rates.update(sample.network, sample.timestamp);

    if (update.kind === 'derived' && update.clamped.length > 0) {
      this.logger.debug({ tick: sample.tick, counters: update.clamped }, 'Counter reset, rate clamped to 0');
      this.eventBus.emit('rate:clamped', { tick: sample.tick, counters: update.clamped });
    } else if (update.kind === 'clock-anomaly') {
      this.logger.warn(
        { tick: sample.tick, elapsedSeconds: update.elapsedSeconds },
        'Clock did not advance between ticks, keeping previous rates',
      );
      this.eventBus.emit('clock:anomaly', {
        tick: sample.tick,
        elapsedSeconds: update.elapsedSeconds,
      });
    }

    const cpuMean = sample.cpuPerCore ? mean(sample.cpuPerCore) : Number.NaN;

    this.timestamps.push(sample.timestamp);
    if (sample.cpuPerCore) {
      this.coreCount = Math.max(this.coreCount, sample.cpuPerCore.length);
    }
    for (let core = 0; core < this.coreCount; core++) {
      this.history.push(SERIES.cpuCore(core), sample.cpuPerCore?.[core] ?? Number.NaN);
    }
    this.history.push(SERIES.cpuMean, cpuMean);
    this.history.push(SERIES.memoryPercent, sample.memory?.percent ?? Number.NaN);
    this.history.push(SERIES.networkSent, update.rates?.bytesSentPerSec ?? Number.NaN);
    this.history.push(SERIES.networkReceived, update.rates?.bytesRecvPerSec ?? Number.NaN);

    const values: Record<string, number | null> = {};
    for (const quantity of this.alerter.quantityNames()) {
      values[quantity] = this.readQuantity(quantity, sample, cpuMean);
    }
    const alerts = this.alerter.evaluateAll(values, sample.timestamp);

    const result: TickResult = {
      sample,
      rates: update.rates,
      series: this.getSeries(),
      alerts,
      alertStates: this.alerter.getStates(),
    };
    this.latest = result;
    return Object.freeze(result);
  }

  private handleSample(sample: Sample): void {
    const result = this.processSample(sample);

    for (const alert of result.alerts) {
      this.eventBus.emit(alert.type === 'raised' ? 'alert:raised' : 'alert:cleared', alert);
      if (this.config.notifications_enabled) {
        void this.notify(alert);
      }
    }

    this.dispatcher.dispatch(result);
    this.eventBus.emit('tick:complete', result);
  }

  private async notify(alert: AlertEvent): Promise<void> {
    try {
      await this.alertSink.notify(alert);
    } catch (err) {
      this.logger.warn({ err, quantity: alert.quantity }, 'Alert notification failed');
    }
  }

  private readQuantity(quantity: string, sample: Sample, cpuMean: number): number | null {
    if (quantity === 'cpu') {
      return Number.isFinite(cpuMean) ? cpuMean : null;
    }
    if (quantity === 'memory') {
      return sample.memory?.percent ?? null;
    }
    if (quantity.startsWith('disk:')) {
      const mount = quantity.slice('disk:'.length);
      return sample.disks?.find((disk) => disk.mount === mount)?.percent ?? null;
    }
    return null;
  }
}
