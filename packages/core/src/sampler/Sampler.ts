import type pino from 'pino';
import {
  DEFAULT_INTERVAL_SECONDS,
  MAX_PROVIDER_TIMEOUT_MS,
  MIN_INTERVAL_SECONDS,
  ProviderTimeoutError,
  ProviderUnavailableError,
  getLogger,
} from '@sysvitals/shared';
import type { MetricCategory, Sample } from '@sysvitals/shared';
import type { EventBus } from '../events/EventBus.js';
import type { MetricsProvider } from '../provider/MetricsProvider.js';

export type SampleHandler = (sample: Sample, previous: Sample | null) => void;

export interface SamplerOptions {
  provider: MetricsProvider;
  onSample: SampleHandler;
  intervalSeconds?: number;
  /** Bound on each provider call. Defaults to the interval, capped at 5s. */
  providerTimeoutMs?: number;
  eventBus?: EventBus;
  logger?: pino.Logger;
  clock?: () => Date;
}

/** Resolves after `ms`, or early (without rejecting) when `signal` aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

function withTimeout<T>(
  work: () => T | Promise<T>,
  timeoutMs: number,
  category: MetricCategory,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new ProviderTimeoutError(category, timeoutMs)), timeoutMs);
    Promise.resolve()
      .then(work)
      .then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      );
  });
}

/**
 * Owns the polling cadence. Each tick reads every metric category from the
 * provider (concurrently, each call time-bounded), stamps the sample and hands
 * it to `onSample` together with the previous sample.
 *
 * Ticks never overlap; the wait after a tick is shortened by however long the
 * tick took.
 */
export class Sampler {
  private readonly provider: MetricsProvider;
  private readonly onSample: SampleHandler;
  private readonly eventBus: EventBus | undefined;
  private readonly logger: pino.Logger;
  private readonly clock: () => Date;
  private intervalSeconds: number;
  private providerTimeoutMs: number | undefined;
  private tick = 0;
  private previous: Sample | null = null;
  private inFlight: Promise<void> = Promise.resolve();
  private degraded: Set<MetricCategory> = new Set();

  constructor(options: SamplerOptions) {
    this.provider = options.provider;
    this.onSample = options.onSample;
    this.eventBus = options.eventBus;
    this.logger = options.logger ?? getLogger('sampler');
    this.clock = options.clock ?? (() => new Date());
    this.intervalSeconds = DEFAULT_INTERVAL_SECONDS;
    this.setIntervalSeconds(options.intervalSeconds ?? DEFAULT_INTERVAL_SECONDS);
    this.providerTimeoutMs = options.providerTimeoutMs;
  }

  getIntervalSeconds(): number {
    return this.intervalSeconds;
  }

  /** Takes effect from the next wait. */
  setIntervalSeconds(seconds: number): void {
    if (!Number.isFinite(seconds) || seconds < MIN_INTERVAL_SECONDS) {
      throw new RangeError(`Sampling interval must be at least ${MIN_INTERVAL_SECONDS}s, got ${seconds}`);
    }
    this.intervalSeconds = seconds;
  }

  setProviderTimeoutMs(ms: number | undefined): void {
    this.providerTimeoutMs = ms;
  }

  getProviderTimeoutMs(): number {
    return this.providerTimeoutMs ?? Math.min(this.intervalSeconds * 1000, MAX_PROVIDER_TIMEOUT_MS);
  }

  /**
   * Run until `signal` aborts. The wait between ticks ends as soon as the
   * signal fires; a tick already collecting finishes first. Rejects only when
   * the loop's own control flow fails.
   */
  async run(signal: AbortSignal): Promise<void> {
    this.logger.info({ intervalSeconds: this.intervalSeconds }, 'Sampler started');

    while (!signal.aborted) {
      const startedAt = Date.now();
      await this.runTick();
      const spent = Date.now() - startedAt;
      await sleep(Math.max(0, this.intervalSeconds * 1000 - spent), signal);
    }

    this.logger.info({ ticks: this.tick }, 'Sampler stopped');
  }

  /**
   * Collect one sample and pass it on. Calls made while a tick is in flight
   * queue behind it, so samples reach `onSample` in tick order.
   */
  runTick(): Promise<Sample> {
    const next = this.inFlight.then(() => this.collectAndHandle());
    this.inFlight = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private async collectAndHandle(): Promise<Sample> {
    const sample = await this.collect();
    const previous = this.previous;
    this.previous = sample;

    try {
      this.onSample(sample, previous);
    } catch (err) {
      this.logger.error({ err, tick: sample.tick }, 'Tick processing failed');
    }
    return sample;
  }

  async collect(): Promise<Sample> {
    this.tick++;
    const tick = this.tick;
    const timestamp = this.clock();
    const timeoutMs = this.getProviderTimeoutMs();

    const [cpu, memory, disks, network] = await Promise.allSettled([
      withTimeout(() => this.provider.sampleCpuPerCore(), timeoutMs, 'cpu'),
      withTimeout(() => this.provider.sampleMemory(), timeoutMs, 'memory'),
      withTimeout(() => this.provider.sampleDisks(), timeoutMs, 'disks'),
      withTimeout(() => this.provider.sampleNetworkCounters(), timeoutMs, 'network'),
    ]);

    const unavailable: MetricCategory[] = [];
    const settle = <T>(result: PromiseSettledResult<T>, category: MetricCategory): T | null => {
      if (result.status === 'fulfilled') {
        this.markRecovered(category, tick);
        return result.value;
      }
      unavailable.push(category);
      this.markDegraded(category, tick, result.reason);
      return null;
    };

    const sample: Sample = {
      tick,
      timestamp,
      cpuPerCore: settle(cpu, 'cpu'),
      memory: settle(memory, 'memory'),
      disks: settle(disks, 'disks'),
      network: settle(network, 'network'),
      unavailable,
    };

    return Object.freeze(sample);
  }

  private markDegraded(category: MetricCategory, tick: number, err: unknown): void {
    const timedOut = err instanceof ProviderTimeoutError;
    const error =
      err instanceof ProviderUnavailableError
        ? err
        : new ProviderUnavailableError(category, err instanceof Error ? err.message : String(err));

    if (this.degraded.has(category)) {
      this.logger.debug({ category, tick, err: error }, 'Metric category still unavailable');
    } else {
      this.degraded.add(category);
      this.logger.warn({ category, tick, err: error }, 'Metric category unavailable');
    }

    this.eventBus?.emit('provider:unavailable', {
      tick,
      category,
      error: error.message,
      timedOut,
    });
  }

  private markRecovered(category: MetricCategory, tick: number): void {
    if (this.degraded.delete(category)) {
      this.logger.info({ category, tick }, 'Metric category recovered');
    }
  }
}
