import type pino from 'pino';
import { ConsumerFailureError, DEFAULT_MAX_CONSUMER_FAILURES, getLogger } from '@sysvitals/shared';
import type { TickResult } from '@sysvitals/shared';
import type { EventBus } from '../events/EventBus.js';

/**
 * Anything that wants completed ticks: renderers, exporters, alert forwarders.
 * `onTick` is called once per tick, in tick order, and never while a previous
 * call for the same consumer is still pending.
 */
export interface TickConsumer {
  readonly name?: string;
  onTick(result: TickResult): void | Promise<void>;
}

interface RegisteredConsumer {
  consumer: TickConsumer;
  name: string;
  queue: Promise<void>;
  pending: number;
  consecutiveFailures: number;
  active: boolean;
}

export interface TickDispatcherOptions {
  eventBus?: EventBus;
  logger?: pino.Logger;
  maxConsecutiveFailures?: number;
}

/**
 * Fans completed ticks out to consumers. Each consumer gets its own promise
 * chain, so a slow consumer only delays itself and `dispatch` never waits.
 * Consumers that fail `maxConsecutiveFailures` times in a row are dropped.
 */
export class TickDispatcher {
  private readonly consumers: Map<TickConsumer, RegisteredConsumer> = new Map();
  /** Queues of unregistered consumers whose current delivery is still running. */
  private readonly retiring: Set<Promise<void>> = new Set();
  private readonly eventBus: EventBus | undefined;
  private readonly logger: pino.Logger;
  private maxConsecutiveFailures: number;
  private nextId = 1;

  constructor(options: TickDispatcherOptions = {}) {
    this.eventBus = options.eventBus;
    this.logger = options.logger ?? getLogger('dispatcher');
    this.maxConsecutiveFailures = options.maxConsecutiveFailures ?? DEFAULT_MAX_CONSUMER_FAILURES;
  }

  register(consumer: TickConsumer): void {
    if (this.consumers.has(consumer)) return;

    const name = consumer.name ?? `consumer-${this.nextId}`;
    this.nextId++;
    this.consumers.set(consumer, {
      consumer,
      name,
      queue: Promise.resolve(),
      pending: 0,
      consecutiveFailures: 0,
      active: true,
    });
    this.logger.debug({ consumer: name }, 'Consumer registered');
  }

  /** Deliveries already queued for the consumer are skipped. */
  unregister(consumer: TickConsumer): boolean {
    const entry = this.consumers.get(consumer);
    if (!entry) return false;

    entry.active = false;
    this.consumers.delete(consumer);
    const last = entry.queue;
    this.retiring.add(last);
    void last.then(() => {
      this.retiring.delete(last);
    });
    this.logger.debug({ consumer: entry.name }, 'Consumer unregistered');
    return true;
  }

  has(consumer: TickConsumer): boolean {
    return this.consumers.has(consumer);
  }

  get size(): number {
    return this.consumers.size;
  }

  /** Number of ticks queued but not yet handled by `consumer`. */
  pendingFor(consumer: TickConsumer): number {
    return this.consumers.get(consumer)?.pending ?? 0;
  }

  setMaxConsecutiveFailures(max: number): void {
    this.maxConsecutiveFailures = max;
  }

  dispatch(result: TickResult): void {
    for (const entry of this.consumers.values()) {
      entry.pending++;
      entry.queue = entry.queue
        .then(() => this.deliver(entry, result))
        .catch((err: unknown) => {
          this.logger.error({ err, consumer: entry.name }, 'Tick delivery bookkeeping failed');
        });
    }
  }

  /**
   * Resolves once every delivery queued so far has settled, including one
   * still running for a consumer that has since been unregistered.
   */
  async drain(): Promise<void> {
    const queues = Array.from(this.consumers.values(), (entry) => entry.queue);
    await Promise.all([...queues, ...this.retiring]);
  }

  private async deliver(entry: RegisteredConsumer, result: TickResult): Promise<void> {
    entry.pending--;
    if (!entry.active) return;

    try {
      await entry.consumer.onTick(result);
      entry.consecutiveFailures = 0;
    } catch (err) {
      entry.consecutiveFailures++;
      const failure = new ConsumerFailureError(entry.name, result.sample.tick, err);
      this.logger.error(
        {
          err: failure,
          consumer: entry.name,
          tick: result.sample.tick,
          consecutiveFailures: entry.consecutiveFailures,
          maxFailures: this.maxConsecutiveFailures,
        },
        'Consumer failed to handle tick',
      );
      this.eventBus?.emit('consumer:failed', {
        consumer: entry.name,
        tick: result.sample.tick,
        error: failure.message,
        consecutiveFailures: entry.consecutiveFailures,
      });

      if (entry.consecutiveFailures >= this.maxConsecutiveFailures) {
        this.unregister(entry.consumer);
        this.logger.warn(
          { consumer: entry.name, consecutiveFailures: entry.consecutiveFailures },
          'Consumer removed after repeated failures',
        );
        this.eventBus?.emit('consumer:removed', {
          consumer: entry.name,
          consecutiveFailures: entry.consecutiveFailures,
        });
      }
    }
  }
}
