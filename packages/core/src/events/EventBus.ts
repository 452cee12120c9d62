import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import type {
  AlertEvent,
  CounterName,
  EventBusMessage,
  MetricCategory,
  TickResult,
  VitalsConfig,
} from '@sysvitals/shared';

export interface ProviderUnavailableEvent {
  tick: number;
  category: MetricCategory;
  error: string;
  timedOut: boolean;
}

export interface RateClampedEvent {
  tick: number;
  counters: CounterName[];
}

export interface ClockAnomalyEvent {
  tick: number;
  elapsedSeconds: number;
}

export interface ConsumerFailedEvent {
  consumer: string;
  tick: number;
  error: string;
  consecutiveFailures: number;
}

export interface ConsumerRemovedEvent {
  consumer: string;
  consecutiveFailures: number;
}

type EventMap = {
  'tick:complete': TickResult;
  'alert:raised': AlertEvent;
  'alert:cleared': AlertEvent;
  'provider:unavailable': ProviderUnavailableEvent;
  'rate:clamped': RateClampedEvent;
  'clock:anomaly': ClockAnomalyEvent;
  'consumer:failed': ConsumerFailedEvent;
  'consumer:removed': ConsumerRemovedEvent;
  'history:reset': { timestamp: Date };
  'engine:start': { intervalSeconds: number };
  'engine:stop': undefined;
  'config:changed': VitalsConfig;
};

export type EventName = keyof EventMap;

export class EventBus {
  private emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100);
  }

  emit<K extends EventName>(event: K, data: EventMap[K]): void {
    this.emitter.emit(event, data);
    const message: EventBusMessage = {
      id: nanoid(),
      type: event,
      source: 'engine',
      timestamp: new Date(),
      data,
    };
    this.emitter.emit('*', message);
  }

  on<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.on(event, handler as (...args: unknown[]) => void);
  }

  once<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.once(event, handler as (...args: unknown[]) => void);
  }

  off<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.off(event, handler as (...args: unknown[]) => void);
  }

  onAny(handler: (message: EventBusMessage) => void): void {
    this.emitter.on('*', handler);
  }

  offAny(handler: (message: EventBusMessage) => void): void {
    this.emitter.off('*', handler);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
