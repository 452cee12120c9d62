import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { AlertEvent, EventBusMessage } from '@sysvitals/shared';
import { EventBus } from '../events/EventBus.js';

vi.mock('nanoid', () => ({
  nanoid: () => 'test-id-123',
}));

function alert(type: AlertEvent['type'], value: number): AlertEvent {
  return {
    type,
    quantity: 'cpu',
    value,
    threshold: type === 'raised' ? 90 : 70,
    timestamp: new Date('2026-03-01T12:00:00Z'),
  };
}

describe('EventBus', () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  describe('emit and on', () => {
    it('should call the listener with the event payload', () => {
      const handler = vi.fn();
      const event = alert('raised', 95);

      eventBus.on('alert:raised', handler);
      eventBus.emit('alert:raised', event);

      expect(handler).toHaveBeenCalledOnce();
      expect(handler).toHaveBeenCalledWith(event);
    });

    it('should support multiple listeners on the same event', () => {
      const first = vi.fn();
      const second = vi.fn();
      const payload = { tick: 3, counters: ['bytesSent' as const] };

      eventBus.on('rate:clamped', first);
      eventBus.on('rate:clamped', second);
      eventBus.emit('rate:clamped', payload);

      expect(first).toHaveBeenCalledWith(payload);
      expect(second).toHaveBeenCalledWith(payload);
    });

    it('should not call listeners for other events', () => {
      const raised = vi.fn();
      const cleared = vi.fn();

      eventBus.on('alert:raised', raised);
      eventBus.on('alert:cleared', cleared);
      eventBus.emit('alert:cleared', alert('cleared', 60));

      expect(raised).not.toHaveBeenCalled();
      expect(cleared).toHaveBeenCalledOnce();
    });

    it('should emit engine:stop with undefined data', () => {
      const handler = vi.fn();
      eventBus.on('engine:stop', handler);

      eventBus.emit('engine:stop', undefined);

      expect(handler).toHaveBeenCalledWith(undefined);
    });
  });

  describe('once', () => {
    it('should call the handler only once', () => {
      const handler = vi.fn();
      eventBus.once('clock:anomaly', handler);

      eventBus.emit('clock:anomaly', { tick: 2, elapsedSeconds: 0 });
      eventBus.emit('clock:anomaly', { tick: 3, elapsedSeconds: -1 });

      expect(handler).toHaveBeenCalledOnce();
      expect(handler).toHaveBeenCalledWith({ tick: 2, elapsedSeconds: 0 });
    });
  });

  describe('off', () => {
    it('should only remove the given listener', () => {
      const removed = vi.fn();
      const kept = vi.fn();

      eventBus.on('history:reset', removed);
      eventBus.on('history:reset', kept);
      eventBus.off('history:reset', removed);
      eventBus.emit('history:reset', { timestamp: new Date() });

      expect(removed).not.toHaveBeenCalled();
      expect(kept).toHaveBeenCalledOnce();
    });

    it('should ignore a listener that was never added', () => {
      expect(() => eventBus.off('engine:start', vi.fn())).not.toThrow();
    });
  });

  describe('removeAllListeners', () => {
    it('should remove listeners of every event, including wildcards', () => {
      const handler = vi.fn();
      const anyHandler = vi.fn();
      eventBus.on('engine:start', handler);
      eventBus.onAny(anyHandler);

      eventBus.removeAllListeners();
      eventBus.emit('engine:start', { intervalSeconds: 1 });

      expect(handler).not.toHaveBeenCalled();
      expect(anyHandler).not.toHaveBeenCalled();
    });
  });

  describe('onAny / offAny', () => {
    it('should wrap every event in a message envelope', () => {
      const anyHandler = vi.fn();
      eventBus.onAny(anyHandler);

      eventBus.emit('consumer:removed', { consumer: 'csv', consecutiveFailures: 5 });
      eventBus.emit('engine:start', { intervalSeconds: 2 });

      expect(anyHandler).toHaveBeenCalledTimes(2);
      const message = anyHandler.mock.calls[0][0] as EventBusMessage;
      expect(message.id).toBe('test-id-123');
      expect(message.type).toBe('consumer:removed');
      expect(message.source).toBe('engine');
      expect(message.timestamp).toBeInstanceOf(Date);
      expect(message.data).toEqual({ consumer: 'csv', consecutiveFailures: 5 });

      const second = anyHandler.mock.calls[1][0] as EventBusMessage;
      expect(second.type).toBe('engine:start');
    });

    it('should stop delivering after offAny', () => {
      const anyHandler = vi.fn();
      eventBus.onAny(anyHandler);
      eventBus.emit('engine:stop', undefined);

      eventBus.offAny(anyHandler);
      eventBus.emit('engine:stop', undefined);

      expect(anyHandler).toHaveBeenCalledOnce();
    });
  });
});
