import { DEFAULT_HISTORY_CAPACITY } from '@sysvitals/shared';
import { RingBuffer } from './RingBuffer.js';

export const SERIES = {
  cpuMean: 'cpu.mean',
  memoryPercent: 'memory.percent',
  networkSent: 'network.sent',
  networkReceived: 'network.received',
  cpuCore: (index: number): string => `cpu.core.${index}`,
} as const;

/**
 * Bounded per-metric history. Series are created on first push and all share
 * one capacity.
 */
export class HistoryBuffer {
  private series: Map<string, RingBuffer<number>> = new Map();
  private capacity: number;

  constructor(capacity: number = DEFAULT_HISTORY_CAPACITY) {
    this.assertCapacity(capacity);
    this.capacity = capacity;
  }

  push(seriesId: string, value: number): void {
    let buffer = this.series.get(seriesId);
    if (!buffer) {
      buffer = new RingBuffer<number>(this.capacity);
      this.series.set(seriesId, buffer);
    }
    buffer.push(value);
  }

  snapshot(seriesId: string): number[] {
    return this.series.get(seriesId)?.toArray() ?? [];
  }

  size(seriesId: string): number {
    return this.series.get(seriesId)?.length ?? 0;
  }

  ids(): string[] {
    return Array.from(this.series.keys());
  }

  getCapacity(): number {
    return this.capacity;
  }

  /** Drops the oldest points of any series longer than the new capacity. */
  setCapacity(capacity: number): void {
    this.assertCapacity(capacity);
    if (capacity === this.capacity) return;
    this.capacity = capacity;
    for (const buffer of this.series.values()) {
      buffer.resize(capacity);
    }
  }

  resetAll(): void {
    for (const buffer of this.series.values()) {
      buffer.clear();
    }
  }

  private assertCapacity(capacity: number): void {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
  }
}
