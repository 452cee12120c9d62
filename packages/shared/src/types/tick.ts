import type { AlertEvent, AlertState } from './alerts.js';
import type { DerivedRates, Sample } from './metrics.js';

/** Copies of every series, oldest point first. */
export interface SeriesSnapshot {
  timestamps: Date[];
  cpuPerCore: number[][];
  cpuMean: number[];
  memoryPercent: number[];
  networkSent: number[];
  networkReceived: number[];
}

export interface TickResult {
  sample: Sample;
  /** Null when the network counters could not be read this tick. */
  rates: DerivedRates | null;
  series: SeriesSnapshot;
  alerts: AlertEvent[];
  alertStates: AlertState[];
}

export interface ExportSnapshot {
  timestamps: Date[];
  cpuSeries: Record<number, number[]>;
  memorySeries: number[];
  networkSeries: {
    sent: number[];
    received: number[];
  };
}
