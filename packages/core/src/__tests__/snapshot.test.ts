import { describe, it, expect } from 'vitest';
import type { SeriesSnapshot } from '@sysvitals/shared';
import { meanCpuSeries, toExportSnapshot } from '../export/snapshot.js';

function series(): SeriesSnapshot {
  return {
    timestamps: [new Date('2026-03-01T12:00:00Z'), new Date('2026-03-01T12:00:01Z')],
    cpuPerCore: [
      [10, 30],
      [20, Number.NaN],
    ],
    cpuMean: [15, 30],
    memoryPercent: [50, 51],
    networkSent: [0, 2000],
    networkReceived: [0, 500],
  };
}

describe('toExportSnapshot', () => {
  it('should key CPU series by core index', () => {
    const snapshot = toExportSnapshot(series());

    expect(snapshot.cpuSeries).toEqual({ 0: [10, 30], 1: [20, Number.NaN] });
    expect(snapshot.memorySeries).toEqual([50, 51]);
    expect(snapshot.networkSeries).toEqual({ sent: [0, 2000], received: [0, 500] });
    expect(snapshot.timestamps).toHaveLength(2);
  });

  it('should copy every array', () => {
    const input = series();
    const snapshot = toExportSnapshot(input);

    input.memoryPercent.push(99);
    input.cpuPerCore[0].push(99);
    input.timestamps.pop();

    expect(snapshot.memorySeries).toEqual([50, 51]);
    expect(snapshot.cpuSeries[0]).toEqual([10, 30]);
    expect(snapshot.timestamps).toHaveLength(2);
  });

  it('should handle an empty history', () => {
    const snapshot = toExportSnapshot({
      timestamps: [],
      cpuPerCore: [],
      cpuMean: [],
      memoryPercent: [],
      networkSent: [],
      networkReceived: [],
    });

    expect(snapshot).toEqual({
      timestamps: [],
      cpuSeries: {},
      memorySeries: [],
      networkSeries: { sent: [], received: [] },
    });
  });
});

describe('meanCpuSeries', () => {
  it('should average the cores that have a value at each point', () => {
    expect(meanCpuSeries(toExportSnapshot(series()))).toEqual([15, 30]);
  });

  it('should yield NaN where no core has a value', () => {
    const input = series();
    input.cpuPerCore = [
      [Number.NaN, 40],
      [Number.NaN, 60],
    ];
    expect(meanCpuSeries(toExportSnapshot(input))).toEqual([Number.NaN, 50]);
  });
});
