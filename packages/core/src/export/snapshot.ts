import type { ExportSnapshot, SeriesSnapshot } from '@sysvitals/shared';

/** Reshape series into the record handed to exporters. */
export function toExportSnapshot(series: SeriesSnapshot): ExportSnapshot {
  const cpuSeries: Record<number, number[]> = {};
  series.cpuPerCore.forEach((values, core) => {
    cpuSeries[core] = [...values];
  });

  return {
    timestamps: [...series.timestamps],
    cpuSeries,
    memorySeries: [...series.memoryPercent],
    networkSeries: {
      sent: [...series.networkSent],
      received: [...series.networkReceived],
    },
  };
}

/**
 * Mean CPU across cores at each point; points where no core has a value are
 * NaN.
 */
export function meanCpuSeries(snapshot: ExportSnapshot): number[] {
  const cores = Object.values(snapshot.cpuSeries);
  return snapshot.timestamps.map((_ts, i) => {
    const values = cores.map((core) => core[i]).filter((v): v is number => Number.isFinite(v));
    if (values.length === 0) return Number.NaN;
    return values.reduce((a, b) => a + b, 0) / values.length;
  });
}
