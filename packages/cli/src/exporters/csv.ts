import { meanCpuSeries } from '@sysvitals/core';
import type { ExportSnapshot } from '@sysvitals/shared';

export const CSV_HEADER = ['Timestamp', 'CPU Avg %', 'Memory %', 'Network Send (B/s)', 'Network Receive (B/s)'];

/** Two decimals; a gap in the history is an empty field. */
function cell(value: number | undefined): string {
  return value !== undefined && Number.isFinite(value) ? value.toFixed(2) : '';
}

/**
 * One row per history point, oldest first. Timestamps are ISO 8601 in UTC.
 */
export function toCsv(snapshot: ExportSnapshot): string {
  const cpuAvg = meanCpuSeries(snapshot);
  const rows = [CSV_HEADER.join(',')];

  snapshot.timestamps.forEach((timestamp, i) => {
    rows.push(
      [
        timestamp.toISOString(),
        cell(cpuAvg[i]),
        cell(snapshot.memorySeries[i]),
        cell(snapshot.networkSeries.sent[i]),
        cell(snapshot.networkSeries.received[i]),
      ].join(','),
    );
  });

  return `${rows.join('\n')}\n`;
}
