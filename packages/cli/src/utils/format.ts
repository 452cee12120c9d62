import chalk from 'chalk';
import type { AlertState } from '@sysvitals/shared';
import { formatBytes, formatPercent, formatRate, formatUptime } from '@sysvitals/shared';

export { formatBytes, formatPercent, formatRate, formatUptime };

export interface ColorBands {
  warn: number;
  critical: number;
}

export const CPU_BANDS: ColorBands = { warn: 50, critical: 80 };
export const DISK_BANDS: ColorBands = { warn: 70, critical: 85 };

function isKnown(value: number | null | undefined): value is number {
  return value !== null && value !== undefined && Number.isFinite(value);
}

export function colorByLevel(text: string, value: number, bands: ColorBands = CPU_BANDS): string {
  if (value < bands.warn) return chalk.green(text);
  if (value < bands.critical) return chalk.yellow(text);
  return chalk.red(text);
}

export function formatPercentDisplay(value: number | null | undefined, bands: ColorBands = CPU_BANDS): string {
  if (!isKnown(value)) return chalk.gray('-');
  return colorByLevel(formatPercent(value), value, bands);
}

/** Horizontal bar, one block per `100 / width` percent. */
export function usageBar(percent: number, width = 25): string {
  if (!isKnown(percent)) return '';
  const clamped = Math.min(100, Math.max(0, percent));
  const blocks = Math.floor((clamped / 100) * width);
  return colorByLevel('█'.repeat(blocks), clamped);
}

const SPARK_LEVELS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'];

/**
 * One character per point, scaled against `max` (the largest value when
 * omitted). Gaps render as spaces.
 */
export function sparkline(values: number[], max?: number): string {
  const known = values.filter(isKnown);
  const top = max ?? Math.max(0, ...known);
  return values
    .map((value) => {
      if (!isKnown(value)) return ' ';
      if (top <= 0) return SPARK_LEVELS[0];
      const ratio = Math.min(1, Math.max(0, value / top));
      return SPARK_LEVELS[Math.round(ratio * (SPARK_LEVELS.length - 1))];
    })
    .join('');
}

export function formatRateDisplay(value: number | null | undefined): string {
  if (!isKnown(value)) return chalk.gray('-');
  return formatRate(value);
}

export function alertBadge(state: AlertState): string {
  return state.status === 'alerted' ? chalk.red.bold('ALERT') : chalk.green('ok');
}

export function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}
