import msLib from 'ms';
import bytesLib from 'bytes';

/**
 * Parse a duration string to milliseconds.
 * Supports: '100ms', '1.5s', '2m', or a bare number of milliseconds.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') return value;

  const result = msLib(value);
  if (result === undefined || !Number.isFinite(result)) {
    throw new Error(`Invalid duration string: "${value}"`);
  }
  return result;
}

/**
 * Parse a sampling interval. Plain numbers are seconds ('0.5', 2); strings
 * with a unit go through parseDuration ('500ms', '2s').
 */
export function parseIntervalSeconds(value: string | number): number {
  if (typeof value === 'number') return value;

  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }
  return parseDuration(trimmed) / 1000;
}

export function formatBytes(value: number): string {
  return bytesLib.format(value, { unitSeparator: ' ', decimalPlaces: 2 }) ?? '0 B';
}

export function formatRate(bytesPerSecond: number): string {
  return `${formatBytes(bytesPerSecond)}/s`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * Uptime as "3 days, 4 hours, 12 minutes".
 */
export function formatUptime(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const days = Math.floor(total / 86_400);
  const hours = Math.floor((total % 86_400) / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  return `${days} days, ${hours} hours, ${minutes} minutes`;
}
