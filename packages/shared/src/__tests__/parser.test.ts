import { describe, it, expect } from 'vitest';
import {
  parseDuration,
  parseIntervalSeconds,
  formatBytes,
  formatRate,
  formatPercent,
  formatUptime,
} from '../utils/parser.js';

describe('parseDuration', () => {
  it('should return the number directly when given a number', () => {
    expect(parseDuration(5000)).toBe(5000);
    expect(parseDuration(0)).toBe(0);
  });

  it('should parse seconds and milliseconds', () => {
    expect(parseDuration('2s')).toBe(2000);
    expect(parseDuration('500ms')).toBe(500);
  });

  it('should parse fractional seconds', () => {
    expect(parseDuration('1.5s')).toBe(1500);
  });

  it('should throw on invalid duration string', () => {
    expect(() => parseDuration('soon')).toThrow('Invalid duration string: "soon"');
  });
});

describe('parseIntervalSeconds', () => {
  it('should treat bare numbers as seconds', () => {
    expect(parseIntervalSeconds(2)).toBe(2);
    expect(parseIntervalSeconds('0.5')).toBe(0.5);
    expect(parseIntervalSeconds(' 3 ')).toBe(3);
  });

  it('should convert unit strings to seconds', () => {
    expect(parseIntervalSeconds('250ms')).toBe(0.25);
    expect(parseIntervalSeconds('2s')).toBe(2);
  });

  it('should throw on garbage', () => {
    expect(() => parseIntervalSeconds('fast')).toThrow();
  });
});

describe('formatBytes / formatRate', () => {
  it('should format byte counts', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1024)).toBe('1 KB');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(1024 * 1024)).toBe('1 MB');
  });

  it('should append a per-second suffix for rates', () => {
    expect(formatRate(2000)).toBe('1.95 KB/s');
  });
});

describe('formatPercent', () => {
  it('should keep one decimal place', () => {
    expect(formatPercent(42)).toBe('42.0%');
    expect(formatPercent(99.96)).toBe('100.0%');
  });
});

describe('formatUptime', () => {
  it('should split seconds into days, hours and minutes', () => {
    expect(formatUptime(0)).toBe('0 days, 0 hours, 0 minutes');
    expect(formatUptime(90_061)).toBe('1 days, 1 hours, 1 minutes');
  });

  it('should clamp negative values to zero', () => {
    expect(formatUptime(-5)).toBe('0 days, 0 hours, 0 minutes');
  });
});
