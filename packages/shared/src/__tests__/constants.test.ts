import { describe, it, expect } from 'vitest';
import {
  VITALS_HOME,
  VITALS_CONFIG_FILES,
  DEFAULT_INTERVAL_SECONDS,
  MIN_INTERVAL_SECONDS,
  DEFAULT_HISTORY_CAPACITY,
  MAX_PROVIDER_TIMEOUT_MS,
  DEFAULT_MAX_CONSUMER_FAILURES,
  DEFAULT_CPU_THRESHOLD,
  DEFAULT_MEMORY_THRESHOLD,
  VITALS_VERSION,
} from '../constants.js';

describe('constants', () => {
  it('should default VITALS_HOME to a non-empty path', () => {
    expect(typeof VITALS_HOME).toBe('string');
    expect(VITALS_HOME.length).toBeGreaterThan(0);
  });

  it('should look for JSON config files', () => {
    expect(VITALS_CONFIG_FILES).toEqual(['vitals.config.json', '.vitalsrc.json']);
  });

  it('should sample once a second with a 0.1s floor', () => {
    expect(DEFAULT_INTERVAL_SECONDS).toBe(1);
    expect(MIN_INTERVAL_SECONDS).toBe(0.1);
  });

  it('should keep a minute of history by default', () => {
    expect(DEFAULT_HISTORY_CAPACITY).toBe(60);
  });

  it('should cap provider calls and consumer failures', () => {
    expect(MAX_PROVIDER_TIMEOUT_MS).toBe(5000);
    expect(DEFAULT_MAX_CONSUMER_FAILURES).toBe(5);
  });

  it('should use hysteresis bands with clear below enter', () => {
    expect(DEFAULT_CPU_THRESHOLD).toEqual({ enter: 90, clear: 70 });
    expect(DEFAULT_MEMORY_THRESHOLD).toEqual({ enter: 85, clear: 75 });
  });

  it('should expose a semver version', () => {
    expect(VITALS_VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });
});
