import { vi } from 'vitest';
import type pino from 'pino';
import type {
  DerivedRates,
  DiskReading,
  MemoryReading,
  NetworkCounters,
  Sample,
  TickResult,
} from '@sysvitals/shared';
import type { MetricsProvider } from '../provider/MetricsProvider.js';

export interface MockLogger {
  level: string;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
  debug: ReturnType<typeof vi.fn>;
  trace: ReturnType<typeof vi.fn>;
  fatal: ReturnType<typeof vi.fn>;
  child: ReturnType<typeof vi.fn>;
}

export function createMockLogger(): MockLogger {
  const logger: MockLogger = {
    level: 'info',
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export function asLogger(mock: MockLogger): pino.Logger {
  return mock as unknown as pino.Logger;
}

export const MEMORY: MemoryReading = {
  total: 8_000,
  available: 4_000,
  used: 4_000,
  free: 3_000,
  percent: 50,
};

export const ROOT_DISK: DiskReading = {
  device: '/dev/sda1',
  mount: '/',
  fstype: 'ext4',
  total: 1000,
  used: 400,
  free: 600,
  percent: 40,
};

export function counters(bytesSent: number, bytesRecv = 0, packetsSent = 0, packetsRecv = 0): NetworkCounters {
  return { bytesSent, bytesRecv, packetsSent, packetsRecv };
}

export interface FakeProviderState {
  cpu: number[] | Error;
  memory: MemoryReading | Error;
  disks: DiskReading[] | Error;
  network: NetworkCounters | Error;
}

/**
 * Provider whose readings are set by the test between ticks. Assign an Error
 * to a field to make that category throw.
 */
export function createFakeProvider(initial: Partial<FakeProviderState> = {}): {
  provider: MetricsProvider;
  state: FakeProviderState;
} {
  const state: FakeProviderState = {
    cpu: [10, 20],
    memory: MEMORY,
    disks: [ROOT_DISK],
    network: counters(0),
    ...initial,
  };

  const read = <T>(value: T | Error): T => {
    if (value instanceof Error) throw value;
    return value;
  };

  const provider: MetricsProvider = {
    sampleCpuPerCore: vi.fn(() => read(state.cpu)),
    sampleMemory: vi.fn(() => read(state.memory)),
    sampleDisks: vi.fn(() => read(state.disks)),
    sampleNetworkCounters: vi.fn(() => read(state.network)),
    bootTime: vi.fn(() => new Date('2026-01-01T00:00:00Z')),
  };

  return { provider, state };
}

/** Clock that returns whatever `now` currently holds. */
export function createClock(start: string = '2026-03-01T12:00:00Z'): {
  clock: () => Date;
  set: (iso: string | number) => void;
  advance: (ms: number) => void;
} {
  let now = new Date(start).getTime();
  return {
    clock: () => new Date(now),
    set: (value) => {
      now = typeof value === 'number' ? value : new Date(value).getTime();
    },
    advance: (ms) => {
      now += ms;
    },
  };
}

export function makeSample(overrides: Partial<Sample> = {}): Sample {
  return {
    tick: 1,
    timestamp: new Date('2026-03-01T12:00:00Z'),
    cpuPerCore: [10, 20],
    memory: MEMORY,
    disks: [ROOT_DISK],
    network: counters(0),
    unavailable: [],
    ...overrides,
  };
}

const NO_RATES: DerivedRates = {
  bytesSentPerSec: 0,
  bytesRecvPerSec: 0,
  packetsSentPerSec: 0,
  packetsRecvPerSec: 0,
};

export function makeTickResult(tick: number): TickResult {
  return {
    sample: makeSample({ tick }),
    rates: NO_RATES,
    series: {
      timestamps: [],
      cpuPerCore: [],
      cpuMean: [],
      memoryPercent: [],
      networkSent: [],
      networkReceived: [],
    },
    alerts: [],
    alertStates: [],
  };
}
