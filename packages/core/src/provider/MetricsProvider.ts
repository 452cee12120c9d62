import type { DiskReading, MemoryReading, NetworkCounters } from '@sysvitals/shared';

type MaybePromise<T> = T | Promise<T>;

/**
 * Raw OS readings. Any method may throw ProviderUnavailableError (or any other
 * error, which the sampler treats the same way) for a single tick.
 */
export interface MetricsProvider {
  sampleCpuPerCore(): MaybePromise<number[]>;
  sampleMemory(): MaybePromise<MemoryReading>;
  sampleDisks(): MaybePromise<DiskReading[]>;
  sampleNetworkCounters(): MaybePromise<NetworkCounters>;
  bootTime(): MaybePromise<Date>;
}
