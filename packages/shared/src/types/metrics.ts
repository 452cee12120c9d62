export type MetricCategory = 'cpu' | 'memory' | 'disks' | 'network';

export interface MemoryReading {
  total: number;
  available: number;
  used: number;
  free: number;
  /** 0-100 */
  percent: number;
}

export interface DiskReading {
  device: string;
  mount: string;
  fstype: string;
  total: number;
  used: number;
  free: number;
  percent: number;
}

/** Cumulative since boot; may drop back towards 0 when an interface restarts. */
export interface NetworkCounters {
  bytesSent: number;
  bytesRecv: number;
  packetsSent: number;
  packetsRecv: number;
}

/**
 * One point-in-time reading. A category that could not be read this tick is
 * `null` and listed in `unavailable`; it is never filled with older data.
 */
export interface Sample {
  tick: number;
  timestamp: Date;
  cpuPerCore: number[] | null;
  memory: MemoryReading | null;
  disks: DiskReading[] | null;
  network: NetworkCounters | null;
  unavailable: MetricCategory[];
}

export interface DerivedRates {
  bytesSentPerSec: number;
  bytesRecvPerSec: number;
  packetsSentPerSec: number;
  packetsRecvPerSec: number;
}

export type CounterName = keyof NetworkCounters;

export interface SystemInfo {
  hostname: string;
  platform: string;
  release: string;
  arch: string;
  cpuModel: string;
  cpuCount: number;
  bootTime: Date;
}
