import { readFile, statfs } from 'node:fs/promises';
import type pino from 'pino';
import { arch, cpus, freemem, hostname, platform, release, totalmem, uptime } from 'node:os';
import { ProviderUnavailableError, getLogger } from '@sysvitals/shared';
import type {
  DiskReading,
  MemoryReading,
  MetricCategory,
  NetworkCounters,
  SystemInfo,
} from '@sysvitals/shared';
import type { MetricsProvider } from './MetricsProvider.js';

interface CpuTimes {
  idle: number;
  total: number;
}

export interface OsMetricsProviderOptions {
  /** Where procfs is mounted; overridable for containers. */
  procRoot?: string;
  /** Bound on each mount's statfs call. */
  mountTimeoutMs?: number;
  logger?: pino.Logger;
}

export const DEFAULT_MOUNT_TIMEOUT_MS = 500;

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** /proc/mounts escapes whitespace as octal, e.g. `\040` for a space. */
export function decodeMountPath(raw: string): string {
  return raw.replace(/\\([0-7]{3})/g, (_match, octal: string) =>
    String.fromCharCode(parseInt(octal, 8)),
  );
}

export function parseMeminfo(content: string): Map<string, number> {
  const fields = new Map<string, number>();
  for (const line of content.split('\n')) {
    const match = /^(\w+(?:\(\w+\))?):\s+(\d+)(?:\s+kB)?/.exec(line);
    if (match) {
      const kb = line.includes('kB');
      fields.set(match[1], Number(match[2]) * (kb ? 1024 : 1));
    }
  }
  return fields;
}

export function parseNetDev(content: string): NetworkCounters {
  const totals: NetworkCounters = { bytesSent: 0, bytesRecv: 0, packetsSent: 0, packetsRecv: 0 };
  // Two header lines, then "iface: rx_bytes rx_packets ... (8 rx cols) tx_bytes tx_packets ..."
  for (const line of content.split('\n').slice(2)) {
    const colon = line.indexOf(':');
    if (colon === -1) continue;
    const cols = line
      .slice(colon + 1)
      .trim()
      .split(/\s+/)
      .map(Number);
    if (cols.length < 10) continue;
    totals.bytesRecv += cols[0];
    totals.packetsRecv += cols[1];
    totals.bytesSent += cols[8];
    totals.packetsSent += cols[9];
  }
  return totals;
}

export interface MountEntry {
  device: string;
  mount: string;
  fstype: string;
}

/**
 * Physical mounts only: filesystems flagged `nodev` in /proc/filesystems
 * (proc, sysfs, tmpfs, cgroup, ...) are skipped, as are repeated mount points.
 */
export function parseMounts(content: string, nodevTypes: Set<string>): MountEntry[] {
  const seen = new Set<string>();
  const entries: MountEntry[] = [];
  for (const line of content.split('\n')) {
    const [device, rawMount, fstype] = line.trim().split(/\s+/);
    if (!device || !rawMount || !fstype) continue;
    if (nodevTypes.has(fstype)) continue;
    const mount = decodeMountPath(rawMount);
    if (seen.has(mount)) continue;
    seen.add(mount);
    entries.push({ device, mount, fstype });
  }
  return entries;
}

export function parseNodevFilesystems(content: string): Set<string> {
  const types = new Set<string>();
  for (const line of content.split('\n')) {
    const [flag, name] = line.split('\t');
    if (flag === 'nodev' && name) types.add(name.trim());
  }
  return types;
}

/**
 * MetricsProvider backed by node:os and Linux procfs. CPU load is derived
 * from the change in per-core CPU times since the previous call.
 */
export class OsMetricsProvider implements MetricsProvider {
  private readonly procRoot: string;
  private readonly mountTimeoutMs: number;
  private readonly logger: pino.Logger;
  private lastCpuTimes: CpuTimes[] = [];
  /** Mounts whose statfs call has not returned yet. */
  private readonly pendingStatfs = new Set<string>();

  constructor(options: OsMetricsProviderOptions = {}) {
    this.procRoot = options.procRoot ?? '/proc';
    this.mountTimeoutMs = options.mountTimeoutMs ?? DEFAULT_MOUNT_TIMEOUT_MS;
    this.logger = options.logger ?? getLogger('provider');
    this.lastCpuTimes = this.readCpuTimes();
  }

  sampleCpuPerCore(): number[] {
    const current = this.readCpuTimes();
    if (current.length === 0) {
      throw new ProviderUnavailableError('cpu', 'no CPU information reported');
    }

    const usage = current.map((now, i) => {
      const last = this.lastCpuTimes[i];
      if (!last) return 0;
      const totalDiff = now.total - last.total;
      const idleDiff = now.idle - last.idle;
      return totalDiff > 0 ? round1(((totalDiff - idleDiff) / totalDiff) * 100) : 0;
    });

    this.lastCpuTimes = current;
    return usage;
  }

  async sampleMemory(): Promise<MemoryReading> {
    const total = totalmem();
    const free = freemem();
    let available = free;

    if (platform() === 'linux') {
      try {
        const meminfo = parseMeminfo(await readFile(`${this.procRoot}/meminfo`, 'utf8'));
        available = meminfo.get('MemAvailable') ?? free;
      } catch (err) {
        this.logger.debug({ err }, 'meminfo unreadable, using free memory as available');
      }
    }

    const used = total - available;
    return {
      total,
      available,
      used,
      free,
      percent: total > 0 ? round1((used / total) * 100) : 0,
    };
  }

  /**
   * Mounts are read in parallel. A mount that does not answer within
   * `mountTimeoutMs` is left out, and is not asked again until its
   * outstanding call returns.
   */
  async sampleDisks(): Promise<DiskReading[]> {
    const mounts = await this.readMounts();
    const readings = await Promise.all(mounts.map((entry) => this.readDisk(entry)));
    return readings.filter((disk): disk is DiskReading => disk !== null);
  }

  async sampleNetworkCounters(): Promise<NetworkCounters> {
    const content = await this.readProc('net/dev', 'network');
    return parseNetDev(content);
  }

  bootTime(): Date {
    return new Date(Date.now() - uptime() * 1000);
  }

  getSystemInfo(): SystemInfo {
    const info = cpus();
    return {
      hostname: hostname(),
      platform: platform(),
      release: release(),
      arch: arch(),
      cpuModel: info[0]?.model ?? 'unknown',
      cpuCount: info.length,
      bootTime: this.bootTime(),
    };
  }

  private readCpuTimes(): CpuTimes[] {
    return cpus().map((cpu) => {
      const total = Object.values(cpu.times).reduce((a, b) => a + b, 0);
      return { idle: cpu.times.idle, total };
    });
  }

  private async readDisk(entry: MountEntry): Promise<DiskReading | null> {
    if (this.pendingStatfs.has(entry.mount)) {
      this.logger.debug({ mount: entry.mount }, 'Skipping mount, previous statfs still pending');
      return null;
    }

    const call = statfs(entry.mount);
    this.pendingStatfs.add(entry.mount);
    const release = (): void => {
      this.pendingStatfs.delete(entry.mount);
    };
    void call.then(release, release);

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(
        () => reject(new Error(`statfs timed out after ${this.mountTimeoutMs}ms`)),
        this.mountTimeoutMs,
      );
    });

    try {
      const stats = await Promise.race([call, timeout]);
      const total = stats.blocks * stats.bsize;
      const free = stats.bavail * stats.bsize;
      const used = (stats.blocks - stats.bfree) * stats.bsize;
      const usable = used + free;
      return {
        ...entry,
        total,
        used,
        free,
        percent: usable > 0 ? round1((used / usable) * 100) : 0,
      };
    } catch (err) {
      // One unreadable mount (EACCES, stale NFS) does not hide the others.
      this.logger.debug({ err, mount: entry.mount }, 'Skipping unreadable mount');
      return null;
    } finally {
      clearTimeout(timer);
    }
  }

  private async readMounts(): Promise<MountEntry[]> {
    const [mounts, filesystems] = await Promise.all([
      this.readProc('mounts', 'disks'),
      this.readProc('filesystems', 'disks'),
    ]);
    return parseMounts(mounts, parseNodevFilesystems(filesystems));
  }

  private async readProc(path: string, category: MetricCategory): Promise<string> {
    if (platform() !== 'linux') {
      throw new ProviderUnavailableError(category, `not supported on ${platform()}`);
    }
    try {
      return await readFile(`${this.procRoot}/${path}`, 'utf8');
    } catch (err) {
      throw new ProviderUnavailableError(category, reason(err));
    }
  }
}
