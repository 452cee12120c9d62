import type { ExportSnapshot, SystemInfo } from '@sysvitals/shared';

export interface JsonExport {
  system_info: {
    system: string;
    node: string;
    release: string;
    machine: string;
    processor: string;
    cpu_count: number;
    boot_time: string;
  };
  timestamps: string[];
  cpu_data: Array<Array<number | null>>;
  memory_data: Array<number | null>;
  network_data: {
    sent: Array<number | null>;
    received: Array<number | null>;
  };
}

function gapsToNull(values: number[]): Array<number | null> {
  return values.map((value) => (Number.isFinite(value) ? value : null));
}

export function toJsonExport(snapshot: ExportSnapshot, info: SystemInfo): JsonExport {
  const cores = Object.keys(snapshot.cpuSeries)
    .map(Number)
    .sort((a, b) => a - b);

  return {
    system_info: {
      system: info.platform,
      node: info.hostname,
      release: info.release,
      machine: info.arch,
      processor: info.cpuModel,
      cpu_count: info.cpuCount,
      boot_time: info.bootTime.toISOString(),
    },
    timestamps: snapshot.timestamps.map((ts) => ts.toISOString()),
    cpu_data: cores.map((core) => gapsToNull(snapshot.cpuSeries[core])),
    memory_data: gapsToNull(snapshot.memorySeries),
    network_data: {
      sent: gapsToNull(snapshot.networkSeries.sent),
      received: gapsToNull(snapshot.networkSeries.received),
    },
  };
}

export function toJson(snapshot: ExportSnapshot, info: SystemInfo): string {
  return `${JSON.stringify(toJsonExport(snapshot, info), null, 2)}\n`;
}
