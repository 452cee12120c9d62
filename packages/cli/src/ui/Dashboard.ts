import Table from 'cli-table3';
import chalk from 'chalk';
import type {
  AlertState,
  DerivedRates,
  DiskReading,
  MemoryReading,
  NetworkCounters,
  SystemInfo,
  TickResult,
} from '@sysvitals/shared';
import {
  DISK_BANDS,
  alertBadge,
  formatBytes,
  formatPercentDisplay,
  formatRateDisplay,
  formatTimestamp,
  formatUptime,
  sparkline,
  usageBar,
} from '../utils/format.js';

const UNAVAILABLE = chalk.gray('unavailable');

function newTable(head: string[]): Table.Table {
  return new Table({
    head: head.map((h) => chalk.bold(h)),
    style: {
      head: [],
      border: ['gray'],
    },
  });
}

export function renderSystemInfo(info: SystemInfo, now: Date = new Date()): string {
  const uptimeSeconds = (now.getTime() - info.bootTime.getTime()) / 1000;
  const lines = [
    chalk.bold.blue('  System Information'),
    `  System:      ${info.platform} ${info.release}`,
    `  Node Name:   ${info.hostname}`,
    `  Machine:     ${info.arch}`,
    `  Processor:   ${info.cpuModel} (${info.cpuCount} cores)`,
    `  Boot Time:   ${formatTimestamp(info.bootTime)}`,
    `  Uptime:      ${formatUptime(uptimeSeconds)}`,
  ];
  return lines.join('\n');
}

export function renderCpuTable(perCore: number[] | null, meanHistory: number[] = []): string {
  const table = newTable(['Core', 'Usage %', 'Graph']);
  if (!perCore) {
    table.push([{ colSpan: 3, content: UNAVAILABLE }]);
    return table.toString();
  }

  perCore.forEach((percent, core) => {
    table.push([`Core ${core}`, formatPercentDisplay(percent), usageBar(percent)]);
  });
  if (meanHistory.length > 0) {
    table.push(['History', formatPercentDisplay(meanHistory[meanHistory.length - 1]), sparkline(meanHistory, 100)]);
  }
  return table.toString();
}

export function renderMemoryTable(memory: MemoryReading | null): string {
  const table = newTable(['Metric', 'Value']);
  if (!memory) {
    table.push([{ colSpan: 2, content: UNAVAILABLE }]);
    return table.toString();
  }

  table.push(
    ['Total', formatBytes(memory.total)],
    ['Available', formatBytes(memory.available)],
    ['Used', formatBytes(memory.used)],
    ['Free', formatBytes(memory.free)],
    ['Usage', `${formatPercentDisplay(memory.percent)} ${usageBar(memory.percent)}`],
  );
  return table.toString();
}

export function renderDiskTable(disks: DiskReading[] | null): string {
  const table = newTable(['Device', 'Mount', 'Type', 'Total', 'Used', 'Free', 'Usage %']);
  if (!disks) {
    table.push([{ colSpan: 7, content: UNAVAILABLE }]);
    return table.toString();
  }

  for (const disk of disks) {
    table.push([
      disk.device,
      disk.mount,
      disk.fstype,
      formatBytes(disk.total),
      formatBytes(disk.used),
      formatBytes(disk.free),
      formatPercentDisplay(disk.percent, DISK_BANDS),
    ]);
  }
  return table.toString();
}

function formatPacketRate(value: number | undefined): string {
  return value === undefined ? chalk.gray('-') : `${value.toFixed(2)}/s`;
}

export interface NetworkHistory {
  sent: number[];
  received: number[];
}

export function renderNetworkTable(
  network: NetworkCounters | null,
  rates: DerivedRates | null,
  history: NetworkHistory = { sent: [], received: [] },
): string {
  const table = newTable(['Metric', 'Total', 'Per Second', 'History']);
  if (!network) {
    table.push([{ colSpan: 4, content: UNAVAILABLE }]);
    return table.toString();
  }

  table.push(
    ['Bytes Sent', formatBytes(network.bytesSent), formatRateDisplay(rates?.bytesSentPerSec), sparkline(history.sent)],
    [
      'Bytes Received',
      formatBytes(network.bytesRecv),
      formatRateDisplay(rates?.bytesRecvPerSec),
      sparkline(history.received),
    ],
    ['Packets Sent', String(network.packetsSent), formatPacketRate(rates?.packetsSentPerSec), ''],
    ['Packets Received', String(network.packetsRecv), formatPacketRate(rates?.packetsRecvPerSec), ''],
  );
  return table.toString();
}

export function renderAlerts(states: AlertState[]): string {
  if (states.length === 0) return chalk.gray('  No alert thresholds configured');

  const table = newTable(['Quantity', 'Status', 'Enter', 'Clear', 'Since']);
  for (const state of states) {
    table.push([
      state.quantity,
      alertBadge(state),
      `>${state.enter}%`,
      `<${state.clear}%`,
      state.since ? formatTimestamp(state.since) : chalk.gray('-'),
    ]);
  }
  return table.toString();
}

export function renderDashboard(result: TickResult, info: SystemInfo | null, now: Date = new Date()): string {
  const { sample, rates, series } = result;
  const sections: string[] = [];

  if (info) {
    sections.push(renderSystemInfo(info, now));
  }
  sections.push(chalk.bold('  CPU Usage'), renderCpuTable(sample.cpuPerCore, series.cpuMean));
  sections.push(chalk.bold('  Memory Usage'), renderMemoryTable(sample.memory));
  sections.push(chalk.bold('  Disk Usage'), renderDiskTable(sample.disks));
  sections.push(
    chalk.bold('  Network Statistics'),
    renderNetworkTable(sample.network, rates, { sent: series.networkSent, received: series.networkReceived }),
  );
  sections.push(chalk.bold('  Alerts'), renderAlerts(result.alertStates));
  sections.push(
    chalk.gray(`  Tick ${sample.tick} at ${formatTimestamp(sample.timestamp)}  |  r: reset history  |  Ctrl+C to exit`),
  );

  return sections.join('\n');
}
