import { setTimeout as delay } from 'node:timers/promises';
import { Command } from 'commander';
import chalk from 'chalk';
import { MonitorEngine, OsMetricsProvider } from '@sysvitals/core';
import {
  renderCpuTable,
  renderDiskTable,
  renderMemoryTable,
  renderSystemInfo,
} from '../ui/Dashboard.js';
import { addConfigOptions, resolveConfig, type ConfigFlags } from '../utils/config.js';
import { setupLogging } from '../utils/logging.js';

interface InfoOptions extends ConfigFlags {
  json?: boolean;
}

/** CPU load is measured over this window. */
const CPU_WINDOW_MS = 500;

export const infoCommand = addConfigOptions(new Command('info'))
  .option('--json', 'Output as JSON')
  .description('Show a one-shot summary of the system and its current usage')
  .action(async (options: InfoOptions) => {
    try {
      const { config } = resolveConfig(options);
      setupLogging(config.log_level);

      const provider = new OsMetricsProvider();
      const engine = new MonitorEngine(config, { provider });
      await delay(CPU_WINDOW_MS);
      const result = await engine.tickOnce();
      const info = provider.getSystemInfo();

      if (!result) {
        throw new Error('No sample was collected');
      }

      if (options.json) {
        console.log(JSON.stringify({ system: info, sample: result.sample, alerts: result.alertStates }, null, 2));
        return;
      }

      console.log(renderSystemInfo(info));
      console.log(chalk.bold('\n  CPU Usage'));
      console.log(renderCpuTable(result.sample.cpuPerCore));
      console.log(chalk.bold('\n  Memory Usage'));
      console.log(renderMemoryTable(result.sample.memory));
      console.log(chalk.bold('\n  Disk Usage'));
      console.log(renderDiskTable(result.sample.disks));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Error: ${msg}`));
      process.exitCode = 1;
    }
  });
