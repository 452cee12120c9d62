import { writeFileSync } from 'node:fs';
import { extname, resolve } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { MonitorEngine, OsMetricsProvider } from '@sysvitals/core';
import type { TickResult } from '@sysvitals/shared';
import { toCsv } from '../exporters/csv.js';
import { toJson } from '../exporters/json.js';
import { addConfigOptions, resolveConfig, type ConfigFlags } from '../utils/config.js';
import { setupLogging } from '../utils/logging.js';

export type ExportFormat = 'csv' | 'json';

interface ExportOptions extends ConfigFlags {
  ticks: string;
  format?: string;
  output?: string;
}

/** Explicit --format wins; otherwise the output file's extension; otherwise CSV. */
export function resolveFormat(format: string | undefined, output: string | undefined): ExportFormat {
  const chosen = format ?? (output && extname(output).toLowerCase() === '.json' ? 'json' : 'csv');
  if (chosen !== 'csv' && chosen !== 'json') {
    throw new Error(`Unknown export format "${chosen}" (expected csv or json)`);
  }
  return chosen;
}

export const exportCommand = addConfigOptions(new Command('export'))
  .option('-n, --ticks <count>', 'Number of ticks to collect', '10')
  .option('-f, --format <format>', 'csv or json (default: from --output extension, else csv)')
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .description('Collect a run of samples and export the history as CSV or JSON')
  .action(async (options: ExportOptions) => {
    const spinner = ora('Collecting samples...');

    try {
      const ticks = parseInt(options.ticks, 10);
      if (!Number.isInteger(ticks) || ticks < 1) {
        throw new Error(`--ticks must be a positive integer, got "${options.ticks}"`);
      }
      const format = resolveFormat(options.format, options.output);
      const { config } = resolveConfig(options);
      setupLogging(config.log_level);

      const provider = new OsMetricsProvider();
      const engine = new MonitorEngine(
        { ...config, history_capacity: Math.max(config.history_capacity, ticks) },
        { provider },
      );

      spinner.start();
      const collected = new Promise<void>((resolveCollected) => {
        engine.register({
          name: 'export-progress',
          onTick: (result: TickResult) => {
            spinner.text = `Collecting samples... ${result.sample.tick}/${ticks}`;
            if (result.sample.tick >= ticks) resolveCollected();
          },
        });
      });
      engine.start();
      // wait() rejects if the sampling loop dies before enough ticks arrive
      await Promise.race([collected, engine.wait()]);
      await engine.stop();

      const snapshot = engine.exportSnapshot();
      const body = format === 'json' ? toJson(snapshot, provider.getSystemInfo()) : toCsv(snapshot);

      if (options.output) {
        const path = resolve(options.output);
        writeFileSync(path, body);
        spinner.succeed(`Exported ${snapshot.timestamps.length} samples to ${chalk.cyan(path)}`);
      } else {
        spinner.stop();
        process.stdout.write(body);
      }
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      spinner.fail(chalk.red(`Export failed: ${msg}`));
      process.exitCode = 1;
    }
  });
