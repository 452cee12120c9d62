import { join } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { MonitorEngine, OsMetricsProvider } from '@sysvitals/core';
import { VITALS_HOME } from '@sysvitals/shared';
import { TerminalRenderer } from '../ui/TerminalRenderer.js';
import { addConfigOptions, resolveConfig, type ConfigFlags } from '../utils/config.js';
import { setupLogging } from '../utils/logging.js';

interface MonitOptions extends ConfigFlags {
  logFile: string;
}

const CTRL_C = '\u0003';

/** Raw-mode key listener; returns the function that undoes it. */
function listenForKeys(onKey: (key: string) => void): () => void {
  const stdin = process.stdin;
  if (!stdin.isTTY) return () => undefined;

  const handler = (data: Buffer): void => {
    onKey(data.toString('utf8'));
  };
  stdin.setRawMode(true);
  stdin.resume();
  stdin.on('data', handler);

  return () => {
    stdin.off('data', handler);
    stdin.setRawMode(false);
    stdin.pause();
  };
}

export const monitCommand = addConfigOptions(new Command('monit'))
  .option('--log-file <path>', 'Where to write logs while the dashboard is up', join(VITALS_HOME, 'vitals.log'))
  .description('Live terminal dashboard of CPU, memory, disk and network usage')
  .action(async (options: MonitOptions) => {
    let engine: MonitorEngine;
    try {
      const { config } = resolveConfig(options);
      setupLogging(config.log_level, options.logFile);
      const provider = new OsMetricsProvider();
      engine = new MonitorEngine(config, { provider });
      engine.register(new TerminalRenderer(process.stdout, provider.getSystemInfo()));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Error: ${msg}`));
      process.exitCode = 1;
      return;
    }

    let stopping: Promise<void> | null = null;
    let stopListening: () => void = () => undefined;
    const onSignal = (): void => {
      void shutdown();
    };
    const shutdown = (): Promise<void> => {
      stopping ??= engine.stop().finally(() => {
        stopListening();
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
        process.stdout.write('\n');
      });
      return stopping;
    };

    stopListening = listenForKeys((key) => {
      if (key === 'r') {
        engine.resetHistory();
      } else if (key === 'q' || key === CTRL_C) {
        void shutdown();
      }
    });
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    engine.start();
    try {
      await engine.wait();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Monitoring stopped: ${msg}`));
      process.exitCode = 1;
    }
    await shutdown();
  });
