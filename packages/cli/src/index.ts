#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { VITALS_VERSION } from '@sysvitals/shared';
import { monitCommand } from './commands/monit.js';
import { infoCommand } from './commands/info.js';
import { exportCommand } from './commands/export.js';
import { configCommand } from './commands/config.js';

const program = new Command();

program
  .name('vitals')
  .version(VITALS_VERSION, '-v, --version')
  .description(chalk.bold('sysvitals') + ': CPU, memory, disk and network telemetry for your terminal')
  .addCommand(monitCommand)
  .addCommand(infoCommand)
  .addCommand(exportCommand)
  .addCommand(configCommand);

// Default to the live dashboard when no command is given
program.action(async () => {
  await monitCommand.parseAsync([], { from: 'user' });
});

await program.parseAsync(process.argv);
