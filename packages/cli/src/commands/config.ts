import { Command } from 'commander';
import chalk from 'chalk';
import { addConfigOptions, resolveConfig, type ConfigFlags } from '../utils/config.js';

export const configCommand = addConfigOptions(new Command('config'))
  .description('Print the configuration after defaults, config file and flags are applied')
  .action((options: ConfigFlags) => {
    try {
      const { config, source } = resolveConfig(options);
      console.log(chalk.gray(`# source: ${source ?? 'defaults only'}`));
      console.log(JSON.stringify(config, null, 2));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Error: ${msg}`));
      process.exitCode = 1;
    }
  });
