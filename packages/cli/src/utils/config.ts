import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { Command } from 'commander';
import {
  ConfigValidationError,
  VITALS_CONFIG_FILES,
  VITALS_HOME,
  parseConfig,
  parseIntervalSeconds,
} from '@sysvitals/shared';
import type { VitalsConfig } from '@sysvitals/shared';

/** Options shared by every command that starts an engine. */
export interface ConfigFlags {
  config?: string;
  interval?: string;
  history?: string;
  notifications?: boolean;
  logLevel?: string;
}

export interface ResolvedConfig {
  config: VitalsConfig;
  /** Path of the file that was read, or null when only defaults and flags apply. */
  source: string | null;
}

/**
 * First config file found in `cwd`, then in the vitals home directory.
 */
export function findConfigFile(cwd: string = process.cwd(), home: string = VITALS_HOME): string | null {
  for (const dir of [cwd, home]) {
    for (const file of VITALS_CONFIG_FILES) {
      const candidate = join(dir, file);
      if (existsSync(candidate)) return candidate;
    }
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError([`${path}: ${msg}`]);
  }
  if (!isRecord(parsed)) {
    throw new ConfigValidationError([`${path}: expected a JSON object`]);
  }
  return parsed;
}

function flagsToConfig(flags: ConfigFlags): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (flags.interval !== undefined) {
    overrides.interval_seconds = parseIntervalSeconds(flags.interval);
  }
  if (flags.history !== undefined) {
    overrides.history_capacity = Number(flags.history);
  }
  // commander reports `true` for a --no-* flag that was not given
  if (flags.notifications === false) {
    overrides.notifications_enabled = false;
  }
  if (flags.logLevel !== undefined) {
    overrides.log_level = flags.logLevel;
  }
  return overrides;
}

/**
 * Defaults, then the config file, then command-line flags.
 */
export function resolveConfig(
  flags: ConfigFlags = {},
  cwd: string = process.cwd(),
  home: string = VITALS_HOME,
): ResolvedConfig {
  const source = flags.config ? resolve(cwd, flags.config) : findConfigFile(cwd, home);
  if (flags.config && source && !existsSync(source)) {
    throw new ConfigValidationError([`${source}: file not found`]);
  }

  const fromFile = source ? readConfigFile(source) : {};
  let overrides: Record<string, unknown>;
  try {
    overrides = flagsToConfig(flags);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError([`--interval: ${msg}`]);
  }

  return {
    config: parseConfig({ ...fromFile, ...overrides }),
    source,
  };
}

export function addConfigOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Config file (default: vitals.config.json in cwd or VITALS_HOME)')
    .option('-i, --interval <duration>', 'Sampling interval: seconds or a duration such as 500ms')
    .option('--history <points>', 'Points of history to keep per series')
    .option('--no-notifications', 'Track alerts without delivering them')
    .option('--log-level <level>', 'trace, debug, info, warn, error or fatal');
}
