import { homedir } from 'node:os';
import { join } from 'node:path';

export const VITALS_HOME = process.env.VITALS_HOME || join(homedir(), '.sysvitals');

export const VITALS_CONFIG_FILES = ['vitals.config.json', '.vitalsrc.json'];

export const DEFAULT_INTERVAL_SECONDS = 1;
export const MIN_INTERVAL_SECONDS = 0.1;
export const DEFAULT_HISTORY_CAPACITY = 60;
export const MAX_PROVIDER_TIMEOUT_MS = 5000;
export const DEFAULT_MAX_CONSUMER_FAILURES = 5;

export const DEFAULT_CPU_THRESHOLD = { enter: 90, clear: 70 } as const;
export const DEFAULT_MEMORY_THRESHOLD = { enter: 85, clear: 75 } as const;

export const VITALS_VERSION = '0.1.0';
