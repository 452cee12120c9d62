import { createLogger, setDefaultLogger } from '@sysvitals/shared';
import type { LogLevel } from '@sysvitals/shared';

/**
 * Route every component logger away from stdout, which belongs to the
 * command's own output. A path gets plain JSON lines; stderr gets
 * pretty output when it is a terminal.
 */
export function setupLogging(level: LogLevel, destination: string | number = 2): void {
  const pretty = destination === 2 && process.stderr.isTTY === true;
  setDefaultLogger(createLogger({ level, pretty, destination }));
}
