import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
  /** File path or file descriptor (2 for stderr). Defaults to stdout. */
  destination?: string | number;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(options: CreateLoggerOptions = {}): pino.Logger {
  const { name = 'sysvitals', level = 'info', pretty = false, destination } = options;

  const transport = pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: destination ?? 1,
        },
      }
    : undefined;

  const dest =
    destination !== undefined && !pretty
      ? pino.destination({ dest: destination, sync: false, mkdir: typeof destination === 'string' })
      : undefined;

  return pino(
    {
      name,
      level,
      transport,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    dest,
  );
}

let defaultLogger: pino.Logger | null = null;

export function getLogger(component?: string): pino.Logger {
  if (!defaultLogger) {
    const envLevel = process.env.VITALS_LOG_LEVEL;
    defaultLogger = createLogger({
      level: isLogLevel(envLevel) ? envLevel : 'info',
      pretty: process.env.NODE_ENV !== 'production',
    });
  }
  return component ? defaultLogger.child({ component }) : defaultLogger;
}

export function setDefaultLogger(logger: pino.Logger): void {
  defaultLogger = logger;
}
