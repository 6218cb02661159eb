export type LogLevel = 'silent' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'info', 'debug'];

/**
 * Console logger. `info` and `debug` go to stdout and follow the level,
 * `warn` and `error` always go to stderr.
 */
export interface Logger {
  readonly level: LogLevel;
  info(message: string): void;
  debug(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(level: LogLevel = 'info'): Logger {
  const enabled = level === 'info' || level === 'debug';
  const debugEnabled = level === 'debug';

  return {
    level,

    info(message: string) {
      if (enabled) {
        console.log(message);
      }
    },

    debug(message: string) {
      if (debugEnabled) {
        console.log(`[debug] ${message}`);
      }
    },

    warn(message: string) {
      console.warn(message);
    },

    error(message: string) {
      console.error(message);
    },
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((l) => l === value);
}
