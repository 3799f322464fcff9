/**
 * Level-gated console logging.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: ReadonlyArray<LogLevel> = Object.freeze([
  'silent',
  'error',
  'warn',
  'info',
  'debug',
]);

export interface Logger {
  readonly level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Create a logger that forwards messages at or above `level` to the
 * matching console method, prefixed with `[mazewalk]`.
 */
export function createLogger(level: LogLevel = 'warn'): Logger {
  const rank = LOG_LEVELS.indexOf(level);
  const enabled = (at: LogLevel): boolean => rank >= LOG_LEVELS.indexOf(at);

  return {
    level,
    error(message) {
      if (enabled('error')) console.error(`[mazewalk] ${message}`);
    },
    warn(message) {
      if (enabled('warn')) console.warn(`[mazewalk] ${message}`);
    },
    info(message) {
      if (enabled('info')) console.info(`[mazewalk] ${message}`);
    },
    debug(message) {
      if (enabled('debug')) console.debug(`[mazewalk] ${message}`);
    },
  };
}
