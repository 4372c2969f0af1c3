/**
 * @forgeloop/core — Logger
 *
 * Scoped console logging gated by LOG_LEVEL.
 */

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVEL_ORDER: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

let activeLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

const enabled = (level: LogLevel): boolean =>
  LEVEL_ORDER[level] <= LEVEL_ORDER[activeLevel];

/**
 * Create a logger whose lines are prefixed with `[scope]`.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    error(message, ...details) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...details);
    },
    debug(message, ...details) {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details);
    },
  };
}
