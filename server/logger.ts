/**
 * Console logging with a component tag and a process-wide level.
 *
 *   const log = createLogger('Acquisition');
 *   log.warn('arm failed');   // -> [Acquisition] arm failed
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  verbose: 3,
  debug: 4,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  verbose(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel];

  return {
    error(message, ...details) {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.log(prefix, message, ...details);
    },
    verbose(message, ...details) {
      if (enabled('verbose')) console.log(prefix, message, ...details);
    },
    debug(message, ...details) {
      if (enabled('debug')) console.debug(prefix, message, ...details);
    },
  };
}
