/**
 * Minimal leveled logger over `console`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Logger writing debug and info to stdout, warnings and errors to stderr.
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (messageLevel: LogLevel): boolean => LEVEL_ORDER[messageLevel] >= threshold;
  return {
    debug: (message) => {
      if (enabled('debug')) console.debug(message);
    },
    info: (message) => {
      if (enabled('info')) console.log(message);
    },
    warn: (message) => {
      if (enabled('warn')) console.warn(`⚠️  ${message}`);
    },
    error: (message) => {
      if (enabled('error')) console.error(`❌ ${message}`);
    },
  };
}

export const silentLogger: Logger = createConsoleLogger('silent');
