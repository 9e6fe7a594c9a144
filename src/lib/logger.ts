/**
 * Scoped console logger.
 *
 * Every line is prefixed with the component scope, e.g. `[Client] Connected`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const prefix = `[${scope}]`;
  const enabled = (candidate: LogLevel) => LOG_LEVELS.indexOf(candidate) >= threshold;

  return {
    debug: (...args) => {
      if (enabled('debug')) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (enabled('info')) console.log(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled('warn')) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled('error')) console.error(prefix, ...args);
    },
  };
}
