/**
 * Tagged console logging
 * Every line is prefixed with `[tag]`; debug output only while the DEBUG_LOGS flag is on.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface LoggerOptions {
  debug?: boolean | (() => boolean);
  sink?: Pick<Console, 'log' | 'warn' | 'error'>;
}

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? console;
  const debugOn = () =>
    typeof options.debug === 'function' ? options.debug() : options.debug === true;
  const prefix = `[${tag}]`;

  return {
    debug(message, ...details) {
      if (debugOn()) sink.log(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      sink.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      sink.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      sink.error(`${prefix} ${message}`, ...details);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
