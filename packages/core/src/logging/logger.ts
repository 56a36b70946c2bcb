/**
 * Logger
 *
 * Warnings about unreadable files and progress chatter go through this
 * interface so embedders can redirect or silence them.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Emit debug messages (default: false) */
  verbose?: boolean;
  /** Prefix for every line */
  prefix?: string;
}

/**
 * Logger that writes to the console. Everything goes to stderr so that
 * results written to stdout stay machine-readable.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const prefix = options.prefix ? `${options.prefix} ` : '';
  return {
    debug(message) {
      if (options.verbose) {
        console.error(`${prefix}${message}`);
      }
    },
    info(message) {
      console.error(`${prefix}${message}`);
    },
    warn(message) {
      console.warn(`${prefix}Warning: ${message}`);
    },
    error(message) {
      console.error(`${prefix}Error: ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
