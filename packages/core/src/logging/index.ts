export type { Logger, ConsoleLoggerOptions } from './logger.js';
export { createConsoleLogger, silentLogger } from './logger.js';
