/**
 * Commands module exports
 */

export { scanCommand, scanAction, type ScanCommandOptions, type OutputFormat } from './scan.js';
