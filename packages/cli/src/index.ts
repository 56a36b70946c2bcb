/**
 * tabletrace-cli - Command-line interface for tabletrace
 */

export const VERSION = '0.1.0';

export {
  ScanRunner,
  createScanRunner,
  type ScanPhase,
  type ScanObserver,
  type ScanStats,
  type ScanOutcome,
  type ScanRunnerConfig,
} from './services/scan-runner.js';
export * from './output/index.js';
export { scanCommand, scanAction, type ScanCommandOptions, type OutputFormat } from './commands/index.js';
