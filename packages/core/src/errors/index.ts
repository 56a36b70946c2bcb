export { ScanError, ScanErrorCode, Errors, isScanError } from './scan-error.js';
export type { RecoveryHint, ScanErrorDetails } from './scan-error.js';
