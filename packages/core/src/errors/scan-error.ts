/**
 * Scan Errors
 *
 * Structured errors for the failures that abort a scan before it starts:
 * bad input, a missing root directory, or a scan already running.
 * Per-file problems never surface here; they are logged and skipped.
 */

export enum ScanErrorCode {
  // Caller input
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  MISSING_REQUIRED_PARAM = 'MISSING_REQUIRED_PARAM',
  ROOT_NOT_FOUND = 'ROOT_NOT_FOUND',

  // Runner state
  SCAN_IN_PROGRESS = 'SCAN_IN_PROGRESS',
}

export interface RecoveryHint {
  suggestion: string;
}

export interface ScanErrorDetails {
  code: ScanErrorCode;
  message: string;
  details?: Record<string, unknown> | undefined;
  recovery?: RecoveryHint | undefined;
}

export class ScanError extends Error {
  public readonly code: ScanErrorCode;
  public readonly details?: Record<string, unknown> | undefined;
  public readonly recovery?: RecoveryHint | undefined;

  constructor(errorDetails: ScanErrorDetails) {
    super(errorDetails.message);
    this.name = 'ScanError';
    this.code = errorDetails.code;
    this.details = errorDetails.details;
    this.recovery = errorDetails.recovery;
  }
}

/**
 * Error factory functions for common errors
 */
export const Errors = {
  invalidArgument(param: string, reason: string, suggestion?: string): ScanError {
    return new ScanError({
      code: ScanErrorCode.INVALID_ARGUMENT,
      message: `Invalid argument '${param}': ${reason}`,
      details: { param, reason },
      recovery: suggestion ? { suggestion } : undefined,
    });
  },

  missingRequired(param: string): ScanError {
    return new ScanError({
      code: ScanErrorCode.MISSING_REQUIRED_PARAM,
      message: `Missing required parameter: ${param}`,
      details: { param },
      recovery: {
        suggestion: `Provide the '${param}' parameter`,
      },
    });
  },

  rootNotFound(rootDir: string): ScanError {
    return new ScanError({
      code: ScanErrorCode.ROOT_NOT_FOUND,
      message: `Not a directory: ${rootDir}`,
      details: { rootDir },
      recovery: {
        suggestion: 'Point the scan at a local checkout of the codebase',
      },
    });
  },

  scanInProgress(): ScanError {
    return new ScanError({
      code: ScanErrorCode.SCAN_IN_PROGRESS,
      message: 'A scan is already running',
      recovery: {
        suggestion: 'Wait for the active scan to finish or cancel it',
      },
    });
  },
};

export function isScanError(error: unknown): error is ScanError {
  return error instanceof ScanError;
}
