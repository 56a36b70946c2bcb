/**
 * Scan Configuration
 *
 * Validates caller input before any file is touched and derives the name
 * forms every scanner needs.
 */

import { z } from 'zod';
import { Errors, type ScanError } from '../errors/scan-error.js';
import { singularize } from '../inflection/inflector.js';
import type { Confidence } from '../types/evidence.js';

// ============================================================================
// Schema
// ============================================================================

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const identifier = (label: string) =>
  z.string().trim().regex(IDENTIFIER, `${label} must be a plain identifier`);

export const scanRequestSchema = z.object({
  /** Local checkout to scan */
  rootDir: z.string().trim().min(1, 'rootDir must not be empty'),
  /** Table under investigation */
  tableName: identifier('tableName'),
  /** Explicit foreign key column (default: {singular}_id) */
  foreignKey: identifier('foreignKey').optional(),
  /** Primary key of the target; the foreign key becomes {singular}_{primaryKey} */
  primaryKey: identifier('primaryKey').optional(),
  minConfidence: z.enum(['HIGH', 'MEDIUM', 'LOW']).default('LOW'),
  /** Drop evidence whose column is missing from the schema instead of downgrading it */
  strict: z.boolean().default(false),
  /** Extra directory names to skip, on top of the defaults */
  ignoreDirectories: z.array(z.string().trim().min(1)).default([]),
});

export type ScanRequest = z.input<typeof scanRequestSchema>;

export interface ScanConfig {
  rootDir: string;
  tableName: string;
  singular: string;
  foreignKey: string;
  minConfidence: Confidence;
  strict: boolean;
  ignoreDirectories: string[];
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Foreign key column for a table: an explicit override wins, then the
 * primary key name, then the Rails default.
 */
export function resolveForeignKey(
  tableName: string,
  options: { foreignKey?: string | undefined; primaryKey?: string | undefined } = {}
): string {
  const singular = singularize(tableName);
  if (options.foreignKey) {
    return options.foreignKey;
  }
  if (options.primaryKey) {
    return `${singular}_${options.primaryKey}`;
  }
  return `${singular}_id`;
}

function toScanError(error: z.ZodError): ScanError {
  const issue = error.issues[0];
  if (!issue) {
    return Errors.invalidArgument('request', 'validation failed');
  }
  const param = issue.path.join('.') || 'request';
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return Errors.missingRequired(param);
  }
  if (issue.code === 'invalid_enum_value') {
    return Errors.invalidArgument(
      param,
      `expected one of ${issue.options.join(', ')}`,
      `Use one of: ${issue.options.join(', ')}`
    );
  }
  return Errors.invalidArgument(param, issue.message);
}

/**
 * Validate a scan request.
 *
 * @throws ScanError with INVALID_ARGUMENT or MISSING_REQUIRED_PARAM
 */
export function parseScanRequest(input: unknown): ScanConfig {
  const parsed = scanRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw toScanError(parsed.error);
  }

  const request = parsed.data;
  return {
    rootDir: request.rootDir,
    tableName: request.tableName,
    singular: singularize(request.tableName),
    foreignKey: resolveForeignKey(request.tableName, request),
    minConfidence: request.minConfidence,
    strict: request.strict,
    ignoreDirectories: request.ignoreDirectories,
  };
}
