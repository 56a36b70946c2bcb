import { describe, it, expect } from 'vitest';
import { parseScanRequest, resolveForeignKey } from './scan-config.js';
import { ScanError, ScanErrorCode } from '../errors/scan-error.js';

function captureError(fn: () => unknown): ScanError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ScanError) return error;
    throw error;
  }
  throw new Error('expected a ScanError');
}

describe('resolveForeignKey', () => {
  it('should default to the singular with _id', () => {
    expect(resolveForeignKey('rewards')).toBe('reward_id');
    expect(resolveForeignKey('categories')).toBe('category_id');
  });

  it('should derive from a primary key name', () => {
    expect(resolveForeignKey('rewards', { primaryKey: 'uuid' })).toBe('reward_uuid');
  });

  it('should prefer an explicit foreign key', () => {
    expect(resolveForeignKey('rewards', { foreignKey: 'prize_id', primaryKey: 'uuid' })).toBe('prize_id');
  });
});

describe('parseScanRequest', () => {
  it('should apply defaults', () => {
    expect(parseScanRequest({ rootDir: '/repo', tableName: 'rewards' })).toEqual({
      rootDir: '/repo',
      tableName: 'rewards',
      singular: 'reward',
      foreignKey: 'reward_id',
      minConfidence: 'LOW',
      strict: false,
      ignoreDirectories: [],
    });
  });

  it('should keep explicit options', () => {
    const config = parseScanRequest({
      rootDir: '/repo',
      tableName: 'rewards',
      foreignKey: 'legacy_reward_ref',
      minConfidence: 'MEDIUM',
      strict: true,
      ignoreDirectories: ['spec'],
    });

    expect(config.foreignKey).toBe('legacy_reward_ref');
    expect(config.minConfidence).toBe('MEDIUM');
    expect(config.strict).toBe(true);
    expect(config.ignoreDirectories).toEqual(['spec']);
  });

  it('should report a missing table name', () => {
    const error = captureError(() => parseScanRequest({ rootDir: '/repo' }));

    expect(error.code).toBe(ScanErrorCode.MISSING_REQUIRED_PARAM);
    expect(error.details).toEqual({ param: 'tableName' });
  });

  it('should reject a table name that is not an identifier', () => {
    const error = captureError(() => parseScanRequest({ rootDir: '/repo', tableName: 'rewards; drop' }));

    expect(error.code).toBe(ScanErrorCode.INVALID_ARGUMENT);
    expect(error.message).toBe("Invalid argument 'tableName': tableName must be a plain identifier");
  });

  it('should reject an unknown confidence level', () => {
    const error = captureError(() =>
      parseScanRequest({ rootDir: '/repo', tableName: 'rewards', minConfidence: 'SOMETIMES' })
    );

    expect(error.code).toBe(ScanErrorCode.INVALID_ARGUMENT);
    expect(error.recovery?.suggestion).toBe('Use one of: HIGH, MEDIUM, LOW');
  });

  it('should reject an empty root directory', () => {
    const error = captureError(() => parseScanRequest({ rootDir: '  ', tableName: 'rewards' }));

    expect(error.code).toBe(ScanErrorCode.INVALID_ARGUMENT);
    expect(error.details).toEqual({ param: 'rootDir', reason: 'rootDir must not be empty' });
  });
});
