/**
 * Tests for the JSON writer
 */

import { describe, it, expect } from 'vitest';
import type { Evidence } from 'tabletrace-core';
import type { ScanStats } from '../../services/scan-runner.js';
import { formatJson, toJsonReport } from '../json-writer.js';

const evidence: Evidence = {
  file: 'db/schema.rb',
  line: 8,
  table: 'orders',
  column: 'reward_id',
  kind: 'schema_column',
  snippet: 't.bigint "reward_id"',
  confidence: 'HIGH',
  schemaVerified: true,
  columnDatatype: 'bigint',
};

const stats: ScanStats = {
  filesScanned: 3,
  rawHits: 1,
  afterDedup: 1,
  afterValidation: 1,
  afterFilter: 1,
  scannerHits: { schema: 1 },
  durationMs: 12,
};

describe('toJsonReport', () => {
  it('should describe each result by its kind', () => {
    const report = toJsonReport([evidence], stats);

    expect(report.results).toEqual([
      { ...evidence, description: 'Integer column named after the table in schema.rb' },
    ]);
    expect(report.stats).toBe(stats);
  });
});

describe('formatJson', () => {
  it('should pretty-print with a trailing newline', () => {
    const output = formatJson([], stats);

    expect(output.endsWith('}\n')).toBe(true);
    expect(output.split('\n')[1]).toBe('  "results": [],');
    expect(JSON.parse(output)).toEqual({ results: [], stats });
  });
});
