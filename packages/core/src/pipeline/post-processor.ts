/**
 * Post-Processor
 *
 * Runs raw scanner output through every stage in order and reports how
 * many records survived each one.
 */

import type { Confidence, Evidence } from '../types/evidence.js';
import type { SchemaIndex } from '../types/schema.js';
import { deduplicateEvidence } from './deduplicator.js';
import { excludeReverseAssociations, filterByKnownTables } from './filters.js';
import { rankEvidence } from './ranker.js';
import { validateAgainstSchema } from './validator.js';

export interface PostProcessOptions {
  tableName: string;
  schema: SchemaIndex;
  strict: boolean;
  minConfidence: Confidence;
  rootDir?: string | undefined;
}

export interface PostProcessCounts {
  afterDedup: number;
  afterValidation: number;
  afterFilter: number;
}

export interface PostProcessResult {
  evidence: Evidence[];
  counts: PostProcessCounts;
}

export function postProcess(raw: readonly Evidence[], options: PostProcessOptions): PostProcessResult {
  let evidence = deduplicateEvidence(raw);
  const afterDedup = evidence.length;

  evidence = excludeReverseAssociations(evidence);
  evidence = filterByKnownTables(evidence, options.schema.tables, options.tableName);

  evidence = validateAgainstSchema(evidence, options.schema.columns, options.strict ? 'strict' : 'lenient');
  const afterValidation = evidence.length;

  evidence = rankEvidence(evidence, { minConfidence: options.minConfidence, rootDir: options.rootDir });

  return {
    evidence,
    counts: { afterDedup, afterValidation, afterFilter: evidence.length },
  };
}
