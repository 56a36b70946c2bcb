export { deduplicateEvidence } from './deduplicator.js';
export { excludeReverseAssociations, filterByKnownTables } from './filters.js';
export { validateAgainstSchema, type ValidationMode } from './validator.js';
export { rankEvidence, toRelativePath, type RankOptions } from './ranker.js';
export {
  postProcess,
  type PostProcessOptions,
  type PostProcessCounts,
  type PostProcessResult,
} from './post-processor.js';
