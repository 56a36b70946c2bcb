export type { Confidence, ReferenceKind, Evidence } from './evidence.js';
export {
  CONFIDENCE_LEVELS,
  REFERENCE_KIND_DESCRIPTIONS,
  MAX_SNIPPET_LENGTH,
  compareConfidence,
  meetsConfidence,
  isConfidence,
  isReverseAssociation,
  toSnippet,
  evidenceKey,
} from './evidence.js';

export type { FileCategory, CategorizedFiles, SourceFile, SourceSet } from './files.js';
export {
  FILE_CATEGORIES,
  createEmptyCategorizedFiles,
  createEmptySourceSet,
  countFiles,
} from './files.js';

export type { ColumnMap, SchemaIndex } from './schema.js';
