/**
 * Evidence Types
 *
 * The record every scanner emits and every pipeline stage consumes.
 * One evidence is one line of source text that appears to depend on the
 * table under investigation.
 */

// ============================================================================
// Confidence
// ============================================================================

export type Confidence = 'HIGH' | 'MEDIUM' | 'LOW';

export const CONFIDENCE_LEVELS: readonly Confidence[] = ['HIGH', 'MEDIUM', 'LOW'] as const;

const CONFIDENCE_RANK: Record<Confidence, number> = {
  LOW: 0,
  MEDIUM: 1,
  HIGH: 2,
};

/**
 * Compare two confidence levels. Positive when `a` is stronger than `b`.
 */
export function compareConfidence(a: Confidence, b: Confidence): number {
  return CONFIDENCE_RANK[a] - CONFIDENCE_RANK[b];
}

export function meetsConfidence(value: Confidence, minimum: Confidence): boolean {
  return CONFIDENCE_RANK[value] >= CONFIDENCE_RANK[minimum];
}

export function isConfidence(value: string): value is Confidence {
  return value === 'HIGH' || value === 'MEDIUM' || value === 'LOW';
}

// ============================================================================
// Reference Kinds
// ============================================================================

/**
 * Syntactic pattern that produced a piece of evidence.
 */
export type ReferenceKind =
  // db/schema.rb
  | 'schema_column'
  | 'schema_reference'
  // db/migrate
  | 'migration_add_reference'
  | 'migration_add_column'
  | 'migration_add_foreign_key'
  | 'migration_create_table_ref'
  | 'migration_remove'
  // app/models associations
  | 'model_belongs_to'
  | 'model_has_many'
  | 'model_has_one'
  | 'model_has_many_through'
  | 'model_indirect_association'
  | 'model_has_many_reverse'
  | 'model_has_one_reverse'
  // Raw SQL and query builders
  | 'raw_sql_column_ref'
  | 'raw_sql_table_ref'
  | 'raw_sql_join'
  | 'raw_sql_query_method'
  | 'raw_sql_interpolation'
  // Settings files
  | 'config_table_ref'
  // Heuristic catch-all
  | 'contextual_variable'
  | 'contextual_comment'
  // Polymorphic _type/_id pairs
  | 'polymorphic_schema'
  | 'polymorphic_model';

/**
 * Human-readable description of each kind, used by exporters.
 */
export const REFERENCE_KIND_DESCRIPTIONS: Record<ReferenceKind, string> = {
  schema_column: 'Integer column named after the table in schema.rb',
  schema_reference: 't.references declaration in schema.rb',
  migration_add_reference: 'add_reference in a migration',
  migration_add_column: 'add_column of the foreign key in a migration',
  migration_add_foreign_key: 'add_foreign_key constraint in a migration',
  migration_create_table_ref: 't.references inside create_table in a migration',
  migration_remove: 'remove_reference or remove_column in a migration',
  model_belongs_to: 'belongs_to association on the owning model',
  model_has_many: 'has_many association',
  model_has_one: 'has_one association',
  model_has_many_through: 'has_many through the table',
  model_indirect_association: 'belongs_to with an explicit class_name',
  model_has_many_reverse: 'has_many of the table declared on another model',
  model_has_one_reverse: 'has_one of the table declared on another model',
  raw_sql_column_ref: 'Foreign key or primary key column in SQL text',
  raw_sql_table_ref: 'FROM, UPDATE, INSERT INTO or DELETE FROM the table',
  raw_sql_join: 'JOIN on the table with an equality condition',
  raw_sql_query_method: 'Query builder call mentioning the table',
  raw_sql_interpolation: 'String interpolation mentioning the table',
  config_table_ref: 'Table name in a settings file',
  contextual_variable: 'Identifier resembling the table near query code',
  contextual_comment: 'Comment mentioning the table near schema vocabulary',
  polymorphic_schema: 'Polymorphic pair corroborated by a type literal',
  polymorphic_model: 'Polymorphic pair confirmed by an as: association',
};

/**
 * Whether a kind describes the target owning a child rather than a
 * dependency on the target. These never surface in results.
 */
export function isReverseAssociation(kind: ReferenceKind): boolean {
  switch (kind) {
    case 'model_has_many_reverse':
    case 'model_has_one_reverse':
      return true;
    case 'schema_column':
    case 'schema_reference':
    case 'migration_add_reference':
    case 'migration_add_column':
    case 'migration_add_foreign_key':
    case 'migration_create_table_ref':
    case 'migration_remove':
    case 'model_belongs_to':
    case 'model_has_many':
    case 'model_has_one':
    case 'model_has_many_through':
    case 'model_indirect_association':
    case 'raw_sql_column_ref':
    case 'raw_sql_table_ref':
    case 'raw_sql_join':
    case 'raw_sql_query_method':
    case 'raw_sql_interpolation':
    case 'config_table_ref':
    case 'contextual_variable':
    case 'contextual_comment':
    case 'polymorphic_schema':
    case 'polymorphic_model':
      return false;
    default: {
      const unhandled: never = kind;
      throw new Error(`Unhandled reference kind: ${String(unhandled)}`);
    }
  }
}

// ============================================================================
// Evidence
// ============================================================================

export interface Evidence {
  /** File path (absolute while scanning, root-relative once ranked) */
  file: string;
  /** 1-based line number */
  line: number;
  /** Table that holds the dependency */
  table: string;
  /** Column on that table, empty for table-level evidence */
  column: string;
  kind: ReferenceKind;
  /** Trimmed source text, capped at {@link MAX_SNIPPET_LENGTH} */
  snippet: string;
  confidence: Confidence;
  /** False once schema validation could not find the column */
  schemaVerified: boolean;
  /** Declared column type, attached by schema validation */
  columnDatatype?: string | undefined;
}

export const MAX_SNIPPET_LENGTH = 200;

export function toSnippet(text: string): string {
  return text.trim().slice(0, MAX_SNIPPET_LENGTH);
}

/**
 * Deduplication identity. Two scanners may legitimately emit different
 * kinds for the same line, so the kind is part of the key.
 */
export function evidenceKey(evidence: Pick<Evidence, 'file' | 'line' | 'kind'>): string {
  return `${evidence.file}:${evidence.line}:${evidence.kind}`;
}
