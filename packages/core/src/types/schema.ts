/**
 * Schema Index Types
 */

/** Column name to declared datatype */
export type ColumnMap = ReadonlyMap<string, string>;

/**
 * Ground truth extracted from the schema definition file.
 */
export interface SchemaIndex {
  /** Every table created in the schema */
  tables: ReadonlySet<string>;
  /** Table name to its columns */
  columns: ReadonlyMap<string, ColumnMap>;
}
