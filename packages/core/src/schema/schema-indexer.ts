/**
 * Schema Indexer
 *
 * Reads `create_table` blocks out of schema.rb and records which tables
 * exist and which columns each one declares.
 */

import type { SourceFile } from '../types/files.js';
import type { SchemaIndex } from '../types/schema.js';

export const CREATE_TABLE_PATTERN = /create_table\s+"(\w+)"/;

/** t.<type> "name" or t.<type> :name */
const COLUMN_PATTERN = /\bt\.(\w+)\s+[":](\w+)/;

/** DSL calls that look like columns but declare none */
const NON_COLUMN_METHODS = new Set(['index', 'timestamps', 'primary_key']);

/**
 * Build the table and column index from schema files.
 *
 * `t.references :user` expands to `user_id` (bigint), plus `user_type`
 * (string) when the line is polymorphic. Lines before the first
 * `create_table` are ignored.
 */
export function buildSchemaIndex(schemaFiles: readonly SourceFile[]): SchemaIndex {
  const tables = new Set<string>();
  const columns = new Map<string, Map<string, string>>();

  for (const file of schemaFiles) {
    let current: Map<string, string> | null = null;

    for (const line of file.lines) {
      const create = CREATE_TABLE_PATTERN.exec(line);
      if (create?.[1]) {
        const table = create[1];
        tables.add(table);
        current = columns.get(table) ?? new Map<string, string>();
        columns.set(table, current);
        continue;
      }

      if (!current) continue;

      const column = COLUMN_PATTERN.exec(line);
      const type = column?.[1];
      const name = column?.[2];
      if (!type || !name || NON_COLUMN_METHODS.has(type)) continue;

      if (type === 'references') {
        current.set(`${name}_id`, 'bigint');
        if (line.includes('polymorphic:')) {
          current.set(`${name}_type`, 'string');
        }
      } else {
        current.set(name, type);
      }
    }
  }

  return { tables, columns };
}
