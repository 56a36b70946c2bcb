/**
 * Schema Validator
 *
 * Cross-checks each (table, column) pair against the schema index.
 */

import type { Evidence } from '../types/evidence.js';
import type { ColumnMap } from '../types/schema.js';

/**
 * - `strict`: evidence naming a column the table lacks is dropped
 * - `lenient`: it is kept, downgraded to LOW and marked unverified
 */
export type ValidationMode = 'strict' | 'lenient';

/**
 * Evidence without a column, or on a table missing from the index, passes
 * through unchanged. Confirmed columns get their datatype attached.
 */
export function validateAgainstSchema(
  evidence: readonly Evidence[],
  columns: ReadonlyMap<string, ColumnMap>,
  mode: ValidationMode
): Evidence[] {
  const validated: Evidence[] = [];

  for (const item of evidence) {
    const tableColumns = item.column ? columns.get(item.table) : undefined;
    if (!tableColumns) {
      validated.push(item);
      continue;
    }

    const datatype = tableColumns.get(item.column);
    if (datatype !== undefined) {
      validated.push({ ...item, columnDatatype: datatype });
    } else if (mode === 'lenient') {
      validated.push({ ...item, confidence: 'LOW', schemaVerified: false });
    }
  }

  return validated;
}
