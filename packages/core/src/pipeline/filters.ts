/**
 * Evidence Filters
 *
 * Stages that drop evidence outright, applied after deduplication.
 */

import { isReverseAssociation, type Evidence } from '../types/evidence.js';

/** Drop has_many/has_one declared in the other direction */
export function excludeReverseAssociations(evidence: readonly Evidence[]): Evidence[] {
  return evidence.filter(item => !isReverseAssociation(item.kind));
}

/**
 * Keep evidence on tables the schema creates, and never on the target
 * table, which is the parent rather than a dependent. An empty table set
 * means no schema was found and only the target is dropped.
 */
export function filterByKnownTables(
  evidence: readonly Evidence[],
  knownTables: ReadonlySet<string>,
  tableName: string
): Evidence[] {
  return evidence.filter(
    item => item.table !== tableName && (knownTables.size === 0 || knownTables.has(item.table))
  );
}
