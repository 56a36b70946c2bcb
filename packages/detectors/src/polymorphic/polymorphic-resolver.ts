/**
 * Polymorphic Resolver
 *
 * A `{prefix}_type` / `{prefix}_id` column pair in the schema may point at
 * any table. Pairs are only reported once something ties the prefix to
 * the target:
 *
 * 1. Collect pairs per table from schema.rb (the target's own table is skipped)
 * 2. `has_many :rewards, as: :prefix` in a model confirms the prefix
 * 3. Otherwise a line mentioning both `prefix_type` and the target's class
 *    name corroborates it
 *
 * Pairs with neither are dropped.
 */

import {
  CREATE_TABLE_PATTERN,
  escapeRegExp,
  singularize,
  singularToClassName,
  toSnippet,
  type FileCategory,
  type SourceFile,
  type SourceSet,
} from 'tabletrace-core';

// ============================================================================
// Types
// ============================================================================

export interface PolymorphicPair {
  /** Table holding the pair */
  table: string;
  prefix: string;
  /** Schema file and line of the `_id` column */
  file: string;
  line: number;
  snippet: string;
}

export type PolymorphicResolution = 'model' | 'corroborated';

export interface ResolvedPolymorphicPair extends PolymorphicPair {
  resolution: PolymorphicResolution;
}

// ============================================================================
// Patterns
// ============================================================================

const TYPE_COLUMN = /t\.string\s+"(\w+)_type"/;
const ID_COLUMN = /t\.(integer|bigint)\s+"(\w+)_id"/;

/** Categories searched for corroborating type literals, in order */
export const CORROBORATION_CATEGORIES: readonly FileCategory[] = [
  'model',
  'source',
  'template',
  'sql',
  'migration',
];

// ============================================================================
// Passes
// ============================================================================

/**
 * Pass 1: `_type`/`_id` pairs, flushed at each new table and at end of file.
 */
export function collectPolymorphicPairs(
  schemaFiles: readonly SourceFile[],
  tableName: string
): PolymorphicPair[] {
  const pairs = new Map<string, PolymorphicPair>();

  for (const file of schemaFiles) {
    let table: string | null = null;
    let typeColumns = new Set<string>();
    let idColumns = new Map<string, { line: number; snippet: string }>();

    const flush = () => {
      if (!table) return;
      for (const prefix of typeColumns) {
        const id = idColumns.get(prefix);
        if (id) {
          pairs.set(`${table}:${prefix}`, { table, prefix, file: file.path, ...id });
        }
      }
    };

    file.lines.forEach((line, index) => {
      const create = CREATE_TABLE_PATTERN.exec(line);
      if (create?.[1]) {
        flush();
        table = create[1];
        typeColumns = new Set();
        idColumns = new Map();
        return;
      }

      if (!table || table === tableName) return;

      const type = TYPE_COLUMN.exec(line);
      if (type?.[1]) {
        typeColumns.add(type[1]);
      }

      const id = ID_COLUMN.exec(line);
      if (id?.[2]) {
        idColumns.set(id[2], { line: index + 1, snippet: toSnippet(line) });
      }
    });

    flush();
  }

  return [...pairs.values()];
}

/**
 * Pass 2: prefixes named by `as:` on an association to the target.
 */
export function findConfirmedPrefixes(modelFiles: readonly SourceFile[], tableName: string): Set<string> {
  const singular = singularize(tableName);
  const association = new RegExp(
    `(?:has_many|has_one)\\s+:(${escapeRegExp(tableName)}|${escapeRegExp(singular)})\\s*,.*as:\\s*:(\\w+)`
  );
  const confirmed = new Set<string>();

  for (const file of modelFiles) {
    for (const line of file.lines) {
      const match = association.exec(line);
      if (match?.[2]) {
        confirmed.add(match[2]);
      }
    }
  }

  return confirmed;
}

/**
 * Pass 3: prefixes whose `_type` column appears on a line with the
 * target's class name. Stops as soon as every candidate is found.
 */
export function findCorroboratedPrefixes(
  sources: SourceSet,
  candidates: ReadonlySet<string>,
  className: string
): Set<string> {
  const remaining = new Set(candidates);
  const corroborated = new Set<string>();

  for (const category of CORROBORATION_CATEGORIES) {
    for (const file of sources[category]) {
      for (const line of file.lines) {
        if (remaining.size === 0) {
          return corroborated;
        }
        if (!line.includes(className)) continue;

        for (const prefix of [...remaining]) {
          if (line.includes(`${prefix}_type`)) {
            corroborated.add(prefix);
            remaining.delete(prefix);
          }
        }
      }
    }
  }

  return corroborated;
}

// ============================================================================
// Resolver
// ============================================================================

/**
 * Run all three passes and return the pairs that reference the target.
 */
export function resolvePolymorphicPairs(sources: SourceSet, tableName: string): ResolvedPolymorphicPair[] {
  const pairs = collectPolymorphicPairs(sources.schema, tableName);
  if (pairs.length === 0) {
    return [];
  }

  const confirmed = findConfirmedPrefixes(sources.model, tableName);
  const unconfirmed = new Set(pairs.map(pair => pair.prefix).filter(prefix => !confirmed.has(prefix)));
  const corroborated =
    unconfirmed.size > 0
      ? findCorroboratedPrefixes(sources, unconfirmed, singularToClassName(singularize(tableName)))
      : new Set<string>();

  const resolved: ResolvedPolymorphicPair[] = [];
  for (const pair of pairs) {
    if (confirmed.has(pair.prefix)) {
      resolved.push({ ...pair, resolution: 'model' });
    } else if (corroborated.has(pair.prefix)) {
      resolved.push({ ...pair, resolution: 'corroborated' });
    }
  }
  return resolved;
}
