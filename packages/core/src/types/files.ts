/**
 * File Categories and Loaded Sources
 */

/**
 * Every scanned file belongs to exactly one category. The category decides
 * which scanners read it.
 */
export type FileCategory =
  | 'schema'     // db/schema.rb
  | 'migration'  // db/migrate/**/*.rb
  | 'model'      // app/models/**/*.rb
  | 'source'     // any other Ruby file
  | 'sql'        // *.sql
  | 'template'   // *.erb
  | 'config';    // *.yml, *.yaml

export const FILE_CATEGORIES: readonly FileCategory[] = [
  'schema',
  'migration',
  'model',
  'source',
  'sql',
  'template',
  'config',
] as const;

/** Absolute file paths grouped by category, in walk order */
export type CategorizedFiles = Record<FileCategory, string[]>;

export interface SourceFile {
  path: string;
  lines: readonly string[];
}

/** File contents grouped by category, read once per scan */
export type SourceSet = Record<FileCategory, SourceFile[]>;

export function createEmptyCategorizedFiles(): CategorizedFiles {
  return {
    schema: [],
    migration: [],
    model: [],
    source: [],
    sql: [],
    template: [],
    config: [],
  };
}

export function createEmptySourceSet(): SourceSet {
  return {
    schema: [],
    migration: [],
    model: [],
    source: [],
    sql: [],
    template: [],
    config: [],
  };
}

export function countFiles(files: Record<FileCategory, readonly unknown[]>): number {
  let total = 0;
  for (const category of FILE_CATEGORIES) {
    total += files[category].length;
  }
  return total;
}
