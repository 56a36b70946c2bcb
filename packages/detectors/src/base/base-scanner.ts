/**
 * Base Scanner
 *
 * Abstract base class for the line-oriented scanners. A scanner is bound to
 * one target table, declares the file categories it reads and turns each
 * file's lines into evidence.
 */

import {
  escapeRegExp,
  singularize,
  toSnippet,
  type Confidence,
  type Evidence,
  type FileCategory,
  type ReferenceKind,
  type SourceFile,
  type SourceSet,
} from 'tabletrace-core';

// ============================================================================
// Types
// ============================================================================

/**
 * Table under investigation
 */
export interface ScanTarget {
  tableName: string;
  /** Foreign key column override (default: {singular}_id) */
  foreignKey?: string | undefined;
}

/**
 * Fields a scanner supplies for one hit; the location comes from the file
 */
export interface EvidenceFields {
  table: string;
  column: string;
  kind: ReferenceKind;
  confidence: Confidence;
  /** Defaults to the trimmed source line */
  snippet?: string | undefined;
}

// ============================================================================
// Base Scanner Abstract Class
// ============================================================================

/**
 * @example
 * ```typescript
 * class SeedScanner extends BaseScanner {
 *   readonly id = 'seed';
 *   readonly name = 'Seed Scanner';
 *   readonly categories = ['source'] as const;
 *
 *   scanFile(file: SourceFile): Evidence[] {
 *     return this.foldLines(file, () => ({}), (_state, line, n) =>
 *       line.includes(this.tableName)
 *         ? this.createEvidence(file, n, { table: this.tableName, column: '', kind: 'contextual_variable', confidence: 'LOW' })
 *         : null
 *     ).evidence;
 *   }
 * }
 * ```
 */
export abstract class BaseScanner {
  /** Stable identifier, used as the key of per-scanner hit counts */
  abstract readonly id: string;

  /** Display name */
  abstract readonly name: string;

  /** Categories whose files this scanner reads, in order */
  abstract readonly categories: readonly FileCategory[];

  readonly tableName: string;
  readonly singular: string;
  readonly foreignKey: string;

  constructor(target: ScanTarget) {
    this.tableName = target.tableName;
    this.singular = singularize(target.tableName);
    this.foreignKey = target.foreignKey || `${this.singular}_id`;
  }

  /**
   * Scan one file. Implementations hold no state between files.
   */
  abstract scanFile(file: SourceFile, category: FileCategory): Evidence[];

  /**
   * Scan every file of the declared categories.
   */
  scanAll(sources: SourceSet): Evidence[] {
    const evidence: Evidence[] = [];
    for (const category of this.categories) {
      for (const file of sources[category]) {
        for (const item of this.scanFile(file, category)) {
          evidence.push(item);
        }
      }
    }
    return evidence;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /** Escaped table name for use inside a pattern */
  protected get tablePattern(): string {
    return escapeRegExp(this.tableName);
  }

  /** Escaped singular for use inside a pattern */
  protected get singularPattern(): string {
    return escapeRegExp(this.singular);
  }

  /** Escaped foreign key for use inside a pattern */
  protected get foreignKeyPattern(): string {
    return escapeRegExp(this.foreignKey);
  }

  /**
   * Build evidence at a 1-based line of `file`.
   */
  protected createEvidence(file: SourceFile, line: number, fields: EvidenceFields): Evidence {
    return {
      file: file.path,
      line,
      table: fields.table,
      column: fields.column,
      kind: fields.kind,
      snippet: fields.snippet ?? toSnippet(file.lines[line - 1] ?? ''),
      confidence: fields.confidence,
      schemaVerified: true,
    };
  }

  /**
   * Fold over a file's lines with a state object created fresh for the
   * file. `visit` receives the 1-based line number and returns the
   * evidence for that line, if any.
   */
  protected foldLines<S>(
    file: SourceFile,
    initialState: () => S,
    visit: (state: S, line: string, lineNumber: number) => Evidence | Evidence[] | null
  ): { evidence: Evidence[]; state: S } {
    const state = initialState();
    const evidence: Evidence[] = [];

    file.lines.forEach((line, index) => {
      const result = visit(state, line, index + 1);
      if (Array.isArray(result)) {
        for (const item of result) {
          evidence.push(item);
        }
      } else if (result) {
        evidence.push(result);
      }
    });

    return { evidence, state };
  }
}
