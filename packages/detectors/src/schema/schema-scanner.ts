/**
 * Schema Scanner
 *
 * Foreign key columns declared in db/schema.rb:
 * - t.references :reward
 * - t.bigint "reward_id" / t.integer "reward_id"
 */

import type { Evidence, FileCategory, SourceFile } from 'tabletrace-core';
import { CREATE_TABLE_PATTERN } from 'tabletrace-core';
import { BaseScanner, type ScanTarget } from '../base/base-scanner.js';

interface SchemaState {
  table: string | null;
}

export class SchemaScanner extends BaseScanner {
  readonly id = 'schema';
  readonly name = 'Schema Scanner';
  readonly categories: readonly FileCategory[] = ['schema'];

  private readonly referencePattern: RegExp;
  private readonly columnPattern: RegExp;

  constructor(target: ScanTarget) {
    super(target);
    this.referencePattern = new RegExp(`t\\.references\\s+:(${this.singularPattern})\\b`);
    this.columnPattern = new RegExp(
      `t\\.(integer|bigint|references)\\s+"?:?(${this.singularPattern}(?:_id)?)"?`
    );
  }

  scanFile(file: SourceFile): Evidence[] {
    return this.foldLines<SchemaState>(file, () => ({ table: null }), (state, line, lineNumber) => {
      const create = CREATE_TABLE_PATTERN.exec(line);
      if (create?.[1]) {
        state.table = create[1];
      }
      const table = state.table ?? 'unknown';

      if (this.referencePattern.test(line)) {
        return this.createEvidence(file, lineNumber, {
          table,
          column: this.foreignKey,
          kind: 'schema_reference',
          confidence: 'HIGH',
        });
      }

      const column = this.columnPattern.exec(line);
      const type = column?.[1];
      const name = column?.[2];
      if (!type || !name || type === 'references') {
        return null;
      }

      return this.createEvidence(file, lineNumber, {
        table,
        column: name === this.singular ? this.foreignKey : name,
        kind: 'schema_column',
        confidence: 'HIGH',
      });
    }).evidence;
  }
}
