/**
 * Migration Scanner
 *
 * Foreign key changes in db/migrate. The first matching pattern wins per
 * line. The create_table context is never reset on `end`, since migrations
 * nest blocks inside the table definition.
 */

import type { Evidence, FileCategory, SourceFile } from 'tabletrace-core';
import { BaseScanner, type ScanTarget } from '../base/base-scanner.js';

interface MigrationState {
  table: string | null;
}

const CREATE_TABLE = /create_table\s+[:"](\w+)/;

export class MigrationScanner extends BaseScanner {
  readonly id = 'migration';
  readonly name = 'Migration Scanner';
  readonly categories: readonly FileCategory[] = ['migration'];

  private readonly addReference: RegExp;
  private readonly addColumn: RegExp;
  private readonly addForeignKey: RegExp;
  private readonly tableReference: RegExp;
  private readonly removeReference: RegExp;
  private readonly removeColumn: RegExp;

  constructor(target: ScanTarget) {
    super(target);
    const singular = this.singularPattern;
    const fk = this.foreignKeyPattern;
    this.addReference = new RegExp(`add_reference\\s+:(\\w+)\\s*,\\s*:(${singular})\\b`);
    this.addColumn = new RegExp(`add_column\\s+:(\\w+)\\s*,\\s*:(${fk})\\s*,`);
    this.addForeignKey = new RegExp(`add_foreign_key\\s+:(\\w+)\\s*,\\s*:(${this.tablePattern})\\b`);
    this.tableReference = new RegExp(`t\\.references\\s+:(${singular})\\b`);
    this.removeReference = new RegExp(`remove_reference\\s+:(\\w+)\\s*,\\s*:(${singular})\\b`);
    this.removeColumn = new RegExp(`remove_column\\s+:(\\w+)\\s*,\\s*:(${fk})\\b`);
  }

  scanFile(file: SourceFile): Evidence[] {
    return this.foldLines<MigrationState>(file, () => ({ table: null }), (state, line, lineNumber) => {
      const create = CREATE_TABLE.exec(line);
      if (create?.[1]) {
        state.table = create[1];
      }

      const at = (table: string, kind: Evidence['kind'], confidence: Evidence['confidence']) =>
        this.createEvidence(file, lineNumber, { table, column: this.foreignKey, kind, confidence });

      const addReference = this.addReference.exec(line);
      if (addReference?.[1]) {
        return at(addReference[1], 'migration_add_reference', 'HIGH');
      }

      const addColumn = this.addColumn.exec(line);
      if (addColumn?.[1]) {
        return at(addColumn[1], 'migration_add_column', 'HIGH');
      }

      const addForeignKey = this.addForeignKey.exec(line);
      if (addForeignKey?.[1]) {
        return at(addForeignKey[1], 'migration_add_foreign_key', 'HIGH');
      }

      if (this.tableReference.test(line)) {
        return at(state.table ?? 'unknown', 'migration_create_table_ref', 'HIGH');
      }

      const remove = this.removeReference.exec(line) ?? this.removeColumn.exec(line);
      if (remove?.[1]) {
        return at(remove[1], 'migration_remove', 'MEDIUM');
      }

      return null;
    }).evidence;
  }
}
