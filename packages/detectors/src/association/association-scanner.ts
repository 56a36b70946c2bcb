/**
 * Association Scanner
 *
 * ActiveRecord associations in app/models. Direction matters: the table
 * holding the foreign key is the dependent one.
 *
 * - belongs_to :reward              FK lives on the declaring model's table
 * - belongs_to :x, class_name: ...  same, under another association name
 * - has_many :y, through: :rewards  join traversal, no FK on the owner
 * - has_many :rewards / has_one     FK lives on the target (reverse)
 */

import {
  classNameToTableName,
  escapeRegExp,
  singularize,
  singularToClassName,
  type Evidence,
  type FileCategory,
  type SourceFile,
} from 'tabletrace-core';
import { BaseScanner, type ScanTarget } from '../base/base-scanner.js';

export interface AssociationScannerOptions extends ScanTarget {
  /** Tables from the schema index, used to resolve namespaced class names */
  knownTables?: ReadonlySet<string> | undefined;
}

interface AssociationState {
  className: string | null;
}

const CLASS_DECLARATION = /class\s+(\w+)\s*</;
const FOREIGN_KEY_OPTION = /foreign_key:\s*['"](\w+)['"]/;

export class AssociationScanner extends BaseScanner {
  readonly id = 'association';
  readonly name = 'Association Scanner';
  readonly categories: readonly FileCategory[] = ['model'];

  private readonly knownTables: ReadonlySet<string>;
  private readonly belongsTo: RegExp;
  private readonly hasMany: RegExp;
  private readonly hasOne: RegExp;
  private readonly indirect: RegExp;
  private readonly through: RegExp;

  constructor(options: AssociationScannerOptions) {
    super(options);
    this.knownTables = options.knownTables ?? new Set();

    const singular = this.singularPattern;
    const table = this.tablePattern;
    const className = escapeRegExp(singularToClassName(this.singular));
    this.belongsTo = new RegExp(`belongs_to\\s+:(${singular})\\b`);
    this.hasMany = new RegExp(`has_many\\s+:(${table})\\b`);
    this.hasOne = new RegExp(`has_one\\s+:(${singular})\\b`);
    this.indirect = new RegExp(`belongs_to\\s+:(\\w+).*class_name:\\s*['"]${className}['"]`);
    this.through = new RegExp(`has_many\\s+:(\\w+)\\s*,.*through:\\s*:(${table})\\b`);
  }

  /**
   * Table for a model class. With a known-table set, a namespaced class
   * such as AdminUser resolves to the first known underscore suffix
   * (`users`); otherwise the conventional name is used.
   */
  resolveOwnerTable(className: string): string {
    const candidate = classNameToTableName(className);
    if (this.knownTables.size === 0 || this.knownTables.has(candidate)) {
      return candidate;
    }

    const parts = candidate.split('_');
    for (let i = 1; i < parts.length; i++) {
      const tail = parts.slice(i).join('_');
      if (this.knownTables.has(tail)) {
        return tail;
      }
    }

    return candidate;
  }

  scanFile(file: SourceFile): Evidence[] {
    return this.foldLines<AssociationState>(file, () => ({ className: null }), (state, line, lineNumber) => {
      const declaration = CLASS_DECLARATION.exec(line);
      if (declaration?.[1]) {
        state.className = declaration[1];
      }

      const owner = state.className ? this.resolveOwnerTable(state.className) : 'unknown';
      const explicitKey = FOREIGN_KEY_OPTION.exec(line)?.[1];

      if (this.through.test(line)) {
        return this.createEvidence(file, lineNumber, {
          table: owner,
          column: '',
          kind: 'model_has_many_through',
          confidence: 'MEDIUM',
        });
      }

      const indirect = this.indirect.exec(line);
      if (indirect?.[1]) {
        return this.createEvidence(file, lineNumber, {
          table: owner,
          column: explicitKey ?? `${indirect[1]}_id`,
          kind: 'model_indirect_association',
          confidence: 'MEDIUM',
        });
      }

      if (this.belongsTo.test(line)) {
        return this.createEvidence(file, lineNumber, {
          table: owner,
          column: explicitKey ?? this.foreignKey,
          kind: 'model_belongs_to',
          confidence: 'HIGH',
        });
      }

      // Reverse: the target table holds {owner}_id
      const ownerKey = `${singularize(owner)}_id`;

      if (this.hasMany.test(line)) {
        return this.createEvidence(file, lineNumber, {
          table: this.tableName,
          column: explicitKey ?? ownerKey,
          kind: 'model_has_many_reverse',
          confidence: 'HIGH',
        });
      }

      if (this.hasOne.test(line)) {
        return this.createEvidence(file, lineNumber, {
          table: this.tableName,
          column: explicitKey ?? ownerKey,
          kind: 'model_has_one_reverse',
          confidence: 'HIGH',
        });
      }

      return null;
    }).evidence;
  }
}
