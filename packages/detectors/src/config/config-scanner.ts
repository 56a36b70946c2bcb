/**
 * Config Scanner
 *
 * Table names in YAML settings files. database.yml is skipped: the names
 * there are databases, not tables.
 */

import * as path from 'node:path';
import type { Evidence, FileCategory, SourceFile } from 'tabletrace-core';
import { BaseScanner, type ScanTarget } from '../base/base-scanner.js';

const COMMENT_LINE = /^\s*#/;
const SKIPPED_FILES = new Set(['database.yml']);

export class ConfigScanner extends BaseScanner {
  readonly id = 'config';
  readonly name = 'Config Scanner';
  readonly categories: readonly FileCategory[] = ['config'];

  private readonly tableWord: RegExp;
  /** `key: rewards` */
  private readonly tableValue: RegExp;
  /** `reward_limit: 5` */
  private readonly singularPrefix: RegExp;

  constructor(target: ScanTarget) {
    super(target);
    this.tableWord = new RegExp(`\\b${this.tablePattern}\\b`);
    this.tableValue = new RegExp(`:\\s*${this.tablePattern}\\b`);
    this.singularPrefix = new RegExp(`\\b${this.singularPattern}_`);
  }

  scanFile(file: SourceFile): Evidence[] {
    if (SKIPPED_FILES.has(path.basename(file.path))) {
      return [];
    }

    return this.foldLines(file, () => null, (_state, line, lineNumber) => {
      if (COMMENT_LINE.test(line) || !this.tableWord.test(line)) {
        return null;
      }

      const keyed = this.tableValue.test(line) || this.singularPrefix.test(line);
      return this.createEvidence(file, lineNumber, {
        table: this.tableName,
        column: '',
        kind: 'config_table_ref',
        confidence: keyed ? 'MEDIUM' : 'LOW',
      });
    }).evidence;
  }
}
