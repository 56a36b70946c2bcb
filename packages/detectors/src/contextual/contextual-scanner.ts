/**
 * Contextual Scanner
 *
 * Heuristic catch-all. Everything it reports is LOW confidence:
 * - an identifier starting with the singular on a line with query code
 * - a comment mentioning the singular next to schema vocabulary
 */

import type { Evidence, FileCategory, SourceFile } from 'tabletrace-core';
import { BaseScanner, type ScanTarget } from '../base/base-scanner.js';

const QUERY_KEYWORDS =
  /\b(query|execute|select|where|find_by|pluck|update_all|delete_all|sql|connection)\b/i;
const SCHEMA_KEYWORDS = /\b(table|column|foreign[_ ]?key|fk|migration|schema|index)\b/i;

export class ContextualScanner extends BaseScanner {
  readonly id = 'contextual';
  readonly name = 'Contextual Scanner';
  readonly categories: readonly FileCategory[] = ['source', 'model', 'template', 'sql'];

  private readonly identifier: RegExp;
  private readonly comment: RegExp;

  constructor(target: ScanTarget) {
    super(target);
    this.identifier = new RegExp(`\\b${this.singularPattern}s?\\w*\\b`, 'i');
    this.comment = new RegExp(`#.*\\b${this.singularPattern}`, 'i');
  }

  scanFile(file: SourceFile): Evidence[] {
    return this.foldLines(file, () => null, (_state, line, lineNumber) => {
      if (this.identifier.test(line) && QUERY_KEYWORDS.test(line)) {
        return this.createEvidence(file, lineNumber, {
          table: this.tableName,
          column: '',
          kind: 'contextual_variable',
          confidence: 'LOW',
        });
      }

      if (this.comment.test(line) && SCHEMA_KEYWORDS.test(line)) {
        return this.createEvidence(file, lineNumber, {
          table: this.tableName,
          column: '',
          kind: 'contextual_comment',
          confidence: 'LOW',
        });
      }

      return null;
    }).evidence;
  }
}
