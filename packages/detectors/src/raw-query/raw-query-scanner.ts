/**
 * Raw Query Scanner
 *
 * SQL text and query-builder calls outside the declarative schema. Heredoc
 * blocks tagged with SQL (<<~SQL, <<-REPORT_SQL) are scanned as a whole and
 * attributed to their opening line; every other line is checked on its own.
 */

import { escapeRegExp, toSnippet, type Evidence, type FileCategory, type SourceFile } from 'tabletrace-core';
import { BaseScanner, type ScanTarget } from '../base/base-scanner.js';

interface Heredoc {
  startLine: number;
  end: RegExp;
  lines: string[];
}

interface RawQueryState {
  heredoc: Heredoc | null;
}

const HEREDOC_START = /<<[-~]?(\w*SQL\w*)/;

export class RawQueryScanner extends BaseScanner {
  readonly id = 'raw-query';
  readonly name = 'Raw Query Scanner';
  readonly categories: readonly FileCategory[] = ['source', 'model', 'template', 'sql', 'migration'];

  /** JOIN rewards ON orders.reward_id = rewards.id */
  private readonly join: RegExp;
  /** FROM / UPDATE / INSERT INTO / DELETE FROM rewards */
  private readonly dml: RegExp;
  /** rewards.id or reward_id */
  private readonly columnReference: RegExp;
  /** .where(reward: ...), .joins(:reward) */
  private readonly queryMethod: RegExp;
  /** "#{reward.id}" */
  private readonly interpolation: RegExp;

  constructor(target: ScanTarget) {
    super(target);
    const table = this.tablePattern;
    const singular = this.singularPattern;
    this.join = new RegExp(
      `\\bJOIN\\s+[\`"]?${table}[\`"]?\\s+ON\\s+(\\w+)\\.(\\w+)\\s*=\\s*${table}\\.(\\w+)`,
      'i'
    );
    this.dml = new RegExp(`\\b(?:FROM|UPDATE|INSERT\\s+INTO|DELETE\\s+FROM)\\s+[\`"]?${table}[\`"]?\\b`, 'i');
    this.columnReference = new RegExp(`\\b${table}\\.id\\b|(?<!\\w)${this.foreignKeyPattern}(?!\\w)`, 'i');
    this.queryMethod = new RegExp(
      `\\.(where|joins|includes|eager_load|preload|references)\\b.*[:('"]${singular}`,
      'i'
    );
    this.interpolation = new RegExp(`#\\{.*${singular}.*\\}`, 'i');
  }

  scanFile(file: SourceFile): Evidence[] {
    const { evidence, state } = this.foldLines<RawQueryState>(
      file,
      () => ({ heredoc: null }),
      (state, line, lineNumber) => {
        if (!state.heredoc) {
          const start = HEREDOC_START.exec(line);
          if (start?.[1] !== undefined) {
            state.heredoc = {
              startLine: lineNumber,
              end: new RegExp(`^\\s*${escapeRegExp(start[1])}\\s*$`),
              lines: [],
            };
          }
        }

        const heredoc = state.heredoc;
        if (heredoc) {
          heredoc.lines.push(line);
          if (lineNumber > heredoc.startLine && heredoc.end.test(line)) {
            state.heredoc = null;
            return this.scanBlock(file, heredoc);
          }
          return null;
        }

        return this.scanLine(file, line, lineNumber);
      }
    );

    // Unterminated heredoc: scan what was collected
    if (state.heredoc) {
      for (const item of this.scanBlock(file, state.heredoc)) {
        evidence.push(item);
      }
    }

    return evidence;
  }

  /**
   * Every check that matches the block contributes one record.
   */
  private scanBlock(file: SourceFile, heredoc: Heredoc): Evidence[] {
    const sql = heredoc.lines.join('\n');
    const snippet = toSnippet(sql);
    const evidence: Evidence[] = [];

    const join = this.join.exec(sql);
    if (join?.[1] && join[2]) {
      evidence.push(
        this.createEvidence(file, heredoc.startLine, {
          table: join[1],
          column: join[2],
          kind: 'raw_sql_join',
          confidence: 'MEDIUM',
          snippet,
        })
      );
    }

    if (this.dml.test(sql)) {
      evidence.push(
        this.createEvidence(file, heredoc.startLine, {
          table: this.tableName,
          column: '',
          kind: 'raw_sql_table_ref',
          confidence: 'HIGH',
          snippet,
        })
      );
    }

    if (this.columnReference.test(sql)) {
      evidence.push(
        this.createEvidence(file, heredoc.startLine, {
          table: this.tableName,
          column: this.foreignKey,
          kind: 'raw_sql_column_ref',
          confidence: 'HIGH',
          snippet,
        })
      );
    }

    return evidence;
  }

  /**
   * First matching check wins.
   */
  private scanLine(file: SourceFile, line: string, lineNumber: number): Evidence | null {
    const join = this.join.exec(line);
    if (join?.[1] && join[2]) {
      return this.createEvidence(file, lineNumber, {
        table: join[1],
        column: join[2],
        kind: 'raw_sql_join',
        confidence: 'MEDIUM',
      });
    }

    if (this.dml.test(line)) {
      return this.createEvidence(file, lineNumber, {
        table: this.tableName,
        column: '',
        kind: 'raw_sql_table_ref',
        confidence: 'HIGH',
      });
    }

    if (this.columnReference.test(line)) {
      return this.createEvidence(file, lineNumber, {
        table: this.tableName,
        column: this.foreignKey,
        kind: 'raw_sql_column_ref',
        confidence: 'HIGH',
      });
    }

    if (this.queryMethod.test(line)) {
      return this.createEvidence(file, lineNumber, {
        table: this.tableName,
        column: '',
        kind: 'raw_sql_query_method',
        confidence: 'MEDIUM',
      });
    }

    if (this.interpolation.test(line)) {
      return this.createEvidence(file, lineNumber, {
        table: this.tableName,
        column: '',
        kind: 'raw_sql_interpolation',
        confidence: 'LOW',
      });
    }

    return null;
  }
}
