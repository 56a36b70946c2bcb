/**
 * Polymorphic Scanner
 *
 * Wraps the polymorphic resolver as a scanner so the runner can treat it
 * like the others.
 */

import type { Evidence, FileCategory, SourceFile, SourceSet } from 'tabletrace-core';
import { BaseScanner } from '../base/base-scanner.js';
import { resolvePolymorphicPairs } from './polymorphic-resolver.js';

export class PolymorphicScanner extends BaseScanner {
  readonly id = 'polymorphic';
  readonly name = 'Polymorphic Scanner';
  readonly categories: readonly FileCategory[] = ['schema', 'model'];

  /**
   * A pair is only resolved against every file at once; see {@link scanAll}.
   */
  scanFile(_file: SourceFile, _category: FileCategory): Evidence[] {
    return [];
  }

  override scanAll(sources: SourceSet): Evidence[] {
    return resolvePolymorphicPairs(sources, this.tableName).map((pair): Evidence => ({
      file: pair.file,
      line: pair.line,
      table: pair.table,
      column: `${pair.prefix}_id`,
      kind: pair.resolution === 'model' ? 'polymorphic_model' : 'polymorphic_schema',
      snippet: pair.snippet,
      confidence: pair.resolution === 'model' ? 'HIGH' : 'MEDIUM',
      schemaVerified: true,
    }));
  }
}
