/**
 * Evidence Ranker
 *
 * Final stage: confidence threshold, stable ordering and root-relative
 * paths for output.
 */

import * as path from 'node:path';
import { compareConfidence, meetsConfidence, type Confidence, type Evidence } from '../types/evidence.js';

export interface RankOptions {
  minConfidence: Confidence;
  /** When set, paths under it are rewritten relative to it */
  rootDir?: string | undefined;
}

function compareCodePoints(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Root-relative POSIX path. Paths outside the root are returned as given.
 */
export function toRelativePath(filePath: string, rootDir: string): string {
  const relative = path.relative(rootDir, filePath);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return filePath;
  }
  return relative.split(path.sep).join('/');
}

/**
 * Drop evidence below `minConfidence`, then order by confidence (HIGH
 * first), file path and line number.
 */
export function rankEvidence(evidence: readonly Evidence[], options: RankOptions): Evidence[] {
  const { rootDir } = options;

  return evidence
    .filter(item => meetsConfidence(item.confidence, options.minConfidence))
    .map(item => (rootDir ? { ...item, file: toRelativePath(item.file, rootDir) } : item))
    .sort(
      (a, b) =>
        compareConfidence(b.confidence, a.confidence) ||
        compareCodePoints(a.file, b.file) ||
        a.line - b.line
    );
}
