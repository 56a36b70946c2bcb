/**
 * File Classifier
 *
 * Walks a checkout, skips ignored directories and assigns every remaining
 * file to at most one category by its root-relative path. Files no rule
 * matches are left out without complaint.
 */

import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import { Errors } from '../errors/scan-error.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import {
  FILE_CATEGORIES,
  createEmptyCategorizedFiles,
  createEmptySourceSet,
  type CategorizedFiles,
  type FileCategory,
  type SourceSet,
} from '../types/files.js';
import { shouldIgnoreDirectory } from './default-ignores.js';

// ============================================================================
// Types
// ============================================================================

export interface CategoryRule {
  category: FileCategory;
  /** Glob matched against the root-relative POSIX path */
  pattern: string;
}

export interface CollectFilesOptions {
  /** Directory names to skip on top of the defaults */
  ignoreDirectories?: readonly string[];
  logger?: Logger;
}

// ============================================================================
// Rules
// ============================================================================

/**
 * Ordered category rules; the first matching rule wins.
 */
export const CATEGORY_RULES: readonly CategoryRule[] = [
  { category: 'schema', pattern: 'db/schema.rb' },
  { category: 'migration', pattern: 'db/migrate/**/*.rb' },
  { category: 'model', pattern: 'app/models/**/*.rb' },
  { category: 'source', pattern: '**/*.rb' },
  { category: 'sql', pattern: '**/*.sql' },
  { category: 'template', pattern: '**/*.erb' },
  { category: 'config', pattern: '**/*.{yml,yaml}' },
];

/**
 * Category for a root-relative POSIX path, or null when the file is not
 * scanned at all.
 */
export function categorizeFile(relativePath: string): FileCategory | null {
  for (const rule of CATEGORY_RULES) {
    if (minimatch(relativePath, rule.pattern, { dot: true })) {
      return rule.category;
    }
  }
  return null;
}

// ============================================================================
// Walk
// ============================================================================

async function assertDirectory(rootDir: string): Promise<void> {
  const stat = await fs.stat(rootDir).catch(() => null);
  if (!stat?.isDirectory()) {
    throw Errors.rootNotFound(rootDir);
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Walk `rootDir` and group absolute file paths by category.
 *
 * @throws ScanError ROOT_NOT_FOUND when the root is not a directory
 */
export async function collectFiles(
  rootDir: string,
  options: CollectFilesOptions = {}
): Promise<CategorizedFiles> {
  const logger = options.logger ?? silentLogger;
  const extraIgnores = new Set(options.ignoreDirectories ?? []);
  const categorized = createEmptyCategorizedFiles();

  await assertDirectory(rootDir);

  const walk = async (dir: string, relativePath: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      logger.warn(`cannot read directory ${dir}: ${describeError(error)}`);
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (shouldIgnoreDirectory(entry.name, extraIgnores)) {
        continue;
      }

      const fullPath = path.join(dir, entry.name);
      const relPath = relativePath ? `${relativePath}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        await walk(fullPath, relPath);
      } else if (entry.isFile()) {
        const category = categorizeFile(relPath);
        if (category) {
          categorized[category].push(fullPath);
        }
      }
    }
  };

  await walk(rootDir, '');
  return categorized;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Split file content into lines without the trailing empty line a final
 * newline would produce.
 */
export function splitLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Read every categorized file once. Unreadable files are logged and left
 * out; the rest of the scan carries on.
 */
export async function loadSources(
  categorized: CategorizedFiles,
  logger: Logger = silentLogger
): Promise<SourceSet> {
  const sources = createEmptySourceSet();

  for (const category of FILE_CATEGORIES) {
    for (const filePath of categorized[category]) {
      try {
        const content = await fs.readFile(filePath, 'utf-8');
        sources[category].push({ path: filePath, lines: splitLines(content) });
      } catch (error) {
        logger.warn(`cannot read ${filePath}: ${describeError(error)}`);
      }
    }
  }

  return sources;
}
