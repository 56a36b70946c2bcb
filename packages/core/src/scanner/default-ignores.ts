/**
 * Default Ignore Directories
 *
 * Directory names that never contain application code worth scanning:
 * version control, vendored dependencies, logs and temp files.
 * The walker never descends into a directory whose name matches.
 *
 * @module scanner/default-ignores
 */

export const DEFAULT_IGNORE_DIRECTORIES: readonly string[] = [
  // Version control
  '.git',

  // Dependencies
  'vendor',
  'node_modules',

  // Runtime output
  'tmp',
  'log',
] as const;

const ignoreDirectorySet = new Set(DEFAULT_IGNORE_DIRECTORIES);

/**
 * Check if a directory name is ignored by default.
 */
export function shouldIgnoreDirectory(dirName: string, extra: ReadonlySet<string> = new Set()): boolean {
  return ignoreDirectorySet.has(dirName) || extra.has(dirName);
}
