export {
  CATEGORY_RULES,
  categorizeFile,
  collectFiles,
  loadSources,
  splitLines,
  type CategoryRule,
  type CollectFilesOptions,
} from './file-classifier.js';
export { DEFAULT_IGNORE_DIRECTORIES, shouldIgnoreDirectory } from './default-ignores.js';
