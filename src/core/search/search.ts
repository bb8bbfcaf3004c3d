/**
 * Full-text recipe search over a directory tree.
 */
import { ErrorCodes, RecipeEntryError, SearchError, errorMessage } from '../../utils/errors.js';
import { fileStem, globFilesSync } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { DOCUMENT_EXTENSIONS } from '../entry/constants.js';
import { RecipeEntry } from '../entry/recipe-entry.js';
import { scoreCandidate, tokenizeQuery } from './scorer.js';
import type { ScoredEntry, SearchResult } from './types.js';

const log = logger.child('search');

const DOCUMENT_PATTERNS = DOCUMENT_EXTENSIONS.map((extension) => `**/*.${extension}`);

/** Node decodes invalid UTF-8 in file names to U+FFFD. */
const REPLACEMENT_CHARACTER = '\uFFFD';

/**
 * Every `.cook` and `.menu` file below `baseDir`, at any depth.
 *
 * @throws SearchError `PATTERN_ERROR` when the directory cannot be globbed,
 *   `IO_ERROR` when a file name is not valid UTF-8.
 */
export function listDocuments(baseDir: string): string[] {
  let paths: string[];
  try {
    paths = globFilesSync(DOCUMENT_PATTERNS, { cwd: baseDir, dot: true });
  } catch (error) {
    throw new SearchError(
      ErrorCodes.PATTERN_ERROR,
      `Failed to read directory: ${baseDir}: ${errorMessage(error)}`,
      { baseDir },
      { cause: error }
    );
  }

  for (const filePath of paths) {
    if (filePath.includes(REPLACEMENT_CHARACTER)) {
      throw new SearchError(ErrorCodes.IO_ERROR, `Path contains invalid UTF-8: ${filePath}`, {
        path: filePath,
      });
    }
  }
  return paths;
}

/**
 * Descending score; equal scores by case-insensitive stem, then by path.
 */
export function compareResults(a: SearchResult, b: SearchResult): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  const aStem = fileStem(a.path).toLowerCase();
  const bStem = fileStem(b.path).toLowerCase();
  if (aStem !== bStem) {
    return aStem < bStem ? -1 : 1;
  }
  if (a.path !== b.path) {
    return a.path < b.path ? -1 : 1;
  }
  return 0;
}

/**
 * Score every document below `baseDir` against `query` and return the
 * matches, best first. Documents scoring zero are left out. A document
 * that cannot be read scores on its file name alone.
 */
export function searchPaths(baseDir: string, query: string): SearchResult[] {
  const terms = tokenizeQuery(query);
  const results: SearchResult[] = [];

  for (const filePath of listDocuments(baseDir)) {
    const score = scoreCandidate(filePath, query, terms);
    if (score > 0) {
      results.push({ path: filePath, score });
    }
  }

  results.sort(compareResults);
  log.debug(`Query "${query}" matched ${results.length} document(s) in ${baseDir}`);
  return results;
}

function loadResult(result: SearchResult): RecipeEntry {
  try {
    return RecipeEntry.fromPath(result.path);
  } catch (error) {
    if (error instanceof RecipeEntryError) {
      throw new SearchError(
        ErrorCodes.RECIPE_ENTRY_ERROR,
        `Failed to process recipe: ${error.message}`,
        { path: result.path, code: error.code },
        { cause: error }
      );
    }
    throw error;
  }
}

/**
 * Search `baseDir` and load the matching documents with their scores,
 * best first.
 *
 * @throws SearchError `RECIPE_ENTRY_ERROR` when a matching document cannot
 *   be loaded; the search does not skip it.
 */
export function searchScored(baseDir: string, query: string): ScoredEntry[] {
  return searchPaths(baseDir, query).map((result) => ({ entry: loadResult(result), score: result.score }));
}

/**
 * Search `baseDir` and load the matching documents, best first.
 */
export function search(baseDir: string, query: string): RecipeEntry[] {
  return searchScored(baseDir, query).map((result) => result.entry);
}
