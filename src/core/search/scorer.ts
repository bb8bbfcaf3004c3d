/**
 * Relevance scoring for recipe search.
 *
 * Two additive signals: how the whole query compares to the file stem, and
 * how often the individual query terms occur in the file.
 */
import { errorMessage } from '../../utils/errors.js';
import { fileStem, readLinesSync } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import {
  CONTENT_MATCH_BASE_SCORE,
  CONTENT_MATCH_MAX_BONUS,
  CONTENT_MATCH_WEIGHT,
  FILENAME_EXACT_SCORE,
  FILENAME_PARTIAL_SCORE,
} from './types.js';

const log = logger.child('search');

/**
 * Lower-cased whitespace-separated query terms.
 */
export function tokenizeQuery(query: string): string[] {
  return query
    .toLowerCase()
    .split(/\s+/)
    .filter((term) => term.length > 0);
}

/**
 * 20 when the stem equals the query, 10 when it contains it, else 0.
 * Comparison is case-insensitive and uses the query as a whole.
 */
export function scoreFilename(filePath: string, query: string): number {
  const stem = fileStem(filePath).toLowerCase();
  const needle = query.toLowerCase();
  if (stem === needle) {
    return FILENAME_EXACT_SCORE;
  }
  if (stem.includes(needle)) {
    return FILENAME_PARTIAL_SCORE;
  }
  return 0;
}

/**
 * Occurrences of `term` in `text`, overlapping ones included.
 */
export function countOccurrences(text: string, term: string): number {
  if (term.length === 0) {
    return 0;
  }
  let count = 0;
  let index = text.indexOf(term);
  while (index !== -1) {
    count++;
    index = text.indexOf(term, index + 1);
  }
  return count;
}

/**
 * Total occurrences of all terms over all lines, case-insensitively.
 */
export function countMatches(lines: Iterable<string>, terms: readonly string[]): number {
  let total = 0;
  for (const line of lines) {
    const lower = line.toLowerCase();
    for (const term of terms) {
      total += countOccurrences(lower, term);
    }
  }
  return total;
}

/**
 * Content signal for a match count: 0 without matches, otherwise
 * 1 plus 0.1 per match, the per-match part capped at 5.
 */
export function contentScore(matches: number): number {
  if (matches <= 0) {
    return 0;
  }
  return CONTENT_MATCH_BASE_SCORE + Math.min(CONTENT_MATCH_WEIGHT * matches, CONTENT_MATCH_MAX_BONUS);
}

/**
 * Content signal of a file. Throws when the file cannot be read.
 */
export function scoreContent(filePath: string, terms: readonly string[]): number {
  return contentScore(countMatches(readLinesSync(filePath), terms));
}

/**
 * Total score of one candidate file. A file that cannot be read scores on
 * its name alone.
 */
export function scoreCandidate(filePath: string, query: string, terms = tokenizeQuery(query)): number {
  let score = scoreFilename(filePath, query);
  try {
    score += scoreContent(filePath, terms);
  } catch (error) {
    log.debug(`Skipping content of ${filePath}: ${errorMessage(error)}`);
  }
  return score;
}
