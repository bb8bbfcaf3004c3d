import type { RecipeEntry } from '../entry/recipe-entry.js';

/**
 * A scored search candidate.
 */
export interface SearchResult {
  path: string;
  score: number;
}

export interface ScoredEntry {
  entry: RecipeEntry;
  score: number;
}

/** Filename signal weights. */
export const FILENAME_EXACT_SCORE = 20.0;
export const FILENAME_PARTIAL_SCORE = 10.0;

/** Content signal: flat bonus for any match plus a capped density bonus. */
export const CONTENT_MATCH_BASE_SCORE = 1.0;
export const CONTENT_MATCH_WEIGHT = 0.1;
export const CONTENT_MATCH_MAX_BONUS = 5.0;
