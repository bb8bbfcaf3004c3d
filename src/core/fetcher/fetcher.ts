/**
 * Resolve a recipe by name against an ordered list of directories.
 */
import * as path from 'node:path';
import { FetchError, ErrorCodes, RecipeEntryError } from '../../utils/errors.js';
import { fileExistsSync, extensionOf } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { DOCUMENT_EXTENSIONS } from '../entry/constants.js';
import { RecipeEntry } from '../entry/recipe-entry.js';

const log = logger.child('fetch');

/**
 * Candidate files for `name` inside one directory, in priority order.
 * A name with an extension is taken literally; otherwise `.cook` is
 * tried before `.menu`.
 */
export function candidatePaths(baseDir: string, name: string): string[] {
  if (extensionOf(name) !== undefined) {
    return [path.join(baseDir, name)];
  }
  return DOCUMENT_EXTENSIONS.map((extension) => path.join(baseDir, `${name}.${extension}`));
}

/**
 * Load the first recipe matching `name`. Directories are tried in order,
 * so the first directory wins when several contain the recipe.
 *
 * @throws FetchError `NOT_FOUND` when no directory has a match, or
 *   `RECIPE_ENTRY_ERROR` when the matching file cannot be loaded.
 */
export function getRecipe(baseDirs: Iterable<string>, name: string): RecipeEntry {
  for (const baseDir of baseDirs) {
    for (const candidate of candidatePaths(baseDir, name)) {
      if (!fileExistsSync(candidate)) continue;

      log.debug(`Found ${name} at ${candidate}`);
      try {
        return RecipeEntry.fromPath(candidate);
      } catch (error) {
        if (error instanceof RecipeEntryError) {
          throw new FetchError(
            ErrorCodes.RECIPE_ENTRY_ERROR,
            `Failed to load recipe: ${error.message}`,
            { name, path: candidate, code: error.code },
            { cause: error }
          );
        }
        throw error;
      }
    }
  }

  throw new FetchError(ErrorCodes.NOT_FOUND, `Recipe not found: ${name}`, { name });
}

/**
 * Like getRecipe, but a miss returns undefined instead of throwing.
 * Load failures still throw.
 */
export function findRecipe(baseDirs: Iterable<string>, name: string): RecipeEntry | undefined {
  try {
    return getRecipe(baseDirs, name);
  } catch (error) {
    if (error instanceof FetchError && error.code === ErrorCodes.NOT_FOUND) {
      return undefined;
    }
    throw error;
  }
}
