/**
 * Builds a tree of recipes mirroring the directory layout below a root.
 */
import * as path from 'node:path';
import { ErrorCodes, RecipeEntryError, TreeError, errorMessage } from '../../utils/errors.js';
import { fileStem, fileExistsSync, globFilesSync, isDirectorySync, isWithin } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { RECIPE_EXTENSION } from '../entry/constants.js';
import { RecipeEntry } from '../entry/recipe-entry.js';
import type { RecipeTree } from './types.js';

const log = logger.child('tree');

/** Mutable node used while the tree is assembled. */
interface TreeNodeDraft {
  name: string;
  path: string;
  recipe?: RecipeEntry;
  children: Map<string, TreeNodeDraft>;
}

function directoryNode(name: string, nodePath: string): TreeNodeDraft {
  return { name, path: nodePath, children: new Map() };
}

/** Base name of the root as given; `./` for `.`, `..` and `/`. */
function rootName(baseDir: string): string {
  const base = path.basename(baseDir);
  return base === '' || base === '.' || base === '..' ? './' : base;
}

function listRecipes(baseDir: string): string[] {
  try {
    return globFilesSync(`**/*.${RECIPE_EXTENSION}`, { cwd: baseDir, dot: true }).sort();
  } catch (error) {
    throw new TreeError(
      ErrorCodes.PATTERN_ERROR,
      `Failed to read directory: ${baseDir}: ${errorMessage(error)}`,
      { baseDir },
      { cause: error }
    );
  }
}

function loadRecipe(filePath: string): RecipeEntry {
  try {
    return RecipeEntry.fromPath(filePath);
  } catch (error) {
    if (error instanceof RecipeEntryError) {
      throw new TreeError(
        ErrorCodes.RECIPE_ENTRY_ERROR,
        `Failed to process recipe: ${error.message}`,
        { path: filePath, code: error.code },
        { cause: error }
      );
    }
    throw error;
  }
}

/**
 * Build the recipe tree of `baseDir`.
 *
 * Every `.cook` file becomes a leaf named by its entry name (the metadata
 * title when present), placed under one directory node per path component.
 * Directories without recipes do not appear.
 *
 * @throws TreeError `DIRECTORY_NOT_FOUND`, `NOT_A_DIRECTORY`,
 *   `STRIP_PREFIX_ERROR` or `RECIPE_ENTRY_ERROR`.
 */
export function buildTree(baseDir: string): RecipeTree {
  if (!fileExistsSync(baseDir)) {
    throw new TreeError(ErrorCodes.DIRECTORY_NOT_FOUND, `Directory does not exist: ${baseDir}`, { baseDir });
  }
  if (!isDirectorySync(baseDir)) {
    throw new TreeError(ErrorCodes.NOT_A_DIRECTORY, `Path is not a directory: ${baseDir}`, { baseDir });
  }

  const absoluteBase = path.resolve(baseDir);
  const root = directoryNode(rootName(baseDir), baseDir);
  const recipePaths = listRecipes(baseDir);

  for (const absolutePath of recipePaths) {
    if (!isWithin(absoluteBase, absolutePath)) {
      throw new TreeError(
        ErrorCodes.STRIP_PREFIX_ERROR,
        `Failed to strip prefix from path: ${absolutePath}`,
        { baseDir, path: absolutePath }
      );
    }
    const relative = path.relative(absoluteBase, absolutePath);
    const recipePath = path.join(baseDir, relative);
    const recipe = loadRecipe(recipePath);

    let current = root;
    const components = path.dirname(relative).split(path.sep).filter((part) => part !== '.' && part !== '');
    for (const component of components) {
      let child = current.children.get(component);
      if (!child) {
        child = directoryNode(component, path.join(current.path, component));
        current.children.set(component, child);
      }
      current = child;
    }

    const name = recipe.name ?? fileStem(recipePath);
    current.children.set(name, { name, path: recipePath, recipe, children: new Map() });
  }

  log.debug(`Built tree of ${recipePaths.length} recipe(s) under ${baseDir}`);
  return root;
}
