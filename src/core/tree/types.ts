import type { RecipeEntry } from '../entry/recipe-entry.js';

/**
 * A node of the recipe tree: a directory (with children) or a recipe leaf
 * (with an entry). Children are keyed by name.
 */
export interface RecipeTree {
  readonly name: string;
  readonly path: string;
  readonly recipe?: RecipeEntry;
  readonly children: ReadonlyMap<string, RecipeTree>;
}
