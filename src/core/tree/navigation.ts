/**
 * Read-only helpers for walking a built recipe tree.
 */
import type { RecipeEntry } from '../entry/recipe-entry.js';
import type { RecipeTree } from './types.js';

export function getChild(tree: RecipeTree, name: string): RecipeTree | undefined {
  return tree.children.get(name);
}

/**
 * Follow child names from `tree` and return the recipe at the end, if any.
 */
export function getRecipeAtPath(tree: RecipeTree, components: readonly string[]): RecipeEntry | undefined {
  let current: RecipeTree | undefined = tree;
  for (const component of components) {
    current = current.children.get(component);
    if (!current) {
      return undefined;
    }
  }
  return current.recipe;
}

/** All nodes, pre-order, children in insertion order. */
export function allNodes(tree: RecipeTree): RecipeTree[] {
  const nodes: RecipeTree[] = [tree];
  for (const child of tree.children.values()) {
    nodes.push(...allNodes(child));
  }
  return nodes;
}

/** All recipe entries, pre-order. */
export function allRecipes(tree: RecipeTree): RecipeEntry[] {
  return allNodes(tree).flatMap((node) => (node.recipe ? [node.recipe] : []));
}

/** Number of recipe leaves in the tree. */
export function countRecipes(tree: RecipeTree): number {
  return allRecipes(tree).length;
}
