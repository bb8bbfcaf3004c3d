/**
 * Tests for tree navigation helpers.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { buildTree } from '../../../../src/core/tree/builder.js';
import {
  getChild,
  getRecipeAtPath,
  allNodes,
  allRecipes,
  countRecipes,
} from '../../../../src/core/tree/navigation.js';
import type { RecipeTree } from '../../../../src/core/tree/types.js';
import { createTempDir, removeTempDir, writeFiles } from '../../../helpers/fixtures.js';

describe('tree navigation', () => {
  let testDir: string;
  let tree: RecipeTree;

  beforeEach(() => {
    testDir = createTempDir('nav');
    writeFiles(testDir, {
      'breakfast/pancakes.cook': '',
      'breakfast/eggs/omelette.cook': '',
      'dinner/stew.cook': '',
    });
    tree = buildTree(testDir);
  });

  afterEach(() => {
    removeTempDir(testDir);
  });

  it('should get a direct child', () => {
    expect(getChild(tree, 'dinner')?.path).toBe(join(testDir, 'dinner'));
    expect(getChild(tree, 'lunch')).toBeUndefined();
  });

  it('should follow a path to a recipe', () => {
    expect(getRecipeAtPath(tree, ['breakfast', 'eggs', 'omelette'])?.path).toBe(
      join(testDir, 'breakfast', 'eggs', 'omelette.cook')
    );
  });

  it('should return undefined for directories and missing paths', () => {
    expect(getRecipeAtPath(tree, ['breakfast'])).toBeUndefined();
    expect(getRecipeAtPath(tree, ['breakfast', 'waffles'])).toBeUndefined();
  });

  it('should walk every node in pre-order', () => {
    const names = allNodes(tree).map((node) => node.name);
    expect(names).toHaveLength(7);
    expect(names[0]).toBe(tree.name);
    expect(names.indexOf('eggs')).toBeLessThan(names.indexOf('omelette'));
  });

  it('should collect and count recipes', () => {
    expect(allRecipes(tree).map((r) => r.name).sort()).toEqual(['omelette', 'pancakes', 'stew']);
    expect(countRecipes(tree)).toBe(3);
  });
});
