/**
 * Tests for recipe lookup by name.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { candidatePaths, getRecipe, findRecipe } from '../../../../src/core/fetcher/fetcher.js';
import { FetchError, RecipeEntryError, ErrorCodes } from '../../../../src/utils/errors.js';
import { createTempDir, removeTempDir, writeFiles } from '../../../helpers/fixtures.js';

describe('fetcher', () => {
  let testDir: string;
  let first: string;
  let second: string;

  beforeEach(() => {
    testDir = createTempDir('fetch');
    first = join(testDir, 'first');
    second = join(testDir, 'second');
    mkdirSync(first);
    mkdirSync(second);
  });

  afterEach(() => {
    removeTempDir(testDir);
  });

  describe('candidatePaths', () => {
    it('should try .cook before .menu for a bare name', () => {
      expect(candidatePaths('/r', 'Soup')).toEqual([join('/r', 'Soup.cook'), join('/r', 'Soup.menu')]);
    });

    it('should take a name with an extension literally', () => {
      expect(candidatePaths('/r', 'Weekly.menu')).toEqual([join('/r', 'Weekly.menu')]);
    });
  });

  describe('getRecipe', () => {
    it('should load a recipe by bare name', () => {
      writeFiles(first, { 'Soup.cook': '---\ntitle: Tomato Soup\n---\n' });
      const entry = getRecipe([first], 'Soup');
      expect(entry.path).toBe(join(first, 'Soup.cook'));
      expect(entry.name).toBe('Tomato Soup');
    });

    it('should find a menu when no recipe has the name', () => {
      writeFiles(first, { 'Weekly.menu': '' });
      const entry = getRecipe([first], 'Weekly');
      expect(entry.isMenu).toBe(true);
    });

    it('should prefer the recipe over a menu of the same name', () => {
      writeFiles(first, { 'Plan.cook': '', 'Plan.menu': '' });
      expect(getRecipe([first], 'Plan').path).toBe(join(first, 'Plan.cook'));
    });

    it('should load a name with an explicit extension', () => {
      writeFiles(first, { 'Plan.cook': '', 'Plan.menu': '' });
      expect(getRecipe([first], 'Plan.menu').path).toBe(join(first, 'Plan.menu'));
    });

    it('should resolve names with subdirectories', () => {
      writeFiles(first, { 'soups/Minestrone.cook': '' });
      expect(getRecipe([first], 'soups/Minestrone').path).toBe(join(first, 'soups', 'Minestrone.cook'));
    });

    it('should let the first root win', () => {
      writeFiles(first, { 'Soup.cook': '' });
      writeFiles(second, { 'Soup.cook': '' });
      expect(getRecipe([first, second], 'Soup').path).toBe(join(first, 'Soup.cook'));
      expect(getRecipe([second, first], 'Soup').path).toBe(join(second, 'Soup.cook'));
    });

    it('should prefer a menu in an earlier root over a recipe in a later one', () => {
      writeFiles(first, { 'Plan.menu': '' });
      writeFiles(second, { 'Plan.cook': '' });
      expect(getRecipe([first, second], 'Plan').path).toBe(join(first, 'Plan.menu'));
    });

    it('should fall through to later roots', () => {
      writeFiles(second, { 'Stew.cook': '' });
      expect(getRecipe([first, second], 'Stew').path).toBe(join(second, 'Stew.cook'));
    });

    it('should throw NOT_FOUND when nothing matches', () => {
      try {
        getRecipe([first, second], 'Nothing');
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(FetchError);
        expect(error).toHaveProperty('code', ErrorCodes.NOT_FOUND);
        expect(error).toHaveProperty('message', 'Recipe not found: Nothing');
      }
    });

    it('should wrap load failures of a matching path', () => {
      mkdirSync(join(first, 'Broken.cook'));
      try {
        getRecipe([first], 'Broken');
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(FetchError);
        expect(error).toHaveProperty('code', ErrorCodes.RECIPE_ENTRY_ERROR);
        expect(error).toHaveProperty('cause');
        expect(error instanceof FetchError && error.cause instanceof RecipeEntryError).toBe(true);
      }
    });
  });

  describe('findRecipe', () => {
    it('should return undefined on a miss', () => {
      expect(findRecipe([first], 'Nothing')).toBeUndefined();
    });

    it('should return the entry on a hit', () => {
      writeFiles(first, { 'Soup.cook': '' });
      expect(findRecipe([first], 'Soup')?.name).toBe('Soup');
    });
  });
});
