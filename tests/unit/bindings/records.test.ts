/**
 * Tests for flat record conversion.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import {
  toMetadataRecord,
  toStepImagesRecord,
  toRecipeRecord,
  toTreeNodeRecord,
  getMetadataValue,
  toBindingError,
  libraryVersion,
} from '../../../src/bindings/records.js';
import { Metadata } from '../../../src/core/metadata/metadata.js';
import { RecipeEntry } from '../../../src/core/entry/recipe-entry.js';
import { StepImageCollection } from '../../../src/core/entry/step-images.js';
import { buildTree } from '../../../src/core/tree/builder.js';
import {
  ConfigError,
  ErrorCodes,
  FetchError,
  RecipeEntryError,
  SearchError,
  TreeError,
} from '../../../src/utils/errors.js';
import { createTempDir, removeTempDir, writeFiles } from '../../helpers/fixtures.js';

describe('records', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = createTempDir('records');
  });

  afterEach(() => {
    removeTempDir(testDir);
  });

  describe('toMetadataRecord', () => {
    it('should flatten typed fields and keep raw JSON', () => {
      const record = toMetadataRecord(new Metadata({ title: 'Soup', servings: 2, tags: 'a, b', image: 'soup.jpg' }));
      expect(record).toEqual({
        title: 'Soup',
        servings: 2,
        tags: ['a', 'b'],
        imageUrl: 'soup.jpg',
        rawJson: '{"title":"Soup","servings":2,"tags":"a, b","image":"soup.jpg"}',
      });
    });

    it('should use null for missing fields', () => {
      expect(toMetadataRecord(Metadata.empty())).toEqual({
        title: null,
        servings: null,
        tags: [],
        imageUrl: null,
        rawJson: '{}',
      });
    });
  });

  describe('toStepImagesRecord', () => {
    it('should report one-based steps and sections', () => {
      const collection = new StepImageCollection();
      collection.insert(1, 3, 's2.jpg');
      collection.insert(0, 0, 'linear.jpg');
      expect(toStepImagesRecord(collection)).toEqual({
        images: [
          { section: 0, step: 1, imagePath: 'linear.jpg' },
          { section: 2, step: 4, imagePath: 's2.jpg' },
        ],
        count: 2,
      });
    });
  });

  describe('toRecipeRecord', () => {
    it('should describe a file-backed entry', () => {
      writeFiles(testDir, { 'Soup.menu': '---\ntags: [warm]\n---\n', 'Soup.png': '', 'Soup.1.jpg': '' });
      const record = toRecipeRecord(RecipeEntry.fromPath(join(testDir, 'Soup.menu')));
      expect(record).toEqual({
        name: 'Soup',
        path: join(testDir, 'Soup.menu'),
        fileName: 'Soup.menu',
        isMenu: true,
        titleImage: join(testDir, 'Soup.png'),
        tags: ['warm'],
        metadata: {
          title: null,
          servings: null,
          tags: ['warm'],
          imageUrl: null,
          rawJson: '{"tags":["warm"]}',
        },
        stepImages: { images: [{ section: 0, step: 1, imagePath: join(testDir, 'Soup.1.jpg') }], count: 1 },
      });
    });

    it('should use null for content-backed fields', () => {
      const record = toRecipeRecord(RecipeEntry.fromContent('Boil.'));
      expect(record.name).toBeNull();
      expect(record.path).toBeNull();
      expect(record.fileName).toBeNull();
      expect(record.titleImage).toBeNull();
    });
  });

  describe('toTreeNodeRecord', () => {
    it('should list child names', () => {
      writeFiles(testDir, { 'a/pancakes.cook': '' });
      const tree = buildTree(testDir);
      expect(toTreeNodeRecord(tree)).toEqual({
        name: tree.name,
        path: testDir,
        hasRecipe: false,
        children: ['a'],
      });
      const a = tree.children.get('a');
      const leaf = a?.children.get('pancakes');
      expect(leaf && toTreeNodeRecord(leaf)).toEqual({
        name: 'pancakes',
        path: join(testDir, 'a', 'pancakes.cook'),
        hasRecipe: true,
        children: [],
      });
    });
  });

  describe('getMetadataValue', () => {
    it('should return JSON text or null', () => {
      const entry = RecipeEntry.fromContent('---\ncuisine: thai\nsteps: [1, 2]\n---\n');
      expect(getMetadataValue(entry, 'cuisine')).toBe('"thai"');
      expect(getMetadataValue(entry, 'steps')).toBe('[1,2]');
      expect(getMetadataValue(entry, 'missing')).toBeNull();
    });
  });

  describe('toBindingError', () => {
    it('should map entry errors by code', () => {
      expect(toBindingError(new RecipeEntryError(ErrorCodes.IO_ERROR, 'io')).kind).toBe('IoError');
      expect(toBindingError(new RecipeEntryError(ErrorCodes.INVALID_PATH, 'p')).kind).toBe('InvalidPath');
      expect(toBindingError(new RecipeEntryError(ErrorCodes.PARSE_ERROR, 'y')).kind).toBe('ParseError');
    });

    it('should map a fetch miss to NotFound', () => {
      expect(toBindingError(new FetchError(ErrorCodes.NOT_FOUND, 'Recipe not found: x'))).toEqual({
        kind: 'NotFound',
        message: 'Recipe not found: x',
      });
    });

    it('should report the entry error behind a fetch failure', () => {
      const cause = new RecipeEntryError(ErrorCodes.IO_ERROR, 'cannot read');
      const error = new FetchError(ErrorCodes.RECIPE_ENTRY_ERROR, 'Failed to load recipe', undefined, { cause });
      expect(toBindingError(error)).toEqual({ kind: 'IoError', message: 'cannot read' });
    });

    it('should map search, tree and config errors', () => {
      expect(toBindingError(new SearchError(ErrorCodes.PATTERN_ERROR, 's')).kind).toBe('SearchError');
      expect(toBindingError(new TreeError(ErrorCodes.NOT_A_DIRECTORY, 't')).kind).toBe('TreeError');
      expect(toBindingError(new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, 'c')).kind).toBe('ConfigError');
    });

    it('should map anything else to Unknown', () => {
      expect(toBindingError('oops')).toEqual({ kind: 'Unknown', message: 'oops' });
    });
  });

  describe('libraryVersion', () => {
    it('should return a semantic version', () => {
      expect(libraryVersion()).toMatch(/^\d+\.\d+\.\d+/);
    });
  });
});
