/**
 * Tests for title image lookup.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { findTitleImage, isRemoteImage, localImagePath } from '../../../../src/core/entry/images.js';
import { createTempDir, removeTempDir, writeFiles } from '../../../helpers/fixtures.js';

describe('title images', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = createTempDir('images');
  });

  afterEach(() => {
    removeTempDir(testDir);
  });

  describe('findTitleImage', () => {
    it('should find a sibling image with the same stem', () => {
      writeFiles(testDir, { 'Soup.cook': '', 'Soup.png': '' });
      expect(findTitleImage(join(testDir, 'Soup.cook'))).toBe(join(testDir, 'Soup.png'));
    });

    it('should prefer jpg over png', () => {
      writeFiles(testDir, { 'Soup.cook': '', 'Soup.png': '', 'Soup.jpg': '' });
      expect(findTitleImage(join(testDir, 'Soup.cook'))).toBe(join(testDir, 'Soup.jpg'));
    });

    it('should ignore step images and directories', () => {
      writeFiles(testDir, { 'Soup.cook': '', 'Soup.1.jpg': '', 'Soup.webp/placeholder': '' });
      expect(findTitleImage(join(testDir, 'Soup.cook'))).toBeUndefined();
    });
  });

  describe('isRemoteImage', () => {
    it('should recognise URLs', () => {
      expect(isRemoteImage('https://example.com/soup.jpg')).toBe(true);
      expect(isRemoteImage('soup.jpg')).toBe(false);
      expect(isRemoteImage('./img/soup.jpg')).toBe(false);
    });
  });

  describe('localImagePath', () => {
    it('should resolve a relative path against the document directory', () => {
      writeFiles(testDir, { 'img/soup.jpg': '' });
      expect(localImagePath('img/soup.jpg', testDir)).toBe(join(testDir, 'img', 'soup.jpg'));
    });

    it('should keep an existing absolute path', () => {
      writeFiles(testDir, { 'soup.jpg': '' });
      const absolute = join(testDir, 'soup.jpg');
      expect(localImagePath(absolute, '/elsewhere')).toBe(absolute);
    });

    it('should skip URLs and missing files', () => {
      expect(localImagePath('https://example.com/soup.jpg', testDir)).toBeUndefined();
      expect(localImagePath('missing.jpg', testDir)).toBeUndefined();
    });
  });
});
