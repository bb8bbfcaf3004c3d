/**
 * Cross-references between recipe documents.
 *
 * An ingredient such as `@./sauces/Hollandaise{150%g}` points at another
 * recipe file relative to the referencing document.
 */
import * as path from 'node:path';
import { extensionOf, isFileSync } from '../../utils/file-system.js';
import { RECIPE_EXTENSION } from './constants.js';

const REFERENCE_PATTERN = /@(\.{1,2}\/[^\s{]+)/g;

/**
 * Reference paths in order of first appearance, without duplicates.
 */
export function extractReferences(text: string): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(REFERENCE_PATTERN)) {
    seen.add(match[1]);
  }
  return [...seen];
}

/**
 * Resolve a reference against the referencing document's directory.
 * References without an extension point at a `.cook` file. Returns
 * undefined when the target does not exist.
 */
export function resolveReference(documentDir: string, reference: string): string | undefined {
  let target = path.join(documentDir, reference);
  if (!extensionOf(reference)) {
    target = `${target}.${RECIPE_EXTENSION}`;
  }
  return isFileSync(target) ? target : undefined;
}
