/**
 * Transitive closure of the files a recipe depends on: its title image,
 * its step images, and the recipes it references (with their own images
 * and references, recursively).
 */
import * as path from 'node:path';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { extractReferences, resolveReference } from './references.js';
import type { StepImageCollection } from './step-images.js';

const log = logger.child('related-files');

/** The parts of a recipe entry the traversal looks at. */
export interface RelatedFilesNode {
  readonly path: string | undefined;
  /** Title image when it is a file on disk, not a URL. */
  readonly localTitleImage: string | undefined;
  readonly stepImages: StepImageCollection;
  content(): string;
}

export type RelatedFilesLoader = (filePath: string) => RelatedFilesNode | undefined;

/**
 * Walk the reference graph depth-first from `root`.
 *
 * Each file appears once, in discovery order: a node's title image and
 * step images come before anything reached through its references.
 * The root document itself is never part of the result. Missing or
 * unreadable references contribute nothing.
 */
export function collectRelatedFiles(root: RelatedFilesNode, load: RelatedFilesLoader): string[] {
  if (root.path === undefined) {
    return [];
  }

  const visited = new Set<string>([path.resolve(root.path)]);
  const related: string[] = [];

  const add = (filePath: string): boolean => {
    const key = path.resolve(filePath);
    if (visited.has(key)) {
      return false;
    }
    visited.add(key);
    related.push(filePath);
    return true;
  };

  const visit = (node: RelatedFilesNode, nodePath: string): void => {
    const dir = path.dirname(nodePath);

    if (node.localTitleImage !== undefined) {
      add(node.localTitleImage);
    }
    for (const image of node.stepImages.paths()) {
      add(image);
    }

    let text: string;
    try {
      text = node.content();
    } catch (error) {
      log.debug(`Skipping references of ${nodePath}: ${errorMessage(error)}`);
      return;
    }

    for (const reference of extractReferences(text)) {
      const target = resolveReference(dir, reference);
      if (target === undefined) {
        log.debug(`Unresolved reference ${reference} in ${nodePath}`);
        continue;
      }
      if (!add(target)) {
        continue;
      }
      const child = load(target);
      if (child) {
        visit(child, target);
      }
    }
  };

  visit(root, root.path);
  return related;
}
