/**
 * Step images attached to a recipe by file name:
 *
 *   Pancakes.3.jpg     step 3 of a recipe without sections
 *   Pancakes.2.4.jpg   step 4 of section 2
 *
 * Storage is zero-based; section index 0 doubles as "no section".
 * The public accessor is one-based.
 */
import * as path from 'node:path';
import { fileStem, listDirectorySync } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { IMAGE_EXTENSIONS } from './constants.js';

const log = logger.child('step-images');

const NUMERIC_GROUP = /^\d+$/;

export interface StepImageSlot {
  /** Zero-based section index; 0 also covers recipes without sections. */
  sectionIndex: number;
  /** Zero-based step index. */
  stepIndex: number;
}

export interface StepImage extends StepImageSlot {
  path: string;
}

export class StepImageCollection {
  private readonly images = new Map<number, Map<number, string>>();

  /**
   * Store an image unless the slot is already taken.
   * Returns whether the image was stored.
   */
  insert(sectionIndex: number, stepIndex: number, imagePath: string): boolean {
    let steps = this.images.get(sectionIndex);
    if (!steps) {
      steps = new Map();
      this.images.set(sectionIndex, steps);
    }
    if (steps.has(stepIndex)) {
      return false;
    }
    steps.set(stepIndex, imagePath);
    return true;
  }

  /**
   * Image for a one-based step. Section 0 and section 1 both address the
   * first stored section; step must be at least 1.
   */
  get(section: number, step: number): string | undefined {
    if (!Number.isInteger(section) || !Number.isInteger(step) || section < 0 || step < 1) {
      return undefined;
    }
    const sectionIndex = section === 0 ? 0 : section - 1;
    return this.images.get(sectionIndex)?.get(step - 1);
  }

  get size(): number {
    let count = 0;
    for (const steps of this.images.values()) {
      count += steps.size;
    }
    return count;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  /** All images ordered by section, then step. */
  entries(): StepImage[] {
    const result: StepImage[] = [];
    for (const [sectionIndex, steps] of this.images) {
      for (const [stepIndex, imagePath] of steps) {
        result.push({ sectionIndex, stepIndex, path: imagePath });
      }
    }
    return result.sort((a, b) => a.sectionIndex - b.sectionIndex || a.stepIndex - b.stepIndex);
  }

  paths(): string[] {
    return this.entries().map((image) => image.path);
  }
}

/**
 * Parse an image file name against a recipe stem.
 * Accepts `<stem>.<N>.<ext>` and `<stem>.<S>.<N>.<ext>` with every number >= 1.
 */
export function parseStepImageName(
  fileName: string,
  stem: string,
  extension: string
): StepImageSlot | undefined {
  const prefix = `${stem}.`;
  const suffix = `.${extension}`;
  if (
    fileName.length <= prefix.length + suffix.length ||
    !fileName.startsWith(prefix) ||
    !fileName.endsWith(suffix)
  ) {
    return undefined;
  }

  const groups = fileName.slice(prefix.length, fileName.length - suffix.length).split('.');
  if (groups.length > 2 || !groups.every((group) => NUMERIC_GROUP.test(group))) {
    return undefined;
  }

  const numbers = groups.map((group) => Number.parseInt(group, 10));
  if (numbers.some((n) => !Number.isSafeInteger(n) || n < 1)) {
    return undefined;
  }

  const [first, second] = numbers;
  return second === undefined
    ? { sectionIndex: 0, stepIndex: first - 1 }
    : { sectionIndex: first - 1, stepIndex: second - 1 };
}

/**
 * Discover the step images next to a recipe file.
 * Extensions are tried in priority order and a slot keeps its first image,
 * so `jpg` beats `png` for the same step. An unreadable directory yields
 * an empty collection.
 */
export function discoverStepImages(recipePath: string): StepImageCollection {
  const collection = new StepImageCollection();
  const dir = path.dirname(recipePath);
  const stem = fileStem(recipePath);

  let fileNames: string[];
  try {
    fileNames = listDirectorySync(dir);
  } catch (error) {
    log.debug(`Cannot list ${dir}: ${errorMessage(error)}`);
    return collection;
  }

  for (const extension of IMAGE_EXTENSIONS) {
    for (const fileName of fileNames) {
      const slot = parseStepImageName(fileName, stem, extension);
      if (slot) {
        collection.insert(slot.sectionIndex, slot.stepIndex, path.join(dir, fileName));
      }
    }
  }
  return collection;
}
