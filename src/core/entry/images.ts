/**
 * Title image lookup by file name convention.
 */
import * as path from 'node:path';
import { isFileSync, withExtension } from '../../utils/file-system.js';
import { IMAGE_EXTENSIONS } from './constants.js';

const URL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Find a sibling image sharing the recipe's stem, e.g. `Pancakes.jpg` for
 * `Pancakes.cook`. The first existing extension in priority order wins.
 */
export function findTitleImage(recipePath: string): string | undefined {
  for (const extension of IMAGE_EXTENSIONS) {
    const imagePath = withExtension(recipePath, extension);
    if (isFileSync(imagePath)) {
      return imagePath;
    }
  }
  return undefined;
}

export function isRemoteImage(image: string): boolean {
  return URL_SCHEME.test(image);
}

/**
 * Resolve a title image to a local file, if it is one.
 * Metadata images may be URLs or paths relative to the document.
 */
export function localImagePath(image: string, documentDir: string): string | undefined {
  if (isRemoteImage(image)) {
    return undefined;
  }
  const resolved = path.isAbsolute(image) ? image : path.join(documentDir, image);
  return isFileSync(resolved) ? resolved : undefined;
}
