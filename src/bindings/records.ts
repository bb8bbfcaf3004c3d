/**
 * Flat, JSON-safe records for consumers outside the library (other
 * runtimes, `--json` CLI output). Nothing here is cached: every call
 * re-derives its record from the core types.
 */
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import {
  ConfigError,
  ErrorCodes,
  FetchError,
  RecipeEntryError,
  SearchError,
  TreeError,
  errorMessage,
} from '../utils/errors.js';
import type { Metadata } from '../core/metadata/metadata.js';
import type { StepImageCollection } from '../core/entry/step-images.js';
import type { RecipeEntry } from '../core/entry/recipe-entry.js';
import type { RecipeTree } from '../core/tree/types.js';

export interface MetadataRecord {
  title: string | null;
  servings: number | null;
  tags: string[];
  imageUrl: string | null;
  rawJson: string;
}

export interface StepImageRecord {
  /** 0 for recipes without sections, otherwise the one-based section. */
  section: number;
  step: number;
  imagePath: string;
}

export interface StepImagesRecord {
  images: StepImageRecord[];
  count: number;
}

export interface RecipeRecord {
  name: string | null;
  path: string | null;
  fileName: string | null;
  isMenu: boolean;
  titleImage: string | null;
  tags: string[];
  metadata: MetadataRecord;
  stepImages: StepImagesRecord;
}

export interface TreeNodeRecord {
  name: string;
  path: string;
  hasRecipe: boolean;
  children: string[];
}

export type BindingErrorKind =
  | 'NotFound'
  | 'IoError'
  | 'ParseError'
  | 'InvalidPath'
  | 'SearchError'
  | 'TreeError'
  | 'ConfigError'
  | 'Unknown';

export interface BindingError {
  kind: BindingErrorKind;
  message: string;
}

export function toMetadataRecord(metadata: Metadata): MetadataRecord {
  return {
    title: metadata.title ?? null,
    servings: metadata.servings ?? null,
    tags: metadata.tags,
    imageUrl: metadata.imageUrl ?? null,
    rawJson: JSON.stringify(metadata),
  };
}

/**
 * Step images ordered by section then step. Stored section index 0 is
 * reported as section 0; any other index as index + 1.
 */
export function toStepImagesRecord(collection: StepImageCollection): StepImagesRecord {
  const images = collection.entries().map((image) => ({
    section: image.sectionIndex === 0 ? 0 : image.sectionIndex + 1,
    step: image.stepIndex + 1,
    imagePath: image.path,
  }));
  return { images, count: images.length };
}

export function toRecipeRecord(entry: RecipeEntry): RecipeRecord {
  return {
    name: entry.name ?? null,
    path: entry.path ?? null,
    fileName: entry.fileName ?? null,
    isMenu: entry.isMenu,
    titleImage: entry.titleImage ?? null,
    tags: entry.tags,
    metadata: toMetadataRecord(entry.metadata),
    stepImages: toStepImagesRecord(entry.stepImages),
  };
}

export function toTreeNodeRecord(tree: RecipeTree): TreeNodeRecord {
  return {
    name: tree.name,
    path: tree.path,
    hasRecipe: tree.recipe !== undefined,
    children: [...tree.children.keys()],
  };
}

/**
 * JSON text of one metadata value, or null when the key is absent.
 */
export function getMetadataValue(entry: RecipeEntry, key: string): string | null {
  const value = entry.metadata.get(key);
  return value === undefined ? null : JSON.stringify(value);
}

const ENTRY_ERROR_KINDS: Record<string, BindingErrorKind> = {
  [ErrorCodes.IO_ERROR]: 'IoError',
  [ErrorCodes.INVALID_PATH]: 'InvalidPath',
  [ErrorCodes.PARSE_ERROR]: 'ParseError',
  [ErrorCodes.METADATA_ERROR]: 'ParseError',
};

/**
 * Map any thrown value to a flat error record. A fetch that found a file
 * but could not load it reports the underlying entry error.
 */
export function toBindingError(error: unknown): BindingError {
  const message = errorMessage(error);
  if (error instanceof RecipeEntryError) {
    return { kind: ENTRY_ERROR_KINDS[error.code] ?? 'Unknown', message };
  }
  if (error instanceof FetchError) {
    if (error.cause instanceof RecipeEntryError) {
      return toBindingError(error.cause);
    }
    return { kind: 'NotFound', message };
  }
  if (error instanceof SearchError) {
    return { kind: 'SearchError', message };
  }
  if (error instanceof TreeError) {
    return { kind: 'TreeError', message };
  }
  if (error instanceof ConfigError) {
    return { kind: 'ConfigError', message };
  }
  return { kind: 'Unknown', message };
}

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Version of this package, read from its package.json.
 */
export function libraryVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return PackageJsonSchema.parse(JSON.parse(readFileSync(resolve(here, '../../package.json'), 'utf-8'))).version;
}
