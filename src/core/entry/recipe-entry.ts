/**
 * A single recipe or menu document, backed by a file or by in-memory text.
 *
 * Source and metadata are fixed at construction. Everything else is derived
 * on first access and memoized for the life of the entry, except `content()`,
 * which re-reads a file-backed document on every call.
 */
import * as path from 'node:path';
import { RecipeEntryError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { extensionOf, fileStem, readFileSync, readLinesSync } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { Once } from '../../utils/once.js';
import { Metadata, extractMetadata, extractMetadataFromContent } from '../metadata/index.js';
import { MENU_EXTENSION } from './constants.js';
import { findTitleImage, localImagePath } from './images.js';
import { collectRelatedFiles, type RelatedFilesNode } from './related-files.js';
import { cloneSource, contentSource, pathSource, type RecipeSource } from './source.js';
import { StepImageCollection, discoverStepImages } from './step-images.js';

const log = logger.child('entry');

export class RecipeEntry implements RelatedFilesNode {
  private readonly cachedName = new Once(() => this.computeName());
  private readonly cachedTitleImage = new Once(() => this.computeTitleImage());
  private readonly cachedLocalTitleImage = new Once(() => this.computeLocalTitleImage());
  private readonly cachedIsMenu = new Once(() => this.computeIsMenu());
  private readonly cachedStepImages = new Once(() => this.computeStepImages());
  private readonly cachedRelatedFiles = new Once(() => this.computeRelatedFiles());

  private constructor(
    readonly source: RecipeSource,
    readonly metadata: Metadata
  ) {}

  /**
   * Load a document from disk. Only the leading frontmatter lines are read.
   *
   * @throws RecipeEntryError `INVALID_PATH` when the path has no file stem,
   *   `IO_ERROR` when the file cannot be read.
   */
  static fromPath(filePath: string): RecipeEntry {
    if (fileStem(filePath) === '') {
      throw new RecipeEntryError(
        ErrorCodes.INVALID_PATH,
        `Failed to get file stem from path: ${filePath}`,
        { path: filePath }
      );
    }

    let metadata: Metadata;
    try {
      metadata = extractMetadata(readLinesSync(filePath));
    } catch (error) {
      throw new RecipeEntryError(
        ErrorCodes.IO_ERROR,
        `Failed to read recipe file: ${filePath}: ${errorMessage(error)}`,
        { path: filePath },
        { cause: error }
      );
    }
    return new RecipeEntry(pathSource(filePath), metadata);
  }

  /**
   * Create an entry from in-memory text, optionally naming it.
   */
  static fromContent(content: string, name?: string): RecipeEntry {
    return new RecipeEntry(contentSource(content, name), extractMetadataFromContent(content));
  }

  /** File path of a file-backed entry. */
  get path(): string | undefined {
    return this.source.kind === 'path' ? this.source.path : undefined;
  }

  /** File name with extension of a file-backed entry. */
  get fileName(): string | undefined {
    return this.source.kind === 'path' ? path.basename(this.source.path) : undefined;
  }

  /**
   * Display name: the metadata title, else the file stem, else the name
   * given to `fromContent`.
   */
  get name(): string | undefined {
    return this.cachedName.get();
  }

  /**
   * Title image: the metadata image reference, else a sibling image with the
   * recipe's stem (`jpg`, `jpeg`, `png`, `webp`, in that order).
   */
  get titleImage(): string | undefined {
    return this.cachedTitleImage.get();
  }

  /** The title image when it is a file that exists on disk. */
  get localTitleImage(): string | undefined {
    return this.cachedLocalTitleImage.get();
  }

  get isMenu(): boolean {
    return this.cachedIsMenu.get();
  }

  get stepImages(): StepImageCollection {
    return this.cachedStepImages.get();
  }

  /** Images and referenced recipes reachable from this document. */
  get relatedFiles(): readonly string[] {
    return this.cachedRelatedFiles.get();
  }

  get tags(): string[] {
    return this.metadata.tags;
  }

  /** Image for a one-based section and step. */
  stepImage(section: number, step: number): string | undefined {
    return this.stepImages.get(section, step);
  }

  /**
   * Full document text. File-backed entries read the file on every call.
   *
   * @throws RecipeEntryError `IO_ERROR` when the file has become unreadable.
   */
  content(): string {
    switch (this.source.kind) {
      case 'content':
        return this.source.content;
      case 'path':
        try {
          return readFileSync(this.source.path);
        } catch (error) {
          throw new RecipeEntryError(
            ErrorCodes.IO_ERROR,
            `Failed to read recipe file: ${this.source.path}: ${errorMessage(error)}`,
            { path: this.source.path },
            { cause: error }
          );
        }
    }
  }

  /**
   * Copy with deep-copied source and metadata. Derived fields are not
   * shared; the copy computes its own.
   */
  clone(): RecipeEntry {
    return new RecipeEntry(cloneSource(this.source), this.metadata.clone());
  }

  private computeName(): string | undefined {
    const title = this.metadata.title;
    if (title !== undefined) {
      return title;
    }
    switch (this.source.kind) {
      case 'path':
        return fileStem(this.source.path);
      case 'content':
        return this.source.name;
    }
  }

  private computeTitleImage(): string | undefined {
    const fromMetadata = this.metadata.imageUrl;
    if (fromMetadata !== undefined) {
      return fromMetadata;
    }
    switch (this.source.kind) {
      case 'path':
        return findTitleImage(this.source.path);
      case 'content':
        return undefined;
    }
  }

  private computeLocalTitleImage(): string | undefined {
    const image = this.titleImage;
    if (image === undefined) {
      return undefined;
    }
    switch (this.source.kind) {
      case 'path':
        return this.metadata.imageUrl === undefined
          ? image
          : localImagePath(image, path.dirname(this.source.path));
      case 'content':
        return undefined;
    }
  }

  private computeIsMenu(): boolean {
    switch (this.source.kind) {
      case 'path':
        return extensionOf(this.source.path) === MENU_EXTENSION;
      case 'content':
        return false;
    }
  }

  private computeStepImages(): StepImageCollection {
    switch (this.source.kind) {
      case 'path':
        return discoverStepImages(this.source.path);
      case 'content':
        return new StepImageCollection();
    }
  }

  private computeRelatedFiles(): string[] {
    return collectRelatedFiles(this, (filePath) => {
      try {
        return RecipeEntry.fromPath(filePath);
      } catch (error) {
        log.debug(`Cannot load referenced recipe ${filePath}: ${errorMessage(error)}`);
        return undefined;
      }
    });
  }
}
