/**
 * Error types and codes for cookfind.
 * Every error raised by the library extends CookfindError.
 */

/**
 * Base error class for all cookfind errors.
 */
export class CookfindError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CookfindError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Failures while loading a single recipe document.
 */
export class RecipeEntryError extends CookfindError {
  constructor(code: string, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(code, message, details, options);
    this.name = 'RecipeEntryError';
  }
}

/**
 * Failures while resolving a recipe by name.
 */
export class FetchError extends CookfindError {
  constructor(code: string, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(code, message, details, options);
    this.name = 'FetchError';
  }
}

/**
 * Failures while searching a directory.
 */
export class SearchError extends CookfindError {
  constructor(code: string, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(code, message, details, options);
    this.name = 'SearchError';
  }
}

/**
 * Failures while building a recipe tree.
 */
export class TreeError extends CookfindError {
  constructor(code: string, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(code, message, details, options);
    this.name = 'TreeError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends CookfindError {
  constructor(code: string, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(code, message, details, options);
    this.name = 'ConfigError';
  }
}

export const ErrorCodes = {
  // Recipe entry
  IO_ERROR: 'IO_ERROR',
  INVALID_PATH: 'INVALID_PATH',
  PARSE_ERROR: 'PARSE_ERROR',
  METADATA_ERROR: 'METADATA_ERROR',

  // Fetch / search / tree
  NOT_FOUND: 'NOT_FOUND',
  RECIPE_ENTRY_ERROR: 'RECIPE_ENTRY_ERROR',
  PATTERN_ERROR: 'PATTERN_ERROR',
  DIRECTORY_NOT_FOUND: 'DIRECTORY_NOT_FOUND',
  NOT_A_DIRECTORY: 'NOT_A_DIRECTORY',
  STRIP_PREFIX_ERROR: 'STRIP_PREFIX_ERROR',

  // Config
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
