/**
 * cookfind - find, search and organize Cooklang recipe files.
 * Main library exports barrel file.
 */

// Metadata
export * from './core/metadata/index.js';

// Recipe entries
export * from './core/entry/index.js';

// Fetching, search and trees
export * from './core/fetcher/index.js';
export * from './core/search/index.js';
export * from './core/tree/index.js';

// Configuration
export * from './core/config/index.js';

// Flat records
export * from './bindings/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
