export * from './metadata.js';
export * from './extractor.js';
