export * from './types.js';
export * from './scorer.js';
export * from './search.js';
