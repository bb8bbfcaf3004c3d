export * from './constants.js';
export * from './source.js';
export * from './step-images.js';
export * from './images.js';
export * from './references.js';
export * from './related-files.js';
export * from './recipe-entry.js';
