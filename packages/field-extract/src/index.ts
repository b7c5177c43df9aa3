export * from './completion-extractor.js';
export * from './prompt.js';
export * from './structured-extractor.js';
export * from './validate.js';
export * from './values.js';
