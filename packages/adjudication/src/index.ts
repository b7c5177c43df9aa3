export * from './aggregate.js';
export * from './clarification.js';
export * from './consistency.js';
export * from './engine.js';
export * from './field-kinds.js';
export * from './metrics.js';
export * from './precedence.js';
export * from './resolve-field.js';
export type * from './types.js';
