/**
 * Validation exports barrel file.
 */
export * from './types.js';
export * from './pipeline.js';
export * from './predicates.js';
