/**
 * Naming exports barrel file.
 */
export * from './resolver.js';
