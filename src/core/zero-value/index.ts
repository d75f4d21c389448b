/**
 * Zero-value exports barrel file.
 */
export * from './zero-value.js';
