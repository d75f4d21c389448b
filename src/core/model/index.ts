/**
 * Signature model exports barrel file.
 */
export * from './types.js';
