/**
 * wrapgen - decorator class generator for TypeScript interfaces.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Signature model
export * from './core/model/index.js';

// Extraction
export * from './core/extract/index.js';

// Validation
export * from './core/validation/index.js';

// Naming and zero values
export * from './core/naming/index.js';
export * from './core/zero-value/index.js';

// Imports and patterns
export * from './core/imports/index.js';
export * from './core/patterns/index.js';

// Generation
export * from './core/generate/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
