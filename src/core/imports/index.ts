export * from './types.js';
export * from './collector.js';
