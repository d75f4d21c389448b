export * from './project.js';
export * from './classifier.js';
export * from './extractor.js';
export * from './symbols.js';
