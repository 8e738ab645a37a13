export * from './definitions.js';
export * from './pipeline.js';
export * from './runner.js';
