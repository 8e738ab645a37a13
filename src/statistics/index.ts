/**
 * Aggregation pipeline exports
 */

export * from './axis-transform.js';
export * from './format.js';
export * from './grouper.js';
export * from './identity.js';
export * from './measurements.js';
export * from './merger.js';
export * from './quartiles.js';
