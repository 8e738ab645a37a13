/**
 * Benchplot - benchmark run aggregation and comparative charts
 *
 * Records are grouped by experiment, bucketed along a key axis and merged
 * into min/max/mean/median summaries, then rendered as box, line and
 * histogram charts.
 */

export * from './types.js';
export * from './errors.js';
export * from './statistics/index.js';
export * from './loader/index.js';
export * from './reports/index.js';
export * from './render/charts.js';
export * from './render/axes.js';
export * from './render/svg.js';
export * from './export/runtime-memory-csv.js';
export * from './utils/config.js';
