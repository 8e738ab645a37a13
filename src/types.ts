/**
 * Benchplot Type Definitions
 * Run records, identities and merged summaries
 */

// Measurement fields, in the order every piecewise combinator visits them
export const MEASUREMENT_FIELDS = [
  'cost',
  'costPerBase',
  'durationSeconds',
  'openedNodes',
  'closedNodes',
  'suboptimalOpenedNodes',
  'suboptimalOpenedNodesRatio',
  'templateSwitchAmount',
  'runtime',   // seconds, unpacked from runtime_raw
  'memory',    // bytes, unpacked from memory_raw
] as const;

export type MeasurementField = typeof MEASUREMENT_FIELDS[number];

/**
 * One fixed-size vector of named scalar measurements
 */
export type Measurements = Readonly<Record<MeasurementField, number>>;

// Strategy selections recorded by the aligner
export enum StrategyName {
  NODE_ORD = 'node_ord',
  TS_MIN_LENGTH = 'ts_min_len',
}

export const STRATEGY_NAMES: readonly StrategyName[] = [
  StrategyName.NODE_ORD,
  StrategyName.TS_MIN_LENGTH,
];

export type StrategySelection = Readonly<Record<StrategyName, string>>;

/**
 * Full identity of one run, including the fields that differ between repetitions
 */
export interface RunIdentity {
  testSequenceName: string;
  aligner: string;
  alignmentMethod: string;
  length: number;
  cost: number;            // Copied from the statistics after decoding
  seed: number | bigint;   // 64-bit seeds past 2^53 stay exact as bigint
  alignmentConfig: string;
  rqRange: string;
  costLimit: string;
  memoryLimit: string;
  runtimeRaw: readonly string[];
  memoryRaw: number;       // KiB
  strategies: StrategySelection;
}

/**
 * Volatile fields that never take part in merge-key equality
 */
export const VOLATILE_FIELDS = ['seed', 'cost', 'runtimeRaw', 'memoryRaw'] as const;

export type VolatileField = typeof VOLATILE_FIELDS[number];

/**
 * Merge-stable subset of a run identity
 */
export type ExperimentIdentity = Omit<RunIdentity, VolatileField>;

export type ExperimentField = keyof ExperimentIdentity;

/**
 * One decoded benchmark run
 */
export interface StatisticsRecord {
  identity: RunIdentity;
  measurements: Measurements;
  source?: string;         // File the record was decoded from
}

/**
 * Numeric key axis along which records are bucketed
 */
export interface KeyAxis {
  name: string;
  label: string;
  project: (identity: RunIdentity) => number;
  // Identity fields folded into the bucket coordinate instead of the merge identity
  clears: readonly ExperimentField[];
}

/**
 * Inclusive range of a numeric axis
 */
export interface Range {
  min: number;
  max: number;
}

/**
 * Aggregate of all records sharing one (group, merge key, bucket)
 */
export interface MergedSummary {
  readonly key: number;
  readonly bucket?: number;
  readonly identity: ExperimentIdentity;
  readonly min: Measurements;
  readonly max: Measurements;
  readonly mean: Measurements;
  readonly median: Measurements;
  readonly contained: readonly Measurements[];
}

/**
 * Merged summaries of one group, sorted ascending by key
 */
export interface GroupSeries {
  name: string;
  summaries: readonly MergedSummary[];
  recordCount: number;
}
