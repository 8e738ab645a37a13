/**
 * Bucketer / Merger
 *
 * Phase one finds the global key range across all groups. Phase two partitions
 * each group by (experiment identity, bucket) and folds every partition into one
 * MergedSummary. Groups are independent of each other once the range is known.
 */

import {
  EmptyAggregationError,
  EmptyPartitionError,
  InvalidBucketCountError,
} from '../errors.js';
import {
  ExperimentIdentity,
  GroupSeries,
  KeyAxis,
  Measurements,
  MergedSummary,
  Range,
  StatisticsRecord,
} from '../types.js';
import { experimentKey, toExperimentIdentity } from './identity.js';
import {
  piecewiseMax,
  piecewiseMean,
  piecewiseMedian,
  piecewiseMin,
} from './measurements.js';

export interface MergeOptions {
  axis: KeyAxis;
  bucketCount?: number;
  // Overrides the range computed from the groups themselves
  keyRange?: Range;
}

export function validateBucketCount(bucketCount: number | undefined): void {
  if (bucketCount === undefined) return;
  if (!Number.isInteger(bucketCount) || bucketCount < 1) {
    throw new InvalidBucketCountError(bucketCount);
  }
}

/**
 * Global key range over every record of every group
 */
export function computeKeyRange(
  groups: ReadonlyMap<string, readonly StatisticsRecord[]>,
  axis: KeyAxis
): Range {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;

  for (const records of groups.values()) {
    for (const record of records) {
      const key = axis.project(record.identity);
      min = Math.min(min, key);
      max = Math.max(max, key);
    }
  }

  if (min > max) {
    throw new EmptyAggregationError(`${axis.name} key range`);
  }
  return { min, max };
}

/**
 * Bucket of a key among `bucketCount` equal-width half-open intervals.
 * The maximum key is clamped into the last bucket; a zero-width range is one bucket.
 */
export function bucketIndex(key: number, range: Range, bucketCount: number): number {
  validateBucketCount(bucketCount);

  const width = range.max - range.min;
  if (width <= 0) {
    return 0;
  }

  const raw = Math.floor(((key - range.min) * bucketCount) / width);
  return Math.min(Math.max(raw, 0), bucketCount - 1);
}

/**
 * Representative key of a bucket: its midpoint in the original key range
 */
export function bucketMidpoint(bucket: number, range: Range, bucketCount: number): number {
  const width = range.max - range.min;
  if (width <= 0) {
    return range.min;
  }
  return range.min + ((bucket + 0.5) * width) / bucketCount;
}

/**
 * Fold one non-empty partition into an immutable summary
 */
export function createMergedSummary(
  key: number,
  identity: ExperimentIdentity,
  contained: readonly Measurements[],
  bucket?: number
): MergedSummary {
  if (contained.length === 0) {
    throw new EmptyAggregationError('merged summary');
  }

  const summary: MergedSummary = {
    key,
    identity,
    min: piecewiseMin(contained),
    max: piecewiseMax(contained),
    mean: piecewiseMean(contained),
    median: piecewiseMedian(contained),
    contained: Object.freeze([...contained]),
    ...(bucket === undefined ? {} : { bucket }),
  };
  return Object.freeze(summary);
}

interface Partition {
  key: number;
  bucket?: number;
  identity: ExperimentIdentity;
  members: Measurements[];
}

/**
 * Merge the records of one group. Output is sorted ascending by key; equal keys
 * keep the order in which their partitions were first seen.
 */
export function mergeGroup(
  name: string,
  records: readonly StatisticsRecord[],
  keyRange: Range,
  options: MergeOptions
): GroupSeries {
  if (records.length === 0) {
    throw new EmptyPartitionError(name);
  }

  const { axis, bucketCount } = options;
  const partitions = new Map<string, Partition>();

  for (const record of records) {
    const identity = toExperimentIdentity(record.identity, axis.clears);
    const key = axis.project(record.identity);
    const bucket = bucketCount === undefined ? undefined : bucketIndex(key, keyRange, bucketCount);
    const coordinate = bucket === undefined ? `k${key}` : `b${bucket}`;
    const partitionKey = `${experimentKey(identity)}|${coordinate}`;

    const existing = partitions.get(partitionKey);
    if (existing) {
      existing.members.push(record.measurements);
      continue;
    }

    partitions.set(partitionKey, {
      key: bucket === undefined || bucketCount === undefined
        ? key
        : bucketMidpoint(bucket, keyRange, bucketCount),
      bucket,
      identity,
      members: [record.measurements],
    });
  }

  const summaries = [...partitions.values()]
    .map(p => createMergedSummary(p.key, p.identity, p.members, p.bucket))
    .sort((a, b) => a.key - b.key);

  return {
    name,
    summaries: Object.freeze(summaries),
    recordCount: records.length,
  };
}

/**
 * Merge every group against one shared key range
 */
export function mergeGroups(
  groups: ReadonlyMap<string, readonly StatisticsRecord[]>,
  options: MergeOptions
): { series: GroupSeries[]; keyRange: Range } {
  validateBucketCount(options.bucketCount);

  const keyRange = options.keyRange ?? computeKeyRange(groups, options.axis);
  const series: GroupSeries[] = [];
  for (const [name, records] of groups) {
    series.push(mergeGroup(name, records, keyRange, options));
  }

  return { series, keyRange };
}

/**
 * Every measurement vector of a series, in summary order
 */
export function flattenSeries(series: GroupSeries): Measurements[] {
  return series.summaries.flatMap(summary => [...summary.contained]);
}
