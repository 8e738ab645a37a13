/**
 * Box plot values
 *
 * Quartiles are computed over the raw contained values of one field, cleaned of
 * near-zero noise against a global epsilon, then mapped into chart space.
 */

import { EmptyAggregationError } from '../errors.js';
import { GroupSeries, MeasurementField, MergedSummary, Range } from '../types.js';
import { AxisTransform } from './axis-transform.js';
import { fieldValues, interpolatedPercentile } from './measurements.js';

export const EPSILON_FACTOR = 1e-12;

/**
 * Five-number summary: min, Q1, median, Q3, max
 */
export interface Quartiles {
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
}

export function computeQuartiles(values: readonly number[]): Quartiles {
  if (values.length === 0) {
    throw new EmptyAggregationError('quartiles');
  }

  const sorted = [...values].sort((a, b) => a - b);
  return {
    min: sorted[0],
    q1: interpolatedPercentile(sorted, 0.25),
    median: interpolatedPercentile(sorted, 0.5),
    q3: interpolatedPercentile(sorted, 0.75),
    max: sorted[sorted.length - 1],
  };
}

/**
 * Range of one field over every contained value of every summary in every group
 */
export function computeValueRange(
  series: readonly GroupSeries[],
  field: MeasurementField
): Range {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;

  for (const group of series) {
    for (const summary of group.summaries) {
      for (const value of fieldValues(summary.contained, field)) {
        min = Math.min(min, value);
        max = Math.max(max, value);
      }
    }
  }

  if (min > max) {
    throw new EmptyAggregationError(`${field} value range`);
  }
  return { min, max };
}

export function suppressionEpsilon(range: Range): number {
  return Math.max(Math.abs(range.min), Math.abs(range.max), range.max - range.min) * EPSILON_FACTOR;
}

export function suppressBelow(value: number, epsilon: number): number {
  return value < epsilon ? 0 : value;
}

export function mapQuartiles(quartiles: Quartiles, map: (value: number) => number): Quartiles {
  return {
    min: map(quartiles.min),
    q1: map(quartiles.q1),
    median: map(quartiles.median),
    q3: map(quartiles.q3),
    max: map(quartiles.max),
  };
}

/**
 * Chart-space quartiles of one summary: extract, quartile, suppress, transform
 */
export function boxPlotQuartiles(
  summary: MergedSummary,
  field: MeasurementField,
  epsilon: number,
  transform: AxisTransform
): Quartiles {
  const raw = computeQuartiles(fieldValues(summary.contained, field));
  const cleaned = mapQuartiles(raw, value => suppressBelow(value, epsilon));
  return mapQuartiles(cleaned, value => transform.apply(value));
}
