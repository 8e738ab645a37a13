/**
 * Summary Statistics
 *
 * Piecewise combinators over fixed-size measurement vectors. Every combinator
 * walks MEASUREMENT_FIELDS, so each field is combined independently of the others.
 */

import { EmptyAggregationError } from '../errors.js';
import { MEASUREMENT_FIELDS, MeasurementField, Measurements } from '../types.js';

/**
 * Build a measurement vector field by field
 */
export function buildMeasurements(valueOf: (field: MeasurementField) => number): Measurements {
  const entries = new Map<MeasurementField, number>();
  for (const field of MEASUREMENT_FIELDS) {
    entries.set(field, valueOf(field));
  }
  const at = (field: MeasurementField): number => entries.get(field) ?? 0;

  return Object.freeze({
    cost: at('cost'),
    costPerBase: at('costPerBase'),
    durationSeconds: at('durationSeconds'),
    openedNodes: at('openedNodes'),
    closedNodes: at('closedNodes'),
    suboptimalOpenedNodes: at('suboptimalOpenedNodes'),
    suboptimalOpenedNodesRatio: at('suboptimalOpenedNodesRatio'),
    templateSwitchAmount: at('templateSwitchAmount'),
    runtime: at('runtime'),
    memory: at('memory'),
  });
}

export function constantMeasurements(value: number): Measurements {
  return buildMeasurements(() => value);
}

/**
 * Element-wise combination of two vectors
 */
export function zipMeasurements(
  a: Measurements,
  b: Measurements,
  combine: (x: number, y: number) => number
): Measurements {
  return buildMeasurements(field => combine(a[field], b[field]));
}

export function mapMeasurements(
  a: Measurements,
  map: (x: number, field: MeasurementField) => number
): Measurements {
  return buildMeasurements(field => map(a[field], field));
}

// ==================== Monoid folds ====================

/**
 * An associative element-wise operation with its identity element
 */
export interface MeasurementMonoid {
  name: string;
  identity: Measurements;
  combine: (x: number, y: number) => number;
}

// Identity of min is +infinity; zero would win every comparison
export const MIN_MONOID: MeasurementMonoid = {
  name: 'min',
  identity: constantMeasurements(Number.POSITIVE_INFINITY),
  combine: Math.min,
};

export const MAX_MONOID: MeasurementMonoid = {
  name: 'max',
  identity: constantMeasurements(Number.NEGATIVE_INFINITY),
  combine: Math.max,
};

export const SUM_MONOID: MeasurementMonoid = {
  name: 'sum',
  identity: constantMeasurements(0),
  combine: (x, y) => x + y,
};

export function foldMeasurements(
  vectors: readonly Measurements[],
  monoid: MeasurementMonoid
): Measurements {
  let accumulator = monoid.identity;
  for (const vector of vectors) {
    accumulator = zipMeasurements(accumulator, vector, monoid.combine);
  }
  return accumulator;
}

function requireNonEmpty(vectors: readonly Measurements[], operation: string): void {
  if (vectors.length === 0) {
    throw new EmptyAggregationError(operation);
  }
}

// ==================== Combinators ====================

export function piecewiseMin(vectors: readonly Measurements[]): Measurements {
  requireNonEmpty(vectors, 'min');
  return foldMeasurements(vectors, MIN_MONOID);
}

export function piecewiseMax(vectors: readonly Measurements[]): Measurements {
  requireNonEmpty(vectors, 'max');
  return foldMeasurements(vectors, MAX_MONOID);
}

/**
 * Exact mean: sum of all retained vectors divided by their count
 */
export function piecewiseMean(vectors: readonly Measurements[]): Measurements {
  requireNonEmpty(vectors, 'mean');
  const count = vectors.length;
  return mapMeasurements(foldMeasurements(vectors, SUM_MONOID), sum => sum / count);
}

/**
 * Percentile of an ascending list, interpolating linearly at rank p * (n - 1)
 */
export function interpolatedPercentile(sortedValues: readonly number[], p: number): number {
  if (sortedValues.length === 0) {
    throw new EmptyAggregationError(`percentile ${p}`);
  }

  const rank = p * (sortedValues.length - 1);
  const lowerIndex = Math.floor(rank);
  const upperIndex = Math.min(lowerIndex + 1, sortedValues.length - 1);
  const fraction = rank - lowerIndex;

  const lower = sortedValues[lowerIndex];
  const upper = sortedValues[upperIndex];
  if (fraction === 0 || lower === upper) {
    return lower;
  }
  return lower + (upper - lower) * fraction;
}

/**
 * Per-field percentile. The result need not equal any input vector.
 */
export function piecewisePercentile(vectors: readonly Measurements[], p: number): Measurements {
  requireNonEmpty(vectors, `percentile ${p}`);
  return buildMeasurements(field => {
    const values = vectors.map(vector => vector[field]).sort((a, b) => a - b);
    return interpolatedPercentile(values, p);
  });
}

export function piecewiseMedian(vectors: readonly Measurements[]): Measurements {
  requireNonEmpty(vectors, 'median');
  return piecewisePercentile(vectors, 0.5);
}

/**
 * Extract one field across a list of vectors
 */
export function fieldValues(vectors: readonly Measurements[], field: MeasurementField): number[] {
  return vectors.map(vector => vector[field]);
}
