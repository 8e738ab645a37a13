/**
 * Axis scaling for charts
 *
 * The key axis is always linear. The value axis lives in chart space, i.e. after
 * the axis transform; tick labels map back through the inverse.
 */

import { AxisTransform } from '../statistics/axis-transform.js';
import { MAX_FORMATTED_VALUE, ValueFormatter } from '../statistics/format.js';
import { fieldValues } from '../statistics/measurements.js';
import { suppressBelow } from '../statistics/quartiles.js';
import { Range } from '../types.js';
import { ChartData } from '../reports/pipeline.js';

export const DEGENERATE_KEY_MARGIN = 1;
export const DEGENERATE_KEY_FRACTION = 0.05;

/**
 * Widen a zero-width key range by a fixed margin around its single value
 */
export function widenKeyRange(range: Range): Range {
  if (range.max > range.min) {
    return range;
  }
  const margin = Math.max(DEGENERATE_KEY_MARGIN, Math.abs(range.min) * DEGENERATE_KEY_FRACTION);
  return { min: range.min - margin, max: range.max + margin };
}

function smallestPositive(data: ChartData): number | undefined {
  let smallest: number | undefined;
  for (const group of data.series) {
    for (const summary of group.summaries) {
      for (const value of fieldValues(summary.contained, data.report.field)) {
        const cleaned = suppressBelow(value, data.epsilon);
        if (cleaned > 0 && (smallest === undefined || cleaned < smallest)) {
          smallest = cleaned;
        }
      }
    }
  }
  return smallest;
}

/**
 * Chart-space bounds of the value axis
 */
export function chartValueRange(data: ChartData): Range {
  const { transform } = data;

  if (transform.kind === 'log') {
    const lowest = smallestPositive(data);
    if (lowest === undefined) {
      return { min: 0, max: 1 };
    }
    const min = Math.floor(transform.apply(lowest));
    const max = Math.max(Math.ceil(transform.apply(data.valueRange.max)), min + 1);
    if (transform.applyInverse(max) < MAX_FORMATTED_VALUE) {
      return { min, max };
    }
    // The next decade has no label; end the axis at the data instead
    return { min, max: Math.max(transform.apply(data.valueRange.max), min + 0.5) };
  }

  const floor = transform.apply(0);
  const min = transform.apply(Math.max(0, suppressBelow(data.valueRange.min, data.epsilon)));
  const max = transform.apply(data.valueRange.max);
  if (max > min) {
    return { min, max };
  }
  const margin = Math.max(1, Math.abs(max) * DEGENERATE_KEY_FRACTION);
  return { min: Math.max(floor, min - margin), max: max + margin };
}

/**
 * Maps a domain range linearly onto a pixel interval
 */
export class LinearScale {
  constructor(
    readonly domain: Range,
    readonly from: number,
    readonly to: number
  ) {}

  map(value: number): number {
    const width = this.domain.max - this.domain.min;
    const clamped = Math.min(Math.max(value, this.domain.min), this.domain.max);
    const position = width === 0 || !Number.isFinite(clamped)
      ? 0
      : (clamped - this.domain.min) / width;
    return this.from + position * (this.to - this.from);
  }

  ticks(count: number): number[] {
    const step = (this.domain.max - this.domain.min) / count;
    return Array.from({ length: count + 1 }, (_, i) => this.domain.min + step * i);
  }
}

/**
 * Label of a raw value. Rounding residue around zero prints as 0.
 */
export function formatTick(value: number, format: ValueFormatter): string {
  if (Math.abs(value) < 1e-9) {
    return '0';
  }
  return value < 0 ? `-${format(-value)}` : format(value);
}

export function formatChartTick(value: number, transform: AxisTransform, format: ValueFormatter): string {
  return formatTick(transform.applyInverse(value), format);
}
