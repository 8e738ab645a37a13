/**
 * Axis Transforms
 *
 * Monotonic rescaling of a value axis before plotting, with its exact inverse.
 * The key axis is never transformed.
 */

import { InvalidInputError, InvalidTransformDegreeError } from '../errors.js';

export type AxisTransformKind = 'linear' | 'log' | 'root';

export class AxisTransform {
  readonly kind: AxisTransformKind;
  readonly degree: number;

  private constructor(kind: AxisTransformKind, degree: number) {
    this.kind = kind;
    this.degree = degree;
  }

  static linear(): AxisTransform {
    return new AxisTransform('linear', 1);
  }

  static log(): AxisTransform {
    return new AxisTransform('log', 1);
  }

  /**
   * n-th polynomial root. Chart space is linear in x^(1/degree).
   */
  static root(degree: number): AxisTransform {
    if (!Number.isFinite(degree) || degree < 1) {
      throw new InvalidTransformDegreeError(degree);
    }
    return new AxisTransform('root', degree);
  }

  /**
   * Map a raw value into chart space.
   * Valid for x > 0 under log and x >= 0 under root.
   */
  apply(value: number): number {
    switch (this.kind) {
      case 'root':
        return Math.pow(value, 1 / this.degree);
      case 'log':
        return Math.log10(value);
      case 'linear':
        return value;
    }
  }

  applyInverse(value: number): number {
    switch (this.kind) {
      case 'root':
        return Math.pow(value, this.degree);
      case 'log':
        return Math.pow(10, value);
      case 'linear':
        return value;
    }
  }

  /**
   * Whether a raw value lies in the domain of this transform
   */
  accepts(value: number): boolean {
    switch (this.kind) {
      case 'root':
        return value >= 0;
      case 'log':
        return value > 0;
      case 'linear':
        return Number.isFinite(value);
    }
  }

  toString(): string {
    switch (this.kind) {
      case 'root':
        return `${this.degree}-th root`;
      case 'log':
        return 'log10';
      case 'linear':
        return 'linear';
    }
  }
}

/**
 * Parse a transform selection: `linear`, `log`, `log10` or `root:<degree>`
 */
export function parseAxisTransform(selection: string): AxisTransform {
  const normalized = selection.trim().toLowerCase();

  if (normalized === 'linear') return AxisTransform.linear();
  if (normalized === 'log' || normalized === 'log10') return AxisTransform.log();

  const match = /^root:(.+)$/.exec(normalized);
  if (match) {
    const degree = Number(match[1]);
    if (Number.isNaN(degree)) {
      throw new InvalidInputError('transform', `root degree "${match[1]}" is not a number`);
    }
    return AxisTransform.root(degree);
  }

  throw new InvalidInputError('transform', `unknown transform "${selection}" (expected linear, log or root:<degree>)`);
}
