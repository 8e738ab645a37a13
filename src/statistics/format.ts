/**
 * Magnitude formatting for axis labels
 */

import { UnsupportedMagnitudeError } from '../errors.js';

// Smallest positive normal double
const MIN_NORMAL = 2.2250738585072014e-308;

const UNITS = ['k', 'M', 'G'] as const;

export const MAX_FORMATTED_VALUE = 1e12;

// Decimals per scaled magnitude: [exclusive upper bound, digits]
const TIERS: ReadonlyArray<readonly [number, number]> = [[10, 2], [100, 1], [1000, 0]];

/**
 * Format a non-negative value with a k/M/G suffix.
 * 0 → "0", 999 → "999", 1500 → "1.50k", 150000 → "150k", 2.5e9 → "2.50G".
 * Unit and precision are picked on the rounded text, so 999.7 → "1.00k".
 */
export function formatValue(value: number): string {
  if (Number.isNaN(value)) {
    throw new UnsupportedMagnitudeError(value, 'not a number');
  }
  if (!Number.isFinite(value)) {
    throw new UnsupportedMagnitudeError(value, 'not finite');
  }
  if (value < 0) {
    throw new UnsupportedMagnitudeError(value, 'negative');
  }
  if (value === 0) {
    return '0';
  }
  if (value < MIN_NORMAL) {
    throw new UnsupportedMagnitudeError(value, 'subnormal');
  }
  if (value >= MAX_FORMATTED_VALUE) {
    throw new UnsupportedMagnitudeError(value, 'magnitude of 1e12 or more');
  }

  const plain = value.toFixed(0);
  if (Number(plain) < 1000) {
    return plain;
  }

  let scaled = value;
  for (const unit of UNITS) {
    scaled /= 1000;
    for (const [limit, digits] of TIERS) {
      const text = scaled.toFixed(digits);
      if (Number(text) < limit) return `${text}${unit}`;
    }
  }

  // Just below 1e12, rounding reaches 1000G
  return `${scaled.toFixed(0)}G`;
}

export type ValueFormatter = (value: number) => string;
