/**
 * Tests for magnitude formatting
 */

import { formatValue } from '../src/statistics/format';
import { UnsupportedMagnitudeError } from '../src/errors';

describe('formatValue', () => {
  it.each([
    [0, '0'],
    [7, '7'],
    [999, '999'],
    [1000, '1.00k'],
    [1500, '1.50k'],
    [15000, '15.0k'],
    [150000, '150k'],
    [2_000_000, '2.00M'],
    [45_600_000, '45.6M'],
    [2.5e9, '2.50G'],
    [999e9, '999G'],
  ])('should format %d as %s', (value, expected) => {
    expect(formatValue(value)).toBe(expected);
  });

  it.each([
    [999.7, '1.00k'],
    [9999.9, '10.0k'],
    [99_990, '100k'],
    [999_999, '1.00M'],
  ])('should pick the unit after rounding %d', (value, expected) => {
    expect(formatValue(value)).toBe(expected);
  });

  it('should reject negative values', () => {
    expect(() => formatValue(-1)).toThrow(UnsupportedMagnitudeError);
  });

  it('should reject NaN and infinities', () => {
    expect(() => formatValue(Number.NaN)).toThrow(UnsupportedMagnitudeError);
    expect(() => formatValue(Number.POSITIVE_INFINITY)).toThrow(UnsupportedMagnitudeError);
  });

  it('should reject subnormal values', () => {
    expect(() => formatValue(Number.MIN_VALUE)).toThrow(UnsupportedMagnitudeError);
    expect(() => formatValue(1e-310)).toThrow(UnsupportedMagnitudeError);
  });

  it('should reject magnitudes of 1e12 and above', () => {
    expect(() => formatValue(1e12)).toThrow(UnsupportedMagnitudeError);
  });

  it('should report the reason in the error context', () => {
    try {
      formatValue(-5);
      throw new Error('expected formatting to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedMagnitudeError);
      if (error instanceof UnsupportedMagnitudeError) {
        expect(error.context).toEqual({ value: -5, reason: 'negative' });
      }
    }
  });
});
