/**
 * Tests for shared numeric helpers
 */

import { describe, expect, test } from 'vitest';
import { ValidationError } from '../../../src/errors';
import {
  histogram,
  maximum,
  mean,
  median,
  minimum,
  percentile,
  populationStdDev,
  populationVariance,
  sortDescending,
  sum,
} from '../../../src/operations/core/statistics';

describe('statistics helpers', () => {
  test('should return null rather than NaN for empty input', () => {
    expect(sum([])).toBe(0);
    expect(mean([])).toBeNull();
    expect(median([])).toBeNull();
    expect(percentile([], 25)).toBeNull();
    expect(populationVariance([])).toBeNull();
    expect(populationStdDev([])).toBeNull();
    expect(minimum([])).toBeNull();
    expect(maximum([])).toBeNull();
  });

  test('should interpolate percentiles linearly between closest ranks', () => {
    const sorted = [1, 2, 3, 4, 5, 100];

    expect(percentile(sorted, 25)).toBe(2.25);
    expect(percentile(sorted, 75)).toBe(4.75);
    expect(percentile(sorted, 0)).toBe(1);
    expect(percentile(sorted, 100)).toBe(100);
  });

  test('should compute the median of odd and even counts', () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });

  test('should use the population form of variance', () => {
    const values = [2, 4, 4, 4, 5, 5, 7, 9];

    expect(populationVariance(values)).toBe(4);
    expect(populationStdDev(values)).toBe(2);
    expect(populationStdDev([42])).toBe(0);
  });

  test('should sort descending without touching the input', () => {
    const values = [3, 1, 2];

    expect(sortDescending(values)).toEqual([3, 2, 1]);
    expect(values).toEqual([3, 1, 2]);
  });

  describe('histogram', () => {
    test('should close the last bin on the right', () => {
      expect(histogram([1, 2, 3, 4], 3)).toEqual({
        binEdges: [1, 2, 3, 4],
        counts: [1, 1, 2],
      });
    });

    test('should widen a constant input by half a unit each side', () => {
      expect(histogram([5, 5], 2)).toEqual({
        binEdges: [4.5, 5, 5.5],
        counts: [0, 2],
      });
    });

    test('should return null for empty input', () => {
      expect(histogram([], 3)).toBeNull();
    });

    test('should reject bin counts that are not positive integers', () => {
      expect(() => histogram([1, 2, 3], 2.5)).toThrow(ValidationError);
      expect(() => histogram([1, 2, 3], 0)).toThrow(ValidationError);
      expect(() => histogram([], -1)).toThrow(/^Invalid histogram bin count: /);
    });

    test('should place every value in exactly one bin', () => {
      const values = [12, 7, 300, 45, 45, 1, 99, 250];
      const result = histogram(values, 5);

      expect(result?.counts.reduce((a, b) => a + b, 0)).toBe(values.length);
      expect(result?.binEdges).toHaveLength(6);
    });
  });
});
