/**
 * Tests for distribution settings
 */

import { describe, expect, test } from 'vitest';
import { ValidationError } from '../../src/errors';
import {
  DEFAULT_DISTRIBUTION_CONFIG,
  resolveDistributionConfig,
} from '../../src/operations/config';

describe('resolveDistributionConfig', () => {
  test('should return the defaults when nothing is overridden', () => {
    expect(resolveDistributionConfig()).toEqual({
      nxValues: [25, 50, 75, 90, 95],
      assemblyBoundaries: [1_000, 10_000, 100_000, 1_000_000],
      geneSetBoundaries: [300, 1_500],
      iqrMultiplier: 1.5,
      zScoreThreshold: 3,
      histogramBins: 20,
    });
  });

  test('should merge overrides over the defaults', () => {
    const config = resolveDistributionConfig({ nxValues: [50], zScoreThreshold: 2.5 });

    expect(config.nxValues).toEqual([50]);
    expect(config.zScoreThreshold).toBe(2.5);
    expect(config.geneSetBoundaries).toEqual(DEFAULT_DISTRIBUTION_CONFIG.geneSetBoundaries);
  });

  test('should freeze the resolved settings', () => {
    const config = resolveDistributionConfig({ assemblyBoundaries: [500] });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.assemblyBoundaries)).toBe(true);
  });

  test('should not share arrays with the caller', () => {
    const nxValues = [50, 90];
    const config = resolveDistributionConfig({ nxValues });
    nxValues.push(10);

    expect(config.nxValues).toEqual([50, 90]);
  });

  test.each([
    ['an Nx value above 100', { nxValues: [50, 101] }],
    ['a non-positive boundary', { geneSetBoundaries: [0, 300] }],
    ['repeated boundaries', { assemblyBoundaries: [1_000, 1_000] }],
    ['a negative IQR multiplier', { iqrMultiplier: -1 }],
    ['a zero z-score threshold', { zScoreThreshold: 0 }],
    ['a fractional bin count', { histogramBins: 7.5 }],
  ])('should reject %s', (_, overrides) => {
    expect(() => resolveDistributionConfig(overrides)).toThrow(ValidationError);
  });

  test('should explain the failure in the error message', () => {
    expect(() => resolveDistributionConfig({ nxValues: [0] })).toThrow(
      /^Invalid distribution settings: /
    );
  });
});
