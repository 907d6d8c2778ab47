/**
 * Default distribution settings and their validation
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { DistributionConfig } from "./types";

export const DEFAULT_DISTRIBUTION_CONFIG: DistributionConfig = Object.freeze({
  nxValues: Object.freeze([25, 50, 75, 90, 95]),
  assemblyBoundaries: Object.freeze([1_000, 10_000, 100_000, 1_000_000]),
  geneSetBoundaries: Object.freeze([300, 1_500]),
  iqrMultiplier: 1.5,
  zScoreThreshold: 3.0,
  histogramBins: 20,
});

function isAscendingPositive(boundaries: readonly number[]): boolean {
  return boundaries.every(
    (value, index) =>
      Number.isFinite(value) && value > 0 && (index === 0 || value > (boundaries[index - 1] ?? 0))
  );
}

/**
 * ArkType schema for partial distribution settings
 */
export const DistributionConfigSchema = type({
  "nxValues?": "number[]",
  "assemblyBoundaries?": "number[]",
  "geneSetBoundaries?": "number[]",
  "iqrMultiplier?": "number >= 0",
  "zScoreThreshold?": "number > 0",
  "histogramBins?": "number > 0",
}).narrow((config, ctx) => {
  if (config.nxValues?.some((x) => !(x > 0 && x <= 100))) {
    return ctx.reject({
      expected: "Nx percentages in (0, 100]",
      actual: JSON.stringify(config.nxValues),
    });
  }

  for (const key of ["assemblyBoundaries", "geneSetBoundaries"] as const) {
    const boundaries = config[key];
    if (boundaries && !isAscendingPositive(boundaries)) {
      return ctx.reject({
        expected: `${key} strictly ascending and positive`,
        actual: JSON.stringify(boundaries),
      });
    }
  }

  if (config.histogramBins !== undefined && !Number.isInteger(config.histogramBins)) {
    return ctx.reject({
      expected: "an integer histogramBins",
      actual: String(config.histogramBins),
    });
  }

  return true;
});

const NxPercentageSchema = type("0 < number <= 100");

const BinCountSchema = type("number > 0").narrow(
  (bins, ctx) =>
    Number.isInteger(bins) || ctx.reject({ expected: "an integer bin count", actual: String(bins) })
);

/**
 * @throws {ValidationError} Unless `x` lies in (0, 100]
 */
export function assertNxPercentage(x: number): number {
  const validationResult = NxPercentageSchema(x);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(
      `Invalid Nx percentage: ${validationResult.summary}`,
      undefined,
      "Use 50 for N50, 90 for N90"
    );
  }
  return validationResult;
}

/**
 * @throws {ValidationError} Unless `bins` is a positive integer
 */
export function assertBinCount(bins: number): number {
  const validationResult = BinCountSchema(bins);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid histogram bin count: ${validationResult.summary}`);
  }
  return validationResult;
}

/**
 * Merge partial settings over the defaults
 *
 * @throws {ValidationError} When the settings fail schema validation
 */
export function resolveDistributionConfig(
  overrides: Partial<DistributionConfig> = {}
): DistributionConfig {
  const validationResult = DistributionConfigSchema(overrides);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(
      `Invalid distribution settings: ${validationResult.summary}`,
      undefined,
      "Boundaries must ascend; Nx values must lie in (0, 100]"
    );
  }

  return Object.freeze({
    nxValues: Object.freeze([...(overrides.nxValues ?? DEFAULT_DISTRIBUTION_CONFIG.nxValues)]),
    assemblyBoundaries: Object.freeze([
      ...(overrides.assemblyBoundaries ?? DEFAULT_DISTRIBUTION_CONFIG.assemblyBoundaries),
    ]),
    geneSetBoundaries: Object.freeze([
      ...(overrides.geneSetBoundaries ?? DEFAULT_DISTRIBUTION_CONFIG.geneSetBoundaries),
    ]),
    iqrMultiplier: overrides.iqrMultiplier ?? DEFAULT_DISTRIBUTION_CONFIG.iqrMultiplier,
    zScoreThreshold: overrides.zScoreThreshold ?? DEFAULT_DISTRIBUTION_CONFIG.zScoreThreshold,
    histogramBins: overrides.histogramBins ?? DEFAULT_DISTRIBUTION_CONFIG.histogramBins,
  });
}
