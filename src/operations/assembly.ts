/**
 * Assembly-quality and length-distribution metrics
 *
 * Runs once, after the accumulator has seen every record, over the
 * retained {@link LengthSet}.
 *
 * @example
 * ```typescript
 * const engine = new DistributionEngine({ nxValues: [50, 90] });
 * const stats = engine.assemblyStats(accumulator.takeLengthSet());
 * console.log(`N50 ${stats.n50}, L50 ${stats.l50}, auN ${stats.auN}`);
 * ```
 */

import { histogram, mean, median, sortDescending, sum } from "./core/statistics";
import type { Histogram } from "./core/statistics";
import { assertNxPercentage, resolveDistributionConfig } from "./config";
import { OUTLIER_DETECTORS } from "./outliers";
import type {
  AssemblyStats,
  DistributionConfig,
  GeneSetStats,
  LengthSet,
  Metric,
  NxMetric,
  OutlierMethod,
  OutlierReport,
  SizeBucket,
} from "./types";

export class DistributionEngine {
  readonly config: DistributionConfig;

  /**
   * @param config - Partial settings merged over the defaults
   * @throws {ValidationError} When the settings fail schema validation
   */
  constructor(config: Partial<DistributionConfig> = {}) {
    this.config = resolveDistributionConfig(config);
  }

  /**
   * Nx and Lx: the length of, and 1-based rank of, the first sequence in
   * descending order at which the running total reaches x% of all bases
   *
   * @throws {ValidationError} Unless `x` lies in (0, 100]
   */
  nx(lengthSet: LengthSet, x: number): NxMetric {
    assertNxPercentage(x);
    const ranked = sortDescending(lengthSet.lengths);
    return computeNx(ranked, sum(ranked), x);
  }

  /**
   * Area under the Nx curve: Σl² / Σl
   */
  auN(lengthSet: LengthSet): Metric {
    let total = 0;
    let squares = 0;
    for (const length of lengthSet.lengths) {
      total += length;
      squares += length * length;
    }
    return total > 0 ? squares / total : null;
  }

  assemblyStats(lengthSet: LengthSet): AssemblyStats {
    const ranked = sortDescending(lengthSet.lengths);
    const totalLength = sum(ranked);
    const n50 = computeNx(ranked, totalLength, 50);

    return {
      sequenceCount: ranked.length,
      totalLength,
      largest: ranked[0] ?? null,
      n50: n50.nx,
      l50: n50.lx,
      nx: this.config.nxValues.map((x) => computeNx(ranked, totalLength, x)),
      auN: this.auN(lengthSet),
      sizeDistribution: sizeDistribution(lengthSet.lengths, this.config.assemblyBoundaries),
    };
  }

  geneSetStats(lengthSet: LengthSet): GeneSetStats {
    return {
      sequenceCount: lengthSet.lengths.length,
      meanLength: mean(lengthSet.lengths),
      medianLength: median(lengthSet.lengths),
      sizeDistribution: sizeDistribution(lengthSet.lengths, this.config.geneSetBoundaries),
    };
  }

  detectOutliers(lengthSet: LengthSet, method: OutlierMethod): OutlierReport {
    return OUTLIER_DETECTORS[method](lengthSet, this.config);
  }

  /**
   * Length histogram with the configured bin count unless one is given
   *
   * @throws {ValidationError} Unless `bins` is a positive integer
   */
  histogram(lengthSet: LengthSet, bins = this.config.histogramBins): Histogram | null {
    return histogram(lengthSet.lengths, bins);
  }
}

function computeNx(ranked: readonly number[], totalLength: number, x: number): NxMetric {
  if (ranked.length === 0 || totalLength === 0) {
    return { x, nx: null, lx: null };
  }

  let running = 0;
  for (const [index, length] of ranked.entries()) {
    running += length;
    if (running * 100 >= totalLength * x) {
      return { x, nx: length, lx: index + 1 };
    }
  }

  // x = 100 under floating-point drift
  return { x, nx: ranked[ranked.length - 1] ?? null, lx: ranked.length };
}

/**
 * Count lengths into half-open buckets `[0, b0), [b0, b1), ..., [bk, ∞)`
 */
export function sizeDistribution(
  lengths: readonly number[],
  boundaries: readonly number[]
): SizeBucket[] {
  const edges = [0, ...boundaries];
  const counts = new Array<number>(edges.length).fill(0);
  const totals = new Array<number>(edges.length).fill(0);

  for (const length of lengths) {
    let bucket = edges.length - 1;
    while (bucket > 0 && length < (edges[bucket] ?? 0)) bucket--;
    counts[bucket] = (counts[bucket] ?? 0) + 1;
    totals[bucket] = (totals[bucket] ?? 0) + length;
  }

  return edges.map((low, index) => {
    const high = edges[index + 1] ?? null;
    return {
      label: bucketLabel(low, high, index === 0),
      low,
      high,
      count: counts[index] ?? 0,
      totalLength: totals[index] ?? 0,
    };
  });
}

function bucketLabel(low: number, high: number | null, first: boolean): string {
  if (high === null) return first ? "all" : `>=${formatBases(low)}`;
  if (first) return `<${formatBases(high)}`;
  return `${formatBases(low)}-${formatBases(high)}`;
}

/**
 * Human-readable base count: 300bp, 1.5kb, 1Mb
 */
export function formatBases(bases: number): string {
  if (bases >= 1_000_000) return `${bases / 1_000_000}Mb`;
  if (bases >= 1_000) return `${bases / 1_000}kb`;
  return `${bases}bp`;
}
