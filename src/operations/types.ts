/**
 * Shared types for the statistics pipeline
 *
 * Every derived metric is `number | null`: `null` marks a statistic that is
 * undefined for the input (no records, zero total length), never an error.
 */

import type { FastaParserOptions } from "../types";
import type { Histogram } from "./core/statistics";

export type { Histogram } from "./core/statistics";

export type Metric = number | null;

/**
 * Denominator used for GC fractions
 * - `total`: all symbols
 * - `unambiguous`: all symbols minus ambiguity symbols
 */
export type GcDenominator = "total" | "unambiguous";

export type OutlierMethod = "iqr" | "zscore";

/**
 * Per-record lengths in input order, with matching ids
 */
export interface LengthSet {
  readonly lengths: readonly number[];
  readonly ids: readonly string[];
}

export interface BasicStats {
  readonly sequenceCount: number;
  readonly totalLength: number;
  readonly minLength: Metric;
  readonly maxLength: Metric;
  readonly meanLength: Metric;
  readonly medianLength: Metric;
  /** Population standard deviation */
  readonly stdDevLength: Metric;
  readonly gcCount: number;
  readonly nCount: number;
  readonly otherCount: number;
  readonly gcFraction: Metric;
  readonly nFraction: Metric;
}

export interface LengthStats {
  readonly q1: Metric;
  readonly q3: Metric;
  readonly iqr: Metric;
  readonly variance: Metric;
  readonly histogram: Histogram | null;
}

/**
 * Distribution of per-record GC fractions
 *
 * Records whose denominator is zero are left out.
 */
export interface GcStats {
  readonly gcDenominator: GcDenominator;
  readonly overallGcFraction: Metric;
  readonly meanGcFraction: Metric;
  readonly medianGcFraction: Metric;
  readonly minGcFraction: Metric;
  readonly maxGcFraction: Metric;
  readonly stdDevGcFraction: Metric;
}

export interface NStats {
  readonly totalN: number;
  readonly sequencesWithN: number;
  readonly fractionSequencesWithN: Metric;
  readonly nFraction: Metric;
  readonly meanNFraction: Metric;
  readonly maxNFraction: Metric;
}

export interface BasicSummary {
  readonly basic: BasicStats;
  readonly lengthStats: LengthStats;
  readonly gcStats: GcStats;
  readonly nStats: NStats;
}

export interface NxMetric {
  /** Percentage in (0, 100] */
  readonly x: number;
  readonly nx: Metric;
  readonly lx: Metric;
}

/**
 * Half-open length bucket `[low, high)`; `high` is `null` for the last one
 */
export interface SizeBucket {
  readonly label: string;
  readonly low: number;
  readonly high: number | null;
  readonly count: number;
  readonly totalLength: number;
}

export interface AssemblyStats {
  readonly sequenceCount: number;
  readonly totalLength: number;
  readonly largest: Metric;
  readonly n50: Metric;
  readonly l50: Metric;
  readonly nx: readonly NxMetric[];
  readonly auN: Metric;
  readonly sizeDistribution: readonly SizeBucket[];
}

export interface GeneSetStats {
  readonly sequenceCount: number;
  readonly meanLength: Metric;
  readonly medianLength: Metric;
  readonly sizeDistribution: readonly SizeBucket[];
}

export interface Outlier {
  /** Position in input order */
  readonly index: number;
  readonly id: string;
  readonly length: number;
}

export interface OutlierReport {
  readonly method: OutlierMethod;
  /** IQR multiplier or z-score threshold */
  readonly threshold: number;
  /** Values strictly below are flagged; `null` when nothing can be flagged */
  readonly lowerBound: Metric;
  /** Values strictly above are flagged */
  readonly upperBound: Metric;
  readonly outliers: readonly Outlier[];
}

export interface DistributionConfig {
  readonly nxValues: readonly number[];
  readonly assemblyBoundaries: readonly number[];
  readonly geneSetBoundaries: readonly number[];
  readonly iqrMultiplier: number;
  readonly zScoreThreshold: number;
  readonly histogramBins: number;
}

export interface AccumulatorOptions {
  /** Default: "total" */
  gcDenominator?: GcDenominator;
  /** Bins for the length histogram (default: 20) */
  histogramBins?: number;
  /** Symbols counted as ambiguous by `addSequence` (default: "NRYSWKMBDHV") */
  ambiguousSymbols?: string;
}

/**
 * Options for a full analysis run
 */
export interface AnalysisOptions {
  /** Include length, GC and N distribution blocks */
  detailed?: boolean;
  /** Include N50/L50, Nx, auN and the assembly size distribution */
  assembly?: boolean;
  /** Include the gene-set size distribution */
  geneSet?: boolean;
  /** Flag length outliers with the given method */
  outliers?: OutlierMethod;
  gcDenominator?: GcDenominator;
  distribution?: Partial<DistributionConfig>;
  /** Sequence text is never retained during analysis */
  parser?: Omit<FastaParserOptions, "retainSequence">;
}

export interface SummaryResult {
  readonly basic: BasicStats;
  readonly lengthStats?: LengthStats;
  readonly gcStats?: GcStats;
  readonly nStats?: NStats;
  readonly assemblyStats?: AssemblyStats;
  readonly geneSetStats?: GeneSetStats;
  readonly outliers?: OutlierReport;
}
