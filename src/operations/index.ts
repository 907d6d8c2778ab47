/**
 * Statistics pipeline exports: accumulator, distribution engine and
 * summary assembly
 */

export { DistributionEngine, formatBases, sizeDistribution } from "./assembly";
export {
  DEFAULT_DISTRIBUTION_CONFIG,
  DistributionConfigSchema,
  resolveDistributionConfig,
} from "./config";
export {
  histogram,
  mean,
  median,
  percentile,
  populationStdDev,
  populationVariance,
  sortDescending,
} from "./core/statistics";
export { detectIqrOutliers, detectZScoreOutliers } from "./outliers";
export { BasicStatsAccumulator, type CountedRecord } from "./stats";
export { analyzeFasta, analyzeLines, assembleSummary, type SummaryParts } from "./summary";
export type {
  AccumulatorOptions,
  AnalysisOptions,
  AssemblyStats,
  BasicStats,
  BasicSummary,
  DistributionConfig,
  GcDenominator,
  GcStats,
  GeneSetStats,
  Histogram,
  LengthSet,
  LengthStats,
  Metric,
  NStats,
  NxMetric,
  Outlier,
  OutlierMethod,
  OutlierReport,
  SizeBucket,
  SummaryResult,
} from "./types";
