/**
 * Length outlier detection
 *
 * Both methods flag values strictly outside `[lowerBound, upperBound]` and
 * report them in input order.
 */

import { mean, percentile, populationStdDev, sortAscending } from "./core/statistics";
import type { DistributionConfig, LengthSet, Outlier, OutlierMethod, OutlierReport } from "./types";

type OutlierDetector = (lengthSet: LengthSet, config: DistributionConfig) => OutlierReport;

/**
 * Tukey fences: `[Q1 - k·IQR, Q3 + k·IQR]`
 */
export function detectIqrOutliers(lengthSet: LengthSet, multiplier: number): OutlierReport {
  const sorted = sortAscending(lengthSet.lengths);
  const q1 = percentile(sorted, 25);
  const q3 = percentile(sorted, 75);
  if (q1 === null || q3 === null) {
    return emptyReport("iqr", multiplier);
  }

  const iqr = q3 - q1;
  const lowerBound = q1 - multiplier * iqr;
  const upperBound = q3 + multiplier * iqr;
  return {
    method: "iqr",
    threshold: multiplier,
    lowerBound,
    upperBound,
    outliers: collect(lengthSet, (length) => length < lowerBound || length > upperBound),
  };
}

/**
 * Flags `|z| > threshold` using the population standard deviation
 *
 * With zero spread no value is flagged.
 */
export function detectZScoreOutliers(lengthSet: LengthSet, threshold: number): OutlierReport {
  const center = mean(lengthSet.lengths);
  const spread = populationStdDev(lengthSet.lengths);
  if (center === null || spread === null || spread === 0) {
    return emptyReport("zscore", threshold);
  }

  return {
    method: "zscore",
    threshold,
    lowerBound: center - threshold * spread,
    upperBound: center + threshold * spread,
    outliers: collect(lengthSet, (length) => Math.abs((length - center) / spread) > threshold),
  };
}

export const OUTLIER_DETECTORS: Readonly<Record<OutlierMethod, OutlierDetector>> = Object.freeze({
  iqr: (lengthSet, config) => detectIqrOutliers(lengthSet, config.iqrMultiplier),
  zscore: (lengthSet, config) => detectZScoreOutliers(lengthSet, config.zScoreThreshold),
});

function collect(lengthSet: LengthSet, isOutlier: (length: number) => boolean): Outlier[] {
  const outliers: Outlier[] = [];
  lengthSet.lengths.forEach((length, index) => {
    if (isOutlier(length)) {
      outliers.push({ index, id: lengthSet.ids[index] ?? "", length });
    }
  });
  return outliers;
}

function emptyReport(method: OutlierMethod, threshold: number): OutlierReport {
  return { method, threshold, lowerBound: null, upperBound: null, outliers: [] };
}
