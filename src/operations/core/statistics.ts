/**
 * Numeric helpers shared by the accumulator and the distribution engine
 *
 * Every function is pure and returns `null` where the statistic is
 * undefined (empty input), never `NaN`.
 */

import { assertBinCount } from "../config";

/**
 * Equal-width histogram over a set of values
 */
export interface Histogram {
  /** `bins + 1` ascending edges; the last bin is closed on the right */
  readonly binEdges: readonly number[];
  readonly counts: readonly number[];
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

export function mean(values: readonly number[]): number | null {
  return values.length === 0 ? null : sum(values) / values.length;
}

/**
 * Ascending copy; the input is left untouched
 */
export function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * Descending copy
 *
 * `Array.prototype.sort` is stable, so equal values keep their input order.
 */
export function sortDescending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => b - a);
}

/**
 * Percentile by linear interpolation between closest ranks
 *
 * @param sorted - Values in ascending order
 * @param p - Percentile in [0, 100]
 */
export function percentile(sorted: readonly number[], p: number): number | null {
  if (sorted.length === 0) return null;

  const rank = (p / 100) * (sorted.length - 1);
  const lowerIndex = Math.floor(rank);
  const upperIndex = Math.ceil(rank);
  const lower = sorted[lowerIndex] ?? 0;
  const upper = sorted[upperIndex] ?? lower;

  return lower + (upper - lower) * (rank - lowerIndex);
}

export function median(values: readonly number[]): number | null {
  return percentile(sortAscending(values), 50);
}

/**
 * Population variance (divides by n), two-pass
 */
export function populationVariance(values: readonly number[]): number | null {
  const center = mean(values);
  if (center === null) return null;

  let squares = 0;
  for (const value of values) {
    const delta = value - center;
    squares += delta * delta;
  }
  return squares / values.length;
}

export function populationStdDev(values: readonly number[]): number | null {
  const variance = populationVariance(values);
  return variance === null ? null : Math.sqrt(variance);
}

export function minimum(values: readonly number[]): number | null {
  let result: number | null = null;
  for (const value of values) {
    if (result === null || value < result) result = value;
  }
  return result;
}

export function maximum(values: readonly number[]): number | null {
  let result: number | null = null;
  for (const value of values) {
    if (result === null || value > result) result = value;
  }
  return result;
}

/**
 * Equal-width histogram over `[min, max]`
 *
 * A constant input spans `[v - 0.5, v + 0.5]`. Values equal to the upper
 * edge fall into the last bin.
 *
 * @returns `null` for empty input
 * @throws {ValidationError} Unless `bins` is a positive integer
 */
export function histogram(values: readonly number[], bins: number): Histogram | null {
  assertBinCount(bins);
  let low = minimum(values);
  let high = maximum(values);
  if (low === null || high === null) return null;

  if (low === high) {
    low -= 0.5;
    high += 0.5;
  }

  const width = high - low;
  const binEdges: number[] = [];
  for (let i = 0; i <= bins; i++) {
    binEdges.push(i === bins ? high : low + (width * i) / bins);
  }

  const counts = new Array<number>(bins).fill(0);
  for (const value of values) {
    const index = Math.min(Math.floor(((value - low) * bins) / width), bins - 1);
    counts[index] = (counts[index] ?? 0) + 1;
  }

  return { binEdges, counts };
}
