/**
 * Streaming accumulator for per-file sequence statistics
 *
 * Records are folded in one at a time. Running totals are O(1); the only
 * per-record state is the retained length, id and GC/N tallies, which the
 * quartile, Nx and outlier calculations need.
 *
 * @example
 * ```typescript
 * const accumulator = new BasicStatsAccumulator();
 * for (const record of parser.parseString(text)) accumulator.add(record);
 * const { basic } = accumulator.getSummary();
 * console.log(`${basic.sequenceCount} sequences, ${basic.totalLength} bp`);
 * ```
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { DEFAULT_AMBIGUOUS_SYMBOLS } from "../formats/fasta/constants";
import { buildSymbolLookup, countSymbols } from "../formats/fasta/primitives";
import type { SymbolCounts } from "../types";
import { DEFAULT_DISTRIBUTION_CONFIG } from "./config";
import {
  histogram,
  maximum,
  mean,
  median,
  minimum,
  percentile,
  populationStdDev,
  populationVariance,
  sortAscending,
} from "./core/statistics";
import type {
  AccumulatorOptions,
  BasicStats,
  BasicSummary,
  GcDenominator,
  GcStats,
  LengthSet,
  LengthStats,
  NStats,
} from "./types";

/**
 * ArkType schema for accumulator options
 */
const AccumulatorOptionsSchema = type({
  "gcDenominator?": "'total' | 'unambiguous'",
  "histogramBins?": "number > 0",
  "ambiguousSymbols?": "string",
}).narrow((options, ctx) => {
  if (options.histogramBins !== undefined && !Number.isInteger(options.histogramBins)) {
    return ctx.reject({
      expected: "an integer histogramBins",
      actual: String(options.histogramBins),
    });
  }
  return true;
});

/**
 * Counts-bearing input accepted by {@link BasicStatsAccumulator.add}
 */
export interface CountedRecord extends SymbolCounts {
  readonly id: string;
}

export class BasicStatsAccumulator {
  private readonly gcDenominator: GcDenominator;
  private readonly histogramBins: number;
  private readonly ambiguous: ReadonlySet<number>;

  private count = 0;
  private totalLength = 0;
  private minLength: number | null = null;
  private maxLength: number | null = null;
  private gcTotal = 0;
  private nTotal = 0;
  private otherTotal = 0;

  private readonly lengths: number[] = [];
  private readonly ids: string[] = [];
  private readonly gcCounts: number[] = [];
  private readonly nCounts: number[] = [];

  /**
   * @throws {ValidationError} When options fail schema validation
   */
  constructor(options: AccumulatorOptions = {}) {
    const validationResult = AccumulatorOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(
        `Invalid statistics options: ${validationResult.summary}`,
        undefined,
        "Check gcDenominator and histogramBins"
      );
    }

    this.gcDenominator = options.gcDenominator ?? "total";
    this.histogramBins = options.histogramBins ?? DEFAULT_DISTRIBUTION_CONFIG.histogramBins;
    this.ambiguous = buildSymbolLookup(options.ambiguousSymbols ?? DEFAULT_AMBIGUOUS_SYMBOLS);
  }

  /**
   * Fold in a record that already carries its symbol tallies
   */
  add(record: CountedRecord): void {
    this.count++;
    this.totalLength += record.length;

    // strict comparisons keep the first record seen on ties
    if (this.minLength === null || record.length < this.minLength) {
      this.minLength = record.length;
    }
    if (this.maxLength === null || record.length > this.maxLength) {
      this.maxLength = record.length;
    }

    this.gcTotal += record.gcCount;
    this.nTotal += record.nCount;
    this.otherTotal += record.otherCount;

    this.lengths.push(record.length);
    this.ids.push(record.id);
    this.gcCounts.push(record.gcCount);
    this.nCounts.push(record.nCount);
  }

  /**
   * Fold in raw sequence text or precomputed tallies
   */
  addSequence(sequence: string | SymbolCounts, id = ""): void {
    const counts = typeof sequence === "string" ? countSymbols(sequence, this.ambiguous) : sequence;
    this.add({ ...counts, id });
  }

  /**
   * Number of records folded in so far
   */
  get sequenceCount(): number {
    return this.count;
  }

  /**
   * Summary of everything seen so far; does not change the accumulator
   */
  getSummary(): BasicSummary {
    const sortedLengths = sortAscending(this.lengths);
    return {
      basic: this.basicStats(sortedLengths),
      lengthStats: this.lengthStats(sortedLengths),
      gcStats: this.gcStats(),
      nStats: this.nStats(),
    };
  }

  /**
   * Frozen copy of the retained lengths and ids, in input order
   */
  takeLengthSet(): LengthSet {
    return Object.freeze({
      lengths: Object.freeze([...this.lengths]),
      ids: Object.freeze([...this.ids]),
    });
  }

  private basicStats(sortedLengths: readonly number[]): BasicStats {
    const gcDenominator = this.denominator(this.totalLength, this.nTotal);
    return {
      sequenceCount: this.count,
      totalLength: this.totalLength,
      minLength: this.minLength,
      maxLength: this.maxLength,
      meanLength: this.count > 0 ? this.totalLength / this.count : null,
      medianLength: percentile(sortedLengths, 50),
      stdDevLength: populationStdDev(this.lengths),
      gcCount: this.gcTotal,
      nCount: this.nTotal,
      otherCount: this.otherTotal,
      gcFraction: gcDenominator > 0 ? this.gcTotal / gcDenominator : null,
      nFraction: this.totalLength > 0 ? this.nTotal / this.totalLength : null,
    };
  }

  private lengthStats(sortedLengths: readonly number[]): LengthStats {
    const q1 = percentile(sortedLengths, 25);
    const q3 = percentile(sortedLengths, 75);
    return {
      q1,
      q3,
      iqr: q1 === null || q3 === null ? null : q3 - q1,
      variance: populationVariance(this.lengths),
      histogram: histogram(this.lengths, this.histogramBins),
    };
  }

  private gcStats(): GcStats {
    const fractions: number[] = [];
    this.lengths.forEach((length, index) => {
      const denominator = this.denominator(length, this.nCounts[index] ?? 0);
      if (denominator > 0) {
        fractions.push((this.gcCounts[index] ?? 0) / denominator);
      }
    });

    const overallDenominator = this.denominator(this.totalLength, this.nTotal);
    return {
      gcDenominator: this.gcDenominator,
      overallGcFraction: overallDenominator > 0 ? this.gcTotal / overallDenominator : null,
      meanGcFraction: mean(fractions),
      medianGcFraction: median(fractions),
      minGcFraction: minimum(fractions),
      maxGcFraction: maximum(fractions),
      stdDevGcFraction: populationStdDev(fractions),
    };
  }

  private nStats(): NStats {
    const fractions: number[] = [];
    let sequencesWithN = 0;
    this.lengths.forEach((length, index) => {
      const nCount = this.nCounts[index] ?? 0;
      if (nCount > 0) sequencesWithN++;
      if (length > 0) fractions.push(nCount / length);
    });

    return {
      totalN: this.nTotal,
      sequencesWithN,
      fractionSequencesWithN: this.count > 0 ? sequencesWithN / this.count : null,
      nFraction: this.totalLength > 0 ? this.nTotal / this.totalLength : null,
      meanNFraction: mean(fractions),
      maxNFraction: maximum(fractions),
    };
  }

  private denominator(length: number, nCount: number): number {
    return this.gcDenominator === "unambiguous" ? length - nCount : length;
  }
}
