/**
 * Summary assembly and one-pass analysis runs
 *
 * A run wires parser → accumulator → distribution engine and merges the
 * requested blocks into one immutable {@link SummaryResult}.
 *
 * @example
 * ```typescript
 * const summary = await analyzeFasta(readFastaLines("contigs.fa.gz"), {
 *   assembly: true,
 *   outliers: "iqr",
 * });
 * console.log(summary.assemblyStats?.n50);
 * ```
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { FastaParser } from "../formats/fasta";
import type { LineSource } from "../types";
import { DistributionEngine } from "./assembly";
import { BasicStatsAccumulator } from "./stats";
import type {
  AnalysisOptions,
  AssemblyStats,
  BasicSummary,
  GeneSetStats,
  OutlierReport,
  SummaryResult,
} from "./types";

/**
 * Blocks handed to {@link assembleSummary}
 */
export interface SummaryParts {
  readonly basic: BasicSummary;
  /** Copy the length, GC and N blocks from `basic` */
  readonly detailed?: boolean;
  readonly assemblyStats?: AssemblyStats;
  readonly geneSetStats?: GeneSetStats;
  readonly outliers?: OutlierReport;
}

/**
 * ArkType schema for the run-level switches; nested parser and distribution
 * settings are checked by their own owners
 */
const AnalysisOptionsSchema = type({
  "detailed?": "boolean",
  "assembly?": "boolean",
  "geneSet?": "boolean",
  "outliers?": "'iqr' | 'zscore'",
  "gcDenominator?": "'total' | 'unambiguous'",
  "distribution?": "object",
  "parser?": "object",
});

/**
 * Merge computed blocks into a deep-frozen summary
 *
 * Optional blocks appear only when present in `parts`; nothing is
 * recomputed here. The result is built from a copy, so `parts` stays
 * mutable.
 */
export function assembleSummary(parts: SummaryParts): SummaryResult {
  const { basic, detailed, assemblyStats, geneSetStats, outliers } = structuredClone(parts);
  return deepFreeze({
    basic: basic.basic,
    ...(detailed && {
      lengthStats: basic.lengthStats,
      gcStats: basic.gcStats,
      nStats: basic.nStats,
    }),
    ...(assemblyStats && { assemblyStats }),
    ...(geneSetStats && { geneSetStats }),
    ...(outliers && { outliers }),
  });
}

/**
 * Analyze a synchronous line source in one pass
 *
 * @throws {FormatError} On fatal structural problems in the input
 * @throws {ValidationError} When options fail validation
 */
export function analyzeLines(lines: Iterable<string>, options: AnalysisOptions = {}): SummaryResult {
  const run = new AnalysisRun(options);
  for (const record of run.parser.parse(lines)) {
    run.accumulator.add(record);
  }
  return run.finish();
}

/**
 * Analyze a synchronous or asynchronous line source in one pass
 * @see {@link analyzeLines}
 */
export async function analyzeFasta(
  lines: LineSource,
  options: AnalysisOptions = {}
): Promise<SummaryResult> {
  const run = new AnalysisRun(options);
  for await (const record of run.parser.parseAsync(lines)) {
    run.accumulator.add(record);
  }
  return run.finish();
}

class AnalysisRun {
  readonly parser: FastaParser;
  readonly accumulator: BasicStatsAccumulator;
  private readonly engine: DistributionEngine;

  constructor(private readonly options: AnalysisOptions) {
    const validationResult = AnalysisOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(
        `Invalid analysis options: ${validationResult.summary}`,
        undefined,
        "outliers must be 'iqr' or 'zscore'"
      );
    }

    this.engine = new DistributionEngine(options.distribution);
    this.parser = new FastaParser({ ...options.parser, retainSequence: false });
    this.accumulator = new BasicStatsAccumulator({
      histogramBins: this.engine.config.histogramBins,
      ...(options.gcDenominator && { gcDenominator: options.gcDenominator }),
      ...(options.parser?.ambiguousSymbols !== undefined && {
        ambiguousSymbols: options.parser.ambiguousSymbols,
      }),
    });
  }

  finish(): SummaryResult {
    const { assembly, geneSet, outliers, detailed } = this.options;
    const lengthSet = this.accumulator.takeLengthSet();

    return assembleSummary({
      basic: this.accumulator.getSummary(),
      detailed: detailed ?? false,
      ...(assembly && { assemblyStats: this.engine.assemblyStats(lengthSet) }),
      ...(geneSet && { geneSetStats: this.engine.geneSetStats(lengthSet) }),
      ...(outliers && { outliers: this.engine.detectOutliers(lengthSet, outliers) }),
    });
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
