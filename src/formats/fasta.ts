/**
 * FASTA format parser and validator
 *
 * Handles the messiness of real-world FASTA files:
 * - Wrapped and unwrapped sequences
 * - Blank lines before, between and after records
 * - Mixed case sequences and IUPAC ambiguity codes
 * - CRLF line endings and a leading byte-order mark
 * - Empty records and repeated identifiers
 *
 * Records are assembled one at a time from a pull-based line source, so
 * memory stays bounded by the longest header plus (optionally) the longest
 * single sequence, never by file size.
 */

import { type } from "arktype";
import { FormatError, SequenceError, ValidationError } from "../errors";
import type {
  FastaParserOptions,
  FastaRecord,
  LineSource,
  ParserStats,
  ValidationIssue,
  ValidationResult,
} from "../types";
import { FastaParserOptionsSchema } from "../types";
import { AbstractParser } from "./abstract-parser";
import { DEFAULT_AMBIGUOUS_SYMBOLS } from "./fasta/constants";
import { splitLines } from "./fasta/primitives";
import { FastaRecordAssembler } from "./fasta/state-machine";
import type { AssemblerSettings, RecordIssue } from "./fasta/types";

/**
 * Streaming FASTA parser with structural validation
 *
 * @example Basic usage
 * ```typescript
 * const parser = new FastaParser();
 * for (const record of parser.parseString(">seq1 demo\nACGT\n")) {
 *   console.log(`${record.id}: ${record.length} bp`);
 * }
 * ```
 *
 * @example Strict validation without materializing sequences
 * ```typescript
 * const parser = new FastaParser({ emptySequencePolicy: "error", duplicateIdPolicy: "error" });
 * const result = await parser.validateFormatAsync(readFastaLines("assembly.fa.gz"));
 * if (!result.isValid) console.error(result.errors);
 * ```
 */
class FastaParser extends AbstractParser<FastaRecord, FastaParserOptions> {
  private readonly settings: AssemblerSettings;
  private readonly onRecordError: ((error: string, lineNumber?: number) => void) | undefined;
  private stats: { lineCount: number; recordCount: number; totalLength: number };

  /**
   * Create a new FASTA parser
   * @param options Parser configuration options including AbortSignal
   * @throws {ValidationError} When options fail schema validation
   */
  constructor(options: FastaParserOptions = {}) {
    const validationResult = FastaParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(
        `Invalid FASTA parser options: ${validationResult.summary}`,
        undefined,
        "FASTA parser configuration"
      );
    }

    super(options);

    this.settings = {
      retainSequence: options.retainSequence ?? true,
      emptySequencePolicy: options.emptySequencePolicy ?? "warning",
      duplicateIdPolicy: options.duplicateIdPolicy ?? "warning",
      ambiguousSymbols: options.ambiguousSymbols ?? DEFAULT_AMBIGUOUS_SYMBOLS,
    };
    this.onRecordError = options.onError;
    this.stats = { lineCount: 0, recordCount: 0, totalLength: 0 };
  }

  protected getFormatName(): string {
    return "FASTA";
  }

  /**
   * Parse FASTA records from an in-memory string
   * @example
   * ```typescript
   * const records = [...parser.parseString(">seq1\nATCG\n>seq2\nGGGG")];
   * ```
   */
  *parseString(data: string): Generator<FastaRecord, void, undefined> {
    yield* this.parse(splitLines(data));
  }

  /**
   * Lazily parse records from a synchronous line source
   *
   * The sequence is single-pass: restarting requires a fresh line source.
   * Stopping early is safe; the parser holds nothing that needs releasing.
   *
   * @param lines Decoded text lines, without terminators
   * @yields One record per header, in input order
   * @throws {FormatError} On fatal structural problems
   * @throws {SequenceError} On policy-escalated record problems without a custom `onError`
   * @throws {ParseError} When the abort signal fires
   */
  *parse(lines: Iterable<string>): Generator<FastaRecord, void, undefined> {
    const assembler = this.beginRun();
    let lineNumber = 0;

    for (const line of lines) {
      lineNumber++;
      const record = this.consume(assembler, line, lineNumber);
      if (record) yield record;
    }

    const last = assembler.finish();
    if (last) yield this.emit(last);
  }

  /**
   * Lazily parse records from a synchronous or asynchronous line source
   * @see {@link FastaParser.parse}
   */
  async *parseAsync(lines: LineSource): AsyncGenerator<FastaRecord, void, undefined> {
    const assembler = this.beginRun();
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      const record = this.consume(assembler, line, lineNumber);
      if (record) yield record;
    }

    const last = assembler.finish();
    if (last) yield this.emit(last);
  }

  /**
   * Run the parser to completion, collecting every error and warning
   *
   * Sequence text is never retained. A fatal error ends the run and is
   * recorded as the last error; policy-escalated record problems are
   * recorded as errors without stopping.
   */
  validateFormat(lines: Iterable<string>): ValidationResult {
    const collector = new ValidationCollector();
    const assembler = this.createAssembler(false, (issue) => collector.addIssue(issue));
    let lineNumber = 0;

    try {
      for (const line of lines) {
        lineNumber++;
        this.checkAborted();
        assembler.push(line, lineNumber);
      }
      assembler.finish();
    } catch (error) {
      collector.addFatal(error, lineNumber);
    }

    return collector.toResult(assembler.recordCount);
  }

  /**
   * Asynchronous variant of {@link FastaParser.validateFormat}
   */
  async validateFormatAsync(lines: LineSource): Promise<ValidationResult> {
    const collector = new ValidationCollector();
    const assembler = this.createAssembler(false, (issue) => collector.addIssue(issue));
    let lineNumber = 0;

    try {
      for await (const line of lines) {
        lineNumber++;
        this.checkAborted();
        assembler.push(line, lineNumber);
      }
      assembler.finish();
    } catch (error) {
      collector.addFatal(error, lineNumber);
    }

    return collector.toResult(assembler.recordCount);
  }

  /**
   * Counters for the most recent parse run
   */
  getStats(): ParserStats {
    return { ...this.stats };
  }

  private beginRun(): FastaRecordAssembler {
    this.stats = { lineCount: 0, recordCount: 0, totalLength: 0 };
    return this.createAssembler(this.settings.retainSequence, (issue) => this.routeIssue(issue));
  }

  private consume(
    assembler: FastaRecordAssembler,
    line: string,
    lineNumber: number
  ): FastaRecord | undefined {
    this.checkAborted();
    this.stats.lineCount = lineNumber;
    const record = assembler.push(line, lineNumber);
    return record ? this.emit(record) : undefined;
  }

  private emit(record: FastaRecord): FastaRecord {
    this.stats.recordCount++;
    this.stats.totalLength += record.length;
    return record;
  }

  private createAssembler(
    retainSequence: boolean,
    report: (issue: RecordIssue) => void
  ): FastaRecordAssembler {
    return new FastaRecordAssembler({ ...this.settings, retainSequence }, report);
  }

  private routeIssue(issue: RecordIssue): void {
    if (issue.policy === "warning") {
      this.onWarning(issue.message, issue.lineNumber);
      return;
    }
    if (this.onRecordError) {
      this.onRecordError(issue.message, issue.lineNumber);
      return;
    }
    throw new SequenceError(issue.detail, issue.sequenceId, issue.lineNumber);
  }
}

/**
 * Accumulates issues for validation mode
 */
class ValidationCollector {
  private readonly errors: ValidationIssue[] = [];
  private readonly warnings: ValidationIssue[] = [];

  addIssue(issue: RecordIssue): void {
    const entry = { lineNumber: issue.lineNumber, message: issue.message };
    if (issue.policy === "error") {
      this.errors.push(entry);
    } else {
      this.warnings.push(entry);
    }
  }

  /**
   * Record a fatal error; anything other than a format error propagates
   */
  addFatal(error: unknown, lineNumber: number): void {
    if (!(error instanceof FormatError)) {
      throw error;
    }
    this.errors.push({ lineNumber: error.lineNumber ?? lineNumber, message: error.message });
  }

  toResult(recordCount: number): ValidationResult {
    return {
      isValid: this.errors.length === 0,
      errors: [...this.errors],
      warnings: [...this.warnings],
      recordCount,
    };
  }
}

// Exports - grouped at end per project style guide
export { FastaParser };
