/**
 * Core type definitions for FASTA records and parser configuration
 *
 * Records carry symbol tallies rather than sequence text so that the parser
 * can stream multi-gigabyte assemblies in bounded memory. Sequence text is
 * attached only when a caller explicitly asks for it.
 */

import { type } from "arktype";

/**
 * Identifier fields recovered from NCBI-style pipe-delimited ids
 * (`gi|12345|ref|NM_000001.1|`)
 */
export interface NcbiIdentifier {
  readonly database: string;
  readonly gi: string;
  readonly refType: string;
  readonly accession: string;
}

/**
 * Parsed header line
 */
export interface HeaderInfo {
  /** First whitespace-delimited token after '>' (never empty) */
  readonly id: string;
  /** Remainder of the header line, trimmed (may be empty) */
  readonly description: string;
  /** Full header text after '>' */
  readonly fullHeader: string;
  /** Present when the id is a pipe-delimited NCBI identifier */
  readonly ncbi?: NcbiIdentifier;
}

/**
 * Per-record symbol tallies
 *
 * `gcCount + nCount + otherCount === length` for every record.
 */
export interface SymbolCounts {
  /** Count of non-whitespace symbols */
  readonly length: number;
  /** G and C symbols, case-insensitive */
  readonly gcCount: number;
  /** N and IUPAC ambiguity symbols, case-insensitive */
  readonly nCount: number;
  /** Everything else */
  readonly otherCount: number;
}

/**
 * One FASTA entry as produced by the parser
 */
export interface FastaRecord extends HeaderInfo, SymbolCounts {
  readonly format: "fasta";
  /** Line number of the header line (1-based) */
  readonly lineNumber: number;
  /** Assembled sequence text, only when `retainSequence` is enabled */
  readonly sequence?: string;
}

/**
 * Lazy source of already-decoded text lines
 *
 * Decompression and file access happen before this point; see `src/io`.
 */
export type LineSource = Iterable<string> | AsyncIterable<string>;

/**
 * How a record-level problem is reported
 */
export type IssuePolicy = "warning" | "error";

/**
 * A single problem found while reading the input
 */
export interface ValidationIssue {
  /** Originating line, `null` when the problem has no single line */
  readonly lineNumber: number | null;
  readonly message: string;
}

/**
 * Outcome of a full validation pass
 */
export interface ValidationResult {
  /** True iff no errors were recorded (warnings do not affect validity) */
  readonly isValid: boolean;
  readonly errors: readonly ValidationIssue[];
  readonly warnings: readonly ValidationIssue[];
  /** Number of header lines read before the run ended */
  readonly recordCount: number;
}

/**
 * Running parser counters for the most recent run
 */
export interface ParserStats {
  readonly lineCount: number;
  readonly recordCount: number;
  readonly totalLength: number;
}

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler for policy-escalated record problems */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * FASTA-specific parser options
 */
export interface FastaParserOptions extends ParserOptions {
  /** Keep each record's sequence text on the emitted record (default: true) */
  retainSequence?: boolean;
  /** Report records without sequence as warnings or errors (default: "warning") */
  emptySequencePolicy?: IssuePolicy;
  /** Report repeated ids as warnings or errors (default: "warning") */
  duplicateIdPolicy?: IssuePolicy;
  /** Symbols tallied into `nCount`, case-insensitive (default: "NRYSWKMBDHV") */
  ambiguousSymbols?: string;
}

/**
 * ArkType schema for FASTA parser options
 */
export const FastaParserOptionsSchema = type({
  "retainSequence?": "boolean",
  "emptySequencePolicy?": "'warning' | 'error'",
  "duplicateIdPolicy?": "'warning' | 'error'",
  "ambiguousSymbols?": "string",
}).narrow((options, ctx) => {
  if (options.ambiguousSymbols !== undefined && /[\sGCgc]/.test(options.ambiguousSymbols)) {
    return ctx.reject({
      expected: "ambiguity symbols without whitespace, G or C",
      actual: JSON.stringify(options.ambiguousSymbols),
    });
  }
  return true;
});
