/**
 * fastacheck - streaming FASTA validation and sequence statistics
 *
 * Validates FASTA structure line by line and summarizes the records it
 * contains: length distribution, GC and N composition, assembly metrics
 * (N50, L50, auN) and length outliers, in bounded memory.
 */

// Compression infrastructure
export {
  CompressionDetector,
  type CompressionFormat,
  createDecompressor,
  GzipDecompressor,
  ZstdDecompressor,
} from "./compression";
// Error types
export {
  CompressionError,
  ERROR_SUGGESTIONS,
  FastaCheckError,
  FileError,
  FormatError,
  getErrorSuggestion,
  ParseError,
  SequenceError,
  ValidationError,
} from "./errors";
// FASTA format
export * from "./formats";
// Line sources
export {
  createStream,
  detectFileCompression,
  exists,
  readFastaLines,
} from "./io/file-reader";
export { linesFromString, readLines } from "./io/stream-utils";
// Statistics
export * from "./operations";
// Core types
export type {
  FastaParserOptions,
  FastaRecord,
  HeaderInfo,
  IssuePolicy,
  LineSource,
  NcbiIdentifier,
  ParserOptions,
  ParserStats,
  SymbolCounts,
  ValidationIssue,
  ValidationResult,
} from "./types";
export { FastaParserOptionsSchema } from "./types";
