/**
 * Central format module exports
 */

export { AbstractParser } from "./abstract-parser";
export { FastaParser } from "./fasta";
export {
  BYTE_ORDER_MARK,
  DEFAULT_AMBIGUOUS_SYMBOLS,
  HEADER_MARKER,
} from "./fasta/constants";
export {
  countSymbols,
  buildSymbolLookup,
  parseHeaderLine,
  parseNcbiIdentifier,
  splitLines,
} from "./fasta/primitives";
export { FastaRecordAssembler } from "./fasta/state-machine";
export type { AssemblerSettings, RecordIssue } from "./fasta/types";
