/**
 * Type definitions for the FASTA record state machine
 */

import type { HeaderInfo, IssuePolicy } from "../../types";

/**
 * State machine states for FASTA parsing
 */
export enum FastaParsingState {
  WAITING_HEADER, // No record opened yet; only blank lines are acceptable
  READING_SEQUENCE, // Inside a record; accumulating sequence lines
}

/**
 * Mutable symbol tally for the record being read
 */
export interface SymbolTally {
  length: number;
  gcCount: number;
  nCount: number;
  otherCount: number;
}

/**
 * State machine parser context
 * Holds the open record's header and tallies, never more than one record
 */
export interface FastaParserContext {
  state: FastaParsingState;
  header?: HeaderInfo;
  headerLineNumber: number;
  tally: SymbolTally;
  /** Sequence chunks of the open record, only filled when sequence text is retained */
  chunks: string[];
  /** First header line of every id seen so far */
  seenIds: Map<string, number>;
}

/**
 * Record-level problem routed through the configured policy
 */
export interface RecordIssue {
  readonly kind: "empty-sequence" | "duplicate-id";
  readonly policy: IssuePolicy;
  readonly sequenceId: string;
  readonly lineNumber: number;
  /** Short description without the record prefix */
  readonly detail: string;
  /** Full message: `Sequence '<id>': <detail>` */
  readonly message: string;
}

/**
 * Resolved settings the state machine runs with
 */
export interface AssemblerSettings {
  readonly retainSequence: boolean;
  readonly emptySequencePolicy: IssuePolicy;
  readonly duplicateIdPolicy: IssuePolicy;
  readonly ambiguousSymbols: string;
}
