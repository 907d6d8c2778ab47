/**
 * State machine for streaming FASTA record assembly
 *
 * Consumes one line at a time and emits a record whenever a header closes
 * the previous one, so the caller decides how lines are pulled (sync
 * iterator, async iterator, validation loop). Only the open record's header
 * and tallies are held; sequence chunks are kept only when sequence text
 * was requested.
 *
 * @remarks
 * The state machine transitions:
 * WAITING_HEADER → READING_SEQUENCE → READING_SEQUENCE (on every header)
 *
 * Fatal structural problems throw {@link FormatError}; record-level
 * problems are handed to the `report` callback with their policy attached.
 */

import { FormatError } from "../../errors";
import type { FastaRecord } from "../../types";
import { BYTE_ORDER_MARK } from "./constants";
import {
  buildSymbolLookup,
  createTally,
  isBlankLine,
  isGarbledLine,
  isHeaderLine,
  parseHeaderLine,
  stripWhitespace,
  tallyLine,
} from "./primitives";
import type { AssemblerSettings, FastaParserContext, RecordIssue } from "./types";
import { FastaParsingState } from "./types";

export class FastaRecordAssembler {
  private readonly context: FastaParserContext = {
    state: FastaParsingState.WAITING_HEADER,
    headerLineNumber: 0,
    tally: createTally(),
    chunks: [],
    seenIds: new Map(),
  };
  private readonly ambiguous: ReadonlySet<number>;
  private headersRead = 0;

  constructor(
    private readonly settings: AssemblerSettings,
    private readonly report: (issue: RecordIssue) => void
  ) {
    this.ambiguous = buildSymbolLookup(settings.ambiguousSymbols);
  }

  /**
   * Feed one line
   *
   * @param rawLine - Line text without its terminator (a trailing `\r` is tolerated)
   * @param lineNumber - 1-based line number
   * @returns The record closed by this line, if it was a header following another record
   * @throws {FormatError} On content before the first header, empty headers, or binary data
   */
  push(rawLine: string, lineNumber: number): FastaRecord | undefined {
    const line =
      lineNumber === 1 && rawLine.charCodeAt(0) === BYTE_ORDER_MARK ? rawLine.slice(1) : rawLine;

    if (isBlankLine(line)) return undefined;

    if (isGarbledLine(line)) {
      throw new FormatError(
        "Line contains binary data (NUL or undecodable bytes)",
        lineNumber,
        "Decompress the input before parsing"
      );
    }

    if (isHeaderLine(line)) {
      const closed = this.closeRecord();
      this.openRecord(line, lineNumber);
      return closed;
    }

    if (this.context.state === FastaParsingState.WAITING_HEADER) {
      throw new FormatError("Sequence data found before the first header", lineNumber, line);
    }

    tallyLine(line, this.ambiguous, this.context.tally);
    if (this.settings.retainSequence) {
      this.context.chunks.push(stripWhitespace(line));
    }
    return undefined;
  }

  /**
   * Number of headers opened so far
   */
  get recordCount(): number {
    return this.headersRead;
  }

  /**
   * Signal end of input
   * @returns The last open record, if any
   */
  finish(): FastaRecord | undefined {
    const closed = this.closeRecord();
    this.context.state = FastaParsingState.WAITING_HEADER;
    return closed;
  }

  private openRecord(line: string, lineNumber: number): void {
    const header = parseHeaderLine(line);
    if (!header) {
      throw new FormatError("Header line has no sequence identifier", lineNumber, line);
    }
    this.headersRead++;

    const firstSeen = this.context.seenIds.get(header.id);
    if (firstSeen === undefined) {
      this.context.seenIds.set(header.id, lineNumber);
    } else {
      this.raise(
        "duplicate-id",
        header.id,
        lineNumber,
        `duplicate id, first seen at line ${firstSeen}`
      );
    }

    this.context.state = FastaParsingState.READING_SEQUENCE;
    this.context.header = header;
    this.context.headerLineNumber = lineNumber;
    this.context.tally = createTally();
    this.context.chunks = [];
  }

  private closeRecord(): FastaRecord | undefined {
    const { header, headerLineNumber, tally, chunks } = this.context;
    if (this.context.state !== FastaParsingState.READING_SEQUENCE || !header) {
      return undefined;
    }

    if (tally.length === 0) {
      this.raise("empty-sequence", header.id, headerLineNumber, "empty sequence");
    }

    const record: FastaRecord = {
      format: "fasta",
      ...header,
      lineNumber: headerLineNumber,
      length: tally.length,
      gcCount: tally.gcCount,
      nCount: tally.nCount,
      otherCount: tally.otherCount,
      ...(this.settings.retainSequence && { sequence: chunks.join("") }),
    };

    this.context.header = undefined;
    this.context.chunks = [];
    return record;
  }

  private raise(
    kind: RecordIssue["kind"],
    sequenceId: string,
    lineNumber: number,
    detail: string
  ): void {
    const policy =
      kind === "empty-sequence"
        ? this.settings.emptySequencePolicy
        : this.settings.duplicateIdPolicy;

    this.report({
      kind,
      policy,
      sequenceId,
      lineNumber,
      detail,
      message: `Sequence '${sequenceId}': ${detail}`,
    });
  }
}
