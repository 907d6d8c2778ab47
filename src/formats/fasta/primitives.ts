/**
 * FASTA Parsing Primitives - Minimal, composable operations
 *
 * Pure functions used by the record state machine. None of them hold
 * state between calls.
 */

import type { HeaderInfo, NcbiIdentifier, SymbolCounts } from "../../types";
import { CHAR_CODES, GARBLED_LINE_PATTERN, HEADER_MARKER, NCBI_ID_MIN_FIELDS } from "./constants";
import type { SymbolTally } from "./types";

// ============================================================================
// LINE CLASSIFICATION
// ============================================================================

/**
 * Check if a line opens a record
 */
export function isHeaderLine(line: string): boolean {
  return line.startsWith(HEADER_MARKER);
}

/**
 * Check if a line holds nothing but whitespace
 */
export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * Check if a line carries undecoded binary data
 */
export function isGarbledLine(line: string): boolean {
  return GARBLED_LINE_PATTERN.test(line);
}

// ============================================================================
// HEADER PARSING
// ============================================================================

/**
 * Parse a header line into id, description and optional NCBI fields
 *
 * @param headerLine - Line starting with '>'
 * @returns Parsed header, or `null` when no identifier follows the marker
 */
export function parseHeaderLine(headerLine: string): HeaderInfo | null {
  const fullHeader = headerLine.slice(HEADER_MARKER.length).trim();
  if (fullHeader.length === 0) return null;

  const firstSpace = fullHeader.search(/\s/);
  const id = firstSpace === -1 ? fullHeader : fullHeader.slice(0, firstSpace);
  const description = firstSpace === -1 ? "" : fullHeader.slice(firstSpace + 1).trim();
  const ncbi = parseNcbiIdentifier(id);

  return ncbi ? { id, description, fullHeader, ncbi } : { id, description, fullHeader };
}

/**
 * Split `gi|12345|ref|NM_000001.1|` style identifiers
 */
export function parseNcbiIdentifier(id: string): NcbiIdentifier | undefined {
  if (!id.includes("|")) return undefined;

  const fields = id.split("|");
  if (fields.length < NCBI_ID_MIN_FIELDS) return undefined;

  const [database = "", gi = "", refType = "", accession = ""] = fields;
  return { database, gi, refType, accession };
}

// ============================================================================
// SYMBOL TALLYING
// ============================================================================

/**
 * Build a lookup of upper-case character codes from a symbol string
 */
export function buildSymbolLookup(symbols: string): ReadonlySet<number> {
  const lookup = new Set<number>();
  for (const symbol of symbols.toUpperCase()) {
    const code = symbol.codePointAt(0);
    if (code !== undefined) lookup.add(code);
  }
  return lookup;
}

/**
 * Whitespace test matching the `\s` class, fast for ASCII
 */
export function isWhitespaceCode(code: number): boolean {
  if (code === CHAR_CODES.SPACE) return true;
  if (code >= CHAR_CODES.TAB && code <= CHAR_CODES.CARRIAGE_RETURN) return true;
  return code > CHAR_CODES.ASCII_MAX && /\s/u.test(String.fromCodePoint(code));
}

/**
 * Add one sequence line's symbols to a running tally
 *
 * Whitespace anywhere in the line is skipped; every other code point counts
 * once toward length and lands in exactly one of gc, n or other.
 */
export function tallyLine(line: string, ambiguous: ReadonlySet<number>, tally: SymbolTally): void {
  for (let i = 0; i < line.length; i++) {
    let code = line.charCodeAt(i);
    if (code >= CHAR_CODES.HIGH_SURROGATE_MIN && code <= CHAR_CODES.HIGH_SURROGATE_MAX) {
      code = line.codePointAt(i) ?? code;
      // astral symbol: skip its low surrogate
      if (code > CHAR_CODES.BMP_MAX) i++;
    }
    if (isWhitespaceCode(code)) continue;

    if (code >= CHAR_CODES.LOWER_A && code <= CHAR_CODES.LOWER_Z) {
      code -= CHAR_CODES.CASE_OFFSET;
    }

    tally.length++;
    if (code === CHAR_CODES.G || code === CHAR_CODES.C) {
      tally.gcCount++;
    } else if (ambiguous.has(code)) {
      tally.nCount++;
    } else {
      tally.otherCount++;
    }
  }
}

/**
 * Tally a complete sequence string
 */
export function countSymbols(sequence: string, ambiguous: ReadonlySet<number>): SymbolCounts {
  const tally = createTally();
  tallyLine(sequence, ambiguous, tally);
  return { ...tally };
}

/**
 * Fresh zeroed tally
 */
export function createTally(): SymbolTally {
  return { length: 0, gcCount: 0, nCount: 0, otherCount: 0 };
}

/**
 * Remove all whitespace from a sequence line
 */
export function stripWhitespace(line: string): string {
  return line.replace(/\s+/g, "");
}

/**
 * Split in-memory text into lines, accepting LF and CRLF terminators
 */
export function splitLines(data: string): string[] {
  return data.split(/\r?\n/);
}
