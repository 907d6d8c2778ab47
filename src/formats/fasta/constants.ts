/**
 * Constants for FASTA parsing and symbol tallying
 */

/** Marker that opens a record header line */
export const HEADER_MARKER = ">";

/** UTF-8 byte-order mark as decoded into a JS string */
export const BYTE_ORDER_MARK = 0xfeff;

/**
 * N plus the IUPAC nucleotide ambiguity codes
 * Tallied into `nCount`; case-insensitive.
 */
export const DEFAULT_AMBIGUOUS_SYMBOLS = "NRYSWKMBDHV";

/**
 * Characters that only appear when bytes were not decoded as text
 * (NUL from binary input, U+FFFD from invalid UTF-8)
 */
export const GARBLED_LINE_PATTERN = /[\u0000\uFFFD]/;

/** Minimum pipe-delimited fields for an NCBI-style identifier */
export const NCBI_ID_MIN_FIELDS = 4;

/** Character codes used on the tallying hot path */
export const CHAR_CODES = {
  G: 71,
  C: 67,
  LOWER_A: 97,
  LOWER_Z: 122,
  CASE_OFFSET: 32,
  SPACE: 32,
  TAB: 9,
  CARRIAGE_RETURN: 13,
  ASCII_MAX: 127,
  HIGH_SURROGATE_MIN: 0xd800,
  HIGH_SURROGATE_MAX: 0xdbff,
  BMP_MAX: 0xffff,
} as const;
