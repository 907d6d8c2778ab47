/**
 * Compression format detection for FASTA inputs
 *
 * Only magic bytes decide: a `.gz` name on a plain file is read as plain
 * text, and a gzip stream without the extension is still decompressed.
 */

export type CompressionFormat = "gzip" | "zstd" | "none";

// Magic number constants for compression formats
const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;
const ZSTD_MAGIC_FIRST_BYTE = 0x28;
const ZSTD_MAGIC_SECOND_BYTE = 0xb5;
const ZSTD_MAGIC_THIRD_BYTE = 0x2f;
const ZSTD_MAGIC_FOURTH_BYTE = 0xfd;

const COMPRESSION_MAGIC_BYTES = {
  gzip: new Uint8Array([GZIP_MAGIC_FIRST_BYTE, GZIP_MAGIC_SECOND_BYTE]),
  zstd: new Uint8Array([
    ZSTD_MAGIC_FIRST_BYTE,
    ZSTD_MAGIC_SECOND_BYTE,
    ZSTD_MAGIC_THIRD_BYTE,
    ZSTD_MAGIC_FOURTH_BYTE,
  ]),
} as const;

/**
 * Bytes needed to recognize every supported signature
 */
export const MAGIC_BYTES_LENGTH = COMPRESSION_MAGIC_BYTES.zstd.length;

/**
 * @example
 * ```typescript
 * CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08])); // "gzip"
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression from the leading bytes of a file
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionFormat {
    if (startsWith(bytes, COMPRESSION_MAGIC_BYTES.gzip)) return "gzip";
    if (startsWith(bytes, COMPRESSION_MAGIC_BYTES.zstd)) return "zstd";
    return "none";
  }
}

function startsWith(bytes: Uint8Array, signature: Uint8Array): boolean {
  if (bytes.length < signature.length) return false;
  return signature.every((byte, index) => bytes[index] === byte);
}
