/**
 * Compression detection and decoding for file line sources
 *
 * @example
 * ```typescript
 * import { CompressionDetector, createDecompressor } from "./compression";
 *
 * const format = CompressionDetector.fromMagicBytes(head);
 * const decoded = createDecompressor(format)(rawStream);
 * ```
 */

import { CompressionError } from "../errors";
import type { CompressionFormat } from "./detector";
import { GzipDecompressor } from "./gzip";
import { ZstdDecompressor } from "./zstd";

export { CompressionDetector, MAGIC_BYTES_LENGTH } from "./detector";
export type { CompressionFormat } from "./detector";
export { GzipDecompressor } from "./gzip";
export { ZstdDecompressor } from "./zstd";

type StreamDecoder = (stream: ReadableStream<Uint8Array>) => ReadableStream<Uint8Array>;

const DECODERS: Readonly<Record<CompressionFormat, StreamDecoder>> = Object.freeze({
  none: (stream) => stream,
  gzip: (stream) => GzipDecompressor.wrapStream(stream),
  zstd: (stream) => ZstdDecompressor.wrapStream(stream),
});

const CORRUPT_STREAM_HINTS: Readonly<Record<Exclude<CompressionFormat, "none">, string>> = {
  gzip: "The file may be truncated or not a valid gzip stream",
  zstd: "The file may be truncated or not a valid zstd frame",
};

/**
 * Select the stream decoder for a detected format
 */
export function createDecompressor(format: CompressionFormat): StreamDecoder {
  return DECODERS[format];
}

/**
 * Normalize a decoder failure
 */
export function toCompressionError(
  error: unknown,
  format: Exclude<CompressionFormat, "none">
): CompressionError {
  if (error instanceof CompressionError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new CompressionError(
    `${format} decompression failed: ${message}`,
    format,
    "decompress",
    CORRUPT_STREAM_HINTS[format]
  );
}
