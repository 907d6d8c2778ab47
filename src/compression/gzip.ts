/**
 * Streaming gzip decompression over web streams
 */

import { DecompressionStream } from "node:stream/web";

export const GzipDecompressor = {
  /**
   * Pipe a compressed byte stream through a gzip decoder
   *
   * Corrupt input fails the first read that reaches it.
   */
  wrapStream(stream: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
    return stream.pipeThrough(new DecompressionStream("gzip"));
  },
} as const;
