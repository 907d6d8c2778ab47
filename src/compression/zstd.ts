/**
 * Zstandard decompression through the @hpcc-js/wasm-zstd WASM build
 *
 * The WASM module is loaded once, on the first zstd stream. Frames are
 * decoded in one call when the compressed input ends, so a zstd file is
 * held in memory in full (compressed and decompressed) while it is read.
 */

import { Zstd } from "@hpcc-js/wasm-zstd";
import { TransformStream } from "node:stream/web";
import { CompressionError } from "../errors";

let zstdModule: Promise<Zstd> | undefined;

/**
 * Shared WASM instance; a failed load is retried on the next call
 */
function loadZstd(): Promise<Zstd> {
  zstdModule ??= Zstd.load().catch((error: unknown) => {
    zstdModule = undefined;
    const message = error instanceof Error ? error.message : String(error);
    throw new CompressionError(
      `Failed to initialize Zstd WASM: ${message}`,
      "zstd",
      "decompress"
    );
  });
  return zstdModule;
}

export const ZstdDecompressor = {
  /**
   * Pipe a compressed byte stream through a zstd decoder
   */
  wrapStream(stream: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
    const chunks: Uint8Array[] = [];
    return stream.pipeThrough(
      new TransformStream<Uint8Array, Uint8Array>({
        transform(chunk) {
          chunks.push(chunk);
        },
        async flush(controller) {
          const zstd = await loadZstd();
          controller.enqueue(zstd.decompress(concatBytes(chunks)));
          chunks.length = 0;
        },
      })
    );
  },
} as const;

function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  const total = chunks.reduce((size, chunk) => size + chunk.length, 0);
  const bytes = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    bytes.set(chunk, offset);
    offset += chunk.length;
  }
  return bytes;
}
