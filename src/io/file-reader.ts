/**
 * File line source for FASTA inputs
 *
 * Files are opened through the Effect platform FileSystem service, sniffed
 * for compression by magic bytes, decoded as a stream and split into lines.
 * Nothing is read into memory beyond the current chunk.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Chunk, Effect, Stream } from "effect";
import {
  CompressionDetector,
  type CompressionFormat,
  createDecompressor,
  MAGIC_BYTES_LENGTH,
  toCompressionError,
} from "../compression";
import { FastaCheckError, FileError } from "../errors";
import { getPlatform } from "./runtime";
import { readLines } from "./stream-utils";

const DEFAULT_BUFFER_SIZE = 65_536;

const FilePathSchema = type("string > 0");

/**
 * Stream decoded lines from a plain, gzip or zstd-compressed FASTA file
 *
 * The file is opened lazily on the first pull.
 *
 * @example
 * ```typescript
 * const summary = await analyzeFasta(readFastaLines("assembly.fa.gz"), { assembly: true });
 * ```
 *
 * @throws {FileError} If the path is invalid, missing or unreadable
 * @throws {CompressionError} For a corrupt compressed stream
 */
export async function* readFastaLines(path: string): AsyncGenerator<string, void, undefined> {
  const format = await detectFileCompression(path);
  const stream = createDecompressor(format)(await createStream(path));

  try {
    yield* readLines(stream);
  } catch (error) {
    if (error instanceof FastaCheckError) throw error;
    throw format === "none"
      ? FileError.fromSystemError("read", path, error)
      : toCompressionError(error, format);
  }
}

/**
 * Check if a path names an existing regular file
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Detect compression from a file's leading bytes
 *
 * @throws {FileError} If the file is missing or cannot be read
 */
export async function detectFileCompression(path: string): Promise<CompressionFormat> {
  const validatedPath = validatePath(path);
  if (!(await exists(validatedPath))) {
    throw new FileError("File does not exist or is not accessible", validatedPath, "stat");
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const chunks = yield* Stream.runCollect(
      fs.stream(validatedPath, { bytesToRead: MAGIC_BYTES_LENGTH })
    );
    return concatBytes(Chunk.toReadonlyArray(chunks));
  });

  try {
    const head = await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
    return CompressionDetector.fromMagicBytes(head);
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

/**
 * Raw byte stream of a file through Effect Platform
 *
 * @throws {FileError} If the stream cannot be created
 */
export async function createStream(path: string): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, { bufferSize: DEFAULT_BUFFER_SIZE });
    return Stream.toReadableStream(effectStream);
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("open", validatedPath, error);
  }
}

function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

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
