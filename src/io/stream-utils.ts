/**
 * Line sources over in-memory text and web byte streams
 *
 * Lines are yielded without their terminators. A trailing `\r` from CRLF
 * input is removed here; the parser tolerates one anyway.
 */

import { splitLines } from "../formats/fasta/primitives";

/**
 * Lines of an in-memory string, split on LF or CRLF
 *
 * @example
 * ```typescript
 * const result = parser.validateFormat(linesFromString(">a\nACGT\n"));
 * ```
 */
export function linesFromString(data: string): string[] {
  return splitLines(data);
}

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Handles line buffering properly so complete lines are yielded even when
 * chunks don't align with line boundaries. Stopping early cancels the
 * stream.
 *
 * @example Line-by-line processing
 * ```typescript
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith(">")) console.log("Found header:", line);
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>
): AsyncGenerator<string, void, undefined> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let settled = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const result = processBuffer(buffer);
      buffer = result.remainder;
      yield* result.lines;
    }
    settled = true;

    buffer += decoder.decode();
    const result = processBuffer(buffer);
    yield* result.lines;
    if (result.remainder.length > 0) {
      yield stripCarriageReturn(result.remainder);
    }
  } catch (error) {
    settled = true;
    throw error;
  } finally {
    // consumer stopped early: release the underlying file handle
    if (!settled) await reader.cancel();
    reader.releaseLock();
  }
}

/**
 * Split buffered text into complete lines and the unterminated tail
 */
export function processBuffer(buffer: string): { lines: string[]; remainder: string } {
  const parts = buffer.split("\n");
  const remainder = parts.pop() ?? "";
  return { lines: parts.map(stripCarriageReturn), remainder };
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}
