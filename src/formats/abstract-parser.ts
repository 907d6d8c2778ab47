/**
 * Abstract base parser with shared warning and interrupt handling
 *
 * Provides consistent AbortSignal support and warning routing without
 * imposing parsing implementation details on the concrete format.
 */

import { ParseError } from "../errors";
import type { LineSource, ParserOptions } from "../types";

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly onWarning: (warning: string, lineNumber?: number) => void;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    this.onWarning =
      options.onWarning ??
      ((warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      });
    this.interruptHandler = new InterruptHandler(options.signal);
  }

  /**
   * Check if parsing operation should be aborted
   * Call this in parsing loops to enable Ctrl+C interruption
   */
  protected checkAborted(): void {
    this.interruptHandler.checkAborted(this.getFormatName());
  }

  /**
   * Parse records from a string
   */
  abstract parseString(data: string): Iterable<T>;

  /**
   * Parse records from a synchronous line source
   */
  abstract parse(lines: Iterable<string>): Iterable<T>;

  /**
   * Parse records from a synchronous or asynchronous line source
   */
  abstract parseAsync(lines: LineSource): AsyncIterable<T>;

  /**
   * Get format name for error messages and logging
   */
  protected abstract getFormatName(): string;
}

/**
 * Interrupt handler utility for AbortSignal integration
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If operation was aborted
   */
  checkAborted(format: string): void {
    if (this.signal?.aborted) {
      throw new ParseError("Operation was aborted", format);
    }
  }
}
