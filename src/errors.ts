/**
 * Error handling for FASTA validation and statistics
 *
 * Structural problems in the input are fatal and carry the line number
 * where they were found. Record-level problems (empty sequences, duplicate
 * identifiers) are warnings unless a strict policy escalates them. Metrics
 * that cannot be computed are never errors: they are reported as `null`.
 */

/**
 * Base error class for all fastacheck errors
 */
export class FastaCheckError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "FastaCheckError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for invalid options, configuration or records
 */
export class ValidationError extends FastaCheckError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends FastaCheckError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Fatal structural error: the stream cannot be read as FASTA past this point
 *
 * Raised for sequence data before the first header, headers without an
 * identifier, and lines carrying undecoded binary data.
 */
export class FormatError extends ParseError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "FASTA", lineNumber, context);
    this.name = "FormatError";
  }
}

/**
 * Sequence-specific validation errors
 */
export class SequenceError extends ValidationError {
  constructor(
    message: string,
    public readonly sequenceId: string,
    lineNumber?: number,
    context?: string
  ) {
    super(`Sequence '${sequenceId}': ${message}`, lineNumber, context);
    this.name = "SequenceError";
  }
}

/**
 * File I/O errors raised by the file line source
 */
export class FileError extends FastaCheckError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat" | "open",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }
}

/**
 * Compression errors raised while decoding a compressed input
 */
export class CompressionError extends FastaCheckError {
  constructor(
    message: string,
    public readonly format: "gzip" | "zstd" | "none",
    public readonly operation: "detect" | "decompress",
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }
}

/**
 * Common error messages and suggestions
 */
export const ERROR_SUGGESTIONS = {
  SEQUENCE_BEFORE_HEADER: "Every record must start with a '>' header line",
  EMPTY_HEADER: "Add an identifier directly after '>'",
  GARBLED_STREAM: "The input may still be compressed or is not a text file",
  EMPTY_SEQUENCE: "Remove the record or add sequence lines below its header",
  DUPLICATE_ID: "Rename one of the records so identifiers are unique",
} as const;

/**
 * Get helpful suggestion for an error based on its type and message
 */
export function getErrorSuggestion(error: FastaCheckError): string | undefined {
  const msg = error.message.toLowerCase();

  if (error instanceof FormatError) {
    if (msg.includes("before the first header")) return ERROR_SUGGESTIONS.SEQUENCE_BEFORE_HEADER;
    if (msg.includes("no sequence identifier")) return ERROR_SUGGESTIONS.EMPTY_HEADER;
    if (msg.includes("binary")) return ERROR_SUGGESTIONS.GARBLED_STREAM;
  }

  if (error instanceof SequenceError) {
    if (msg.includes("empty sequence")) return ERROR_SUGGESTIONS.EMPTY_SEQUENCE;
    if (msg.includes("duplicate")) return ERROR_SUGGESTIONS.DUPLICATE_ID;
  }

  return undefined;
}
