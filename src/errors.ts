/**
 * Error handling for hhr report parsing
 *
 * Every structural problem in a report is fatal. The hierarchy separates
 * the shape of a line being wrong (StructuralFormatError), two values that
 * must agree not agreeing (ConsistencyError) and input that stops early
 * (TruncationError), so callers can tell a corrupt file from a cut one.
 */

/**
 * Base error class for all hhrkit errors
 */
export class HhrKitError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "HhrKitError";
  }

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
 * Invalid options or arguments handed to the library
 */
export class ValidationError extends HhrKitError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends HhrKitError {
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
 * A line does not have the shape its position in the report requires:
 * unknown header key, wrong table header, unparsable tag line, data after
 * the `Done!` sentinel.
 */
export class StructuralFormatError extends ParseError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "HHR", lineNumber, context);
    this.name = "StructuralFormatError";
  }

  /**
   * Error for a line no tag matches, quoting at most 30 characters of it
   */
  static unparsableLine(line: string, lineNumber?: number): StructuralFormatError {
    return new StructuralFormatError(
      `Failed to parse line '${line.slice(0, 30)}...'`,
      lineNumber,
      line.length > 30 ? `Line length: ${line.length}` : undefined
    );
  }
}

/**
 * Two values that must agree do not
 */
export class ConsistencyError extends ParseError {
  constructor(
    message: string,
    public readonly expected: string | number,
    public readonly actual: string | number,
    lineNumber?: number
  ) {
    super(message, "HHR", lineNumber, `Expected: ${expected}, actual: ${actual}`);
    this.name = "ConsistencyError";
  }
}

/**
 * Input ended before a required section was complete
 */
export class TruncationError extends ParseError {
  constructor(
    message: string,
    public readonly section: "header" | "summary" | "hit",
    lineNumber?: number
  ) {
    super(message, "HHR", lineNumber, `Incomplete section: ${section}`);
    this.name = "TruncationError";
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends HhrKitError {
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
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }
}

/**
 * Compression detection and decompression failures
 */
export class CompressionError extends HhrKitError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress",
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }
}

/**
 * Stream processing errors for I/O operations
 */
export class StreamError extends HhrKitError {
  constructor(
    message: string,
    public readonly streamType: "read" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Line buffer limits exceeded while splitting a stream into lines
 */
export class BufferError extends HhrKitError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "overflow" | "underflow",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: HhrKitError): string | undefined {
  if (error instanceof TruncationError) {
    return "The report appears to be cut short; check that the search finished and the file was fully written";
  }
  if (error instanceof ConsistencyError) {
    return "Values that must agree within the report differ; the file may have been edited or concatenated";
  }
  if (error instanceof StructuralFormatError) {
    if (error.message.includes("Unknown key")) {
      return "The header contains a key this reader does not know; it may come from an unsupported HH-suite version";
    }
    return "Check that the input is an hhr report produced by HHsearch or HHblits";
  }
  if (error instanceof FileError) {
    return "Verify the file path and permissions";
  }
  return undefined;
}
