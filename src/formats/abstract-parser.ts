/**
 * Abstract base parser with shared option defaults and interrupt handling
 *
 * Provides consistent AbortSignal support and warning reporting across
 * format parsers without imposing parsing implementation details.
 */

import { ParseError } from "../errors";
import type { FileReaderOptions, ParserOptions } from "../types";

type BaseDefaults = Required<Pick<ParserOptions, "maxLineLength" | "onWarning">>;

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions & BaseDefaults;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseDefaults: BaseDefaults = {
      maxLineLength: 1_000_000,
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    // base -> format-specific -> user options
    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Check if parsing operation should be aborted
   * Call this in parsing loops so long reads can be cancelled
   */
  protected checkAborted(): void {
    this.interruptHandler.checkAborted();
  }

  /**
   * Report a recoverable problem through the configured warning handler
   */
  protected warn(message: string, lineNumber?: number): void {
    this.options.onWarning(message, lineNumber);
  }

  /**
   * Parse records from a string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Parse records from a byte stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format name for error messages and logging
   */
  protected abstract getFormatName(): string;
}

/**
 * AbortSignal integration shared by all parsers
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If operation was aborted
   */
  checkAborted(): void {
    if (this.signal?.aborted === true) {
      throw new ParseError("Operation was aborted", "ABORTED");
    }
  }
}
