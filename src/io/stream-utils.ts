/**
 * Stream processing utilities for line-oriented text
 *
 * Turns byte streams into lines with proper buffering across chunk
 * boundaries, and provides the forward-only cursor parsers pull lines from.
 */

import { BufferError, StreamError } from "../errors";
import type { LineProcessingResult } from "../types";

const MAX_LINE_LENGTH = 1_000_000; // default, callers may raise it
const MAX_BUFFER_SIZE = 10_485_760; // 10MB max buffer

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Handles line buffering so complete lines are yielded even when chunks
 * don't align with line boundaries. Line terminators are not included.
 *
 * Stopping iteration early cancels the stream.
 *
 * @param stream Stream of binary data to process
 * @param encoding Text encoding to use (default: 'utf8')
 * @param maxLineLength Longest line accepted, in characters
 * @throws {StreamError} If stream processing fails
 * @throws {BufferError} If a line is too long or the buffer overflows
 * @example
 * ```typescript
 * const stream = await createStream("/runs/query.hhr");
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith(">")) console.log("hit:", line);
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  encoding: "utf8" | "ascii" | "binary" = "utf8",
  maxLineLength: number = MAX_LINE_LENGTH
): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder(encoding === "binary" ? "latin1" : "utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;
  let settled = false;

  try {
    while (true) {
      const { done, value } = await reader.read().catch((error: unknown): never => {
        settled = true; // an errored stream has nothing left to cancel
        throw error;
      });

      if (done) {
        settled = true;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const result = processBuffer(buffer, maxLineLength);
      buffer = result.remainder;

      for (const line of result.lines) {
        yield line;
      }

      if (buffer.length > MAX_BUFFER_SIZE) {
        throw new BufferError(
          `Buffer overflow: ${buffer.length} bytes exceeds maximum ${MAX_BUFFER_SIZE}`,
          buffer.length,
          "overflow"
        );
      }
    }

    buffer += decoder.decode();
    if (buffer.trim()) {
      yield buffer.endsWith("\r") ? buffer.slice(0, -1) : buffer;
    }
  } catch (error) {
    if (error instanceof BufferError) {
      throw error;
    }
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Process text buffer to extract complete lines
 *
 * Handles \n, \r\n and bare \r line endings and keeps the incomplete tail
 * for the next chunk.
 *
 * @throws {BufferError} If a single line exceeds maximum length
 */
export function processBuffer(
  buffer: string,
  maxLineLength: number = MAX_LINE_LENGTH
): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];

    if (char === "\n") {
      const lineEnd = position > lineStart && buffer[position - 1] === "\r" ? position - 1 : position;
      lines.push(checkedLine(buffer.slice(lineStart, lineEnd), maxLineLength));
      lineStart = position + 1;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      // Mac classic line ending
      lines.push(checkedLine(buffer.slice(lineStart, position), maxLineLength));
      lineStart = position + 1;
    }
  }

  const remainder = lineStart < buffer.length ? buffer.slice(lineStart) : "";
  if (remainder.length > maxLineLength) {
    throw new BufferError(
      `Incomplete line too long: ${remainder.length} characters exceeds maximum ${maxLineLength}`,
      remainder.length,
      "overflow",
      "This might indicate a file without proper line endings"
    );
  }

  return {
    lines,
    remainder,
    totalLines: lines.length,
    isComplete: remainder.length === 0,
  };
}

function checkedLine(line: string, maxLineLength: number): string {
  if (line.length > maxLineLength) {
    throw new BufferError(
      `Line too long: ${line.length} characters exceeds maximum ${maxLineLength}`,
      line.length,
      "overflow",
      `Line starts with: ${line.slice(0, 100)}...`
    );
  }
  return line;
}

/**
 * Forward-only pull cursor over a line source
 *
 * Accepts arrays, generators or async iterables of lines. Parsers pull one
 * line at a time, so a record is read exactly as far as it is needed.
 */
export class LineCursor {
  private readonly iterator: Iterator<string> | AsyncIterator<string>;
  private exhausted = false;
  private count = 0;

  constructor(source: Iterable<string> | AsyncIterable<string>) {
    this.iterator =
      Symbol.asyncIterator in source
        ? source[Symbol.asyncIterator]()
        : source[Symbol.iterator]();
  }

  /** 1-based number of the last line returned, 0 before the first */
  get lineNumber(): number {
    return this.count;
  }

  get done(): boolean {
    return this.exhausted;
  }

  /**
   * Pull the next line
   *
   * @returns The line, or undefined once the source is exhausted
   */
  async next(): Promise<string | undefined> {
    if (this.exhausted) return undefined;

    const result = await this.iterator.next();
    if (result.done === true) {
      this.exhausted = true;
      return undefined;
    }

    this.count++;
    return result.value;
  }

  /**
   * Stop reading and let the source release its resources
   */
  async close(): Promise<void> {
    if (this.exhausted) return;
    this.exhausted = true;
    await this.iterator.return?.();
  }
}

export const StreamUtils = {
  readLines,
  processBuffer,
} as const;
