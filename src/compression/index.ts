/**
 * Compression support for report files
 *
 * @module compression
 */

import type { ReadableStreamDefaultReader } from "node:stream/web";
import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";
import { CompressionDetector } from "./detector";
import { GzipDecompressor } from "./gzip";

export { CompressionDetector } from "./detector";
export { GzipDecompressor } from "./gzip";

/**
 * Decompressor for one compression format
 */
export interface Decompressor {
  wrapStream(stream: ReadableStream<Uint8Array>, signal?: AbortSignal): ReadableStream<Uint8Array>;
  decompress(data: Uint8Array): Promise<Uint8Array>;
}

/**
 * Create the decompressor for a detected format
 *
 * @throws {CompressionError} For formats with nothing to undo
 */
export function createDecompressor(format: CompressionFormat): Decompressor {
  switch (format) {
    case "gzip":
      return GzipDecompressor;
    case "none":
      throw new CompressionError("No decompressor needed for uncompressed data", "none", "detect");
  }
}

/**
 * Lets the leading bytes of a stream be inspected without losing them
 */
class BufferedStreamReader {
  private buffer: Uint8Array = new Uint8Array(0);
  private exhausted = false;
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;

  constructor(stream: ReadableStream<Uint8Array>) {
    this.reader = stream.getReader();
  }

  async peek(bytes: number): Promise<Uint8Array> {
    while (this.buffer.length < bytes && !this.exhausted) {
      const { value, done } = await this.reader.read();
      if (done) {
        this.exhausted = true;
        break;
      }
      const merged = new Uint8Array(this.buffer.length + value.length);
      merged.set(this.buffer);
      merged.set(value, this.buffer.length);
      this.buffer = merged;
    }
    return this.buffer.slice(0, bytes);
  }

  /**
   * The peeked bytes followed by the rest of the source; cancelling it
   * cancels the source
   */
  stream(): ReadableStream<Uint8Array> {
    const { buffer, exhausted, reader } = this;

    return new ReadableStream<Uint8Array>({
      start(controller) {
        if (buffer.length > 0) controller.enqueue(buffer);
        if (exhausted) controller.close();
      },
      async pull(controller) {
        const { value, done } = await reader.read();
        if (done) {
          controller.close();
        } else {
          controller.enqueue(value);
        }
      },
      cancel(reason) {
        return reader.cancel(reason);
      },
    });
  }
}

/**
 * Decompress a byte stream when its magic bytes mark it as compressed,
 * otherwise pass its bytes through unchanged
 *
 * @example
 * ```typescript
 * const text = readLines(await decompressIfNeeded(upload));
 * ```
 */
export async function decompressIfNeeded(
  stream: ReadableStream<Uint8Array>,
  signal?: AbortSignal
): Promise<ReadableStream<Uint8Array>> {
  const buffered = new BufferedStreamReader(stream);
  const magicBytes = await buffered.peek(2);
  const replay = buffered.stream();

  if (magicBytes.length === 0) return replay;

  const { format } = CompressionDetector.fromMagicBytes(magicBytes);
  return format === "none" ? replay : createDecompressor(format).wrapStream(replay, signal);
}
