/**
 * Gzip decompression for report files
 *
 * Uses the web-standard DecompressionStream so decompression stays inside
 * the ReadableStream pipeline the line reader consumes.
 */

import { DecompressionStream } from "node:stream/web";
import { CompressionError } from "../errors";

/**
 * Wrap a gzip-compressed byte stream in a decompressing stream
 *
 * @param stream Compressed input
 * @param signal Optional abort signal; aborting cancels the source stream
 * @throws {CompressionError} If the signal has already been aborted
 * @returns Stream of decompressed bytes
 */
export function wrapStream(
  stream: ReadableStream<Uint8Array>,
  signal?: AbortSignal
): ReadableStream<Uint8Array> {
  if (signal?.aborted === true) {
    throw new CompressionError("Decompression aborted", "gzip", "decompress");
  }

  const decompressed: ReadableStream<Uint8Array> = stream.pipeThrough(
    new DecompressionStream("gzip"),
    signal === undefined ? {} : { signal }
  );
  return decompressed;
}

/**
 * Decompress a complete gzip buffer
 *
 * @throws {CompressionError} If the data is not valid gzip
 */
export async function decompress(data: Uint8Array): Promise<Uint8Array> {
  const source = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(data);
      controller.close();
    },
  });

  const chunks: Uint8Array[] = [];
  let total = 0;

  try {
    const reader = wrapStream(source).getReader();
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      chunks.push(value);
      total += value.length;
    }
  } catch (error) {
    throw new CompressionError(
      `gzip decompression failed: ${error instanceof Error ? error.message : String(error)}`,
      "gzip",
      "decompress"
    );
  }

  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

export const GzipDecompressor = {
  wrapStream,
  decompress,
} as const;
