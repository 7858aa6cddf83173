/**
 * File reading utilities built on the Effect platform FileSystem service
 *
 * Opens report files as byte streams (decompressing gzip transparently)
 * or reads them whole, with path and size validation up front.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Option, Stream } from "effect";
import { CompressionDetector, createDecompressor, decompressIfNeeded } from "../compression";
import { FileError } from "../errors";
import type { FileMetadata, FilePath, FileReaderOptions, FileValidationResult } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { getPlatform } from "./runtime";

type ResolvedReaderOptions = Required<Omit<FileReaderOptions, "signal">> & {
  readonly signal: AbortSignal | undefined;
};

const DEFAULT_OPTIONS: ResolvedReaderOptions = {
  bufferSize: 65536,
  encoding: "utf8",
  maxFileSize: 104_857_600, // 100MB
  signal: undefined,
  autoDecompress: true,
  compressionFormat: "none", // detected from the extension
};

/**
 * Validate file accessibility and constraints
 */
async function validateFile(
  path: FilePath,
  options: ResolvedReaderOptions
): Promise<FileValidationResult> {
  if (!(await exists(path))) {
    return {
      isValid: false,
      error: "File does not exist or is not accessible",
    };
  }

  const metadata = await getMetadata(path);

  if (metadata.size > options.maxFileSize) {
    return {
      isValid: false,
      metadata,
      error: `File size ${metadata.size} exceeds maximum ${options.maxFileSize}`,
    };
  }

  return { isValid: true, metadata };
}

/**
 * Create base file stream using Effect Platform
 */
async function createBaseStream(
  validatedPath: FilePath,
  options: ResolvedReaderOptions
): Promise<ReadableStream<Uint8Array>> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, {
      bufferSize: options.bufferSize,
    });
    return Stream.toReadableStream(effectStream);
  });

  return Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
}

/**
 * Check if a file exists and is a regular file
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
 * Get file size in bytes
 *
 * @throws {FileError} If file cannot be accessed or doesn't exist
 */
export async function getSize(path: string): Promise<number> {
  return (await getMetadata(path)).size;
}

/**
 * Get file metadata
 *
 * @throws {FileError} If file cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    const dot = validatedPath.lastIndexOf(".");

    return {
      path: validatedPath,
      size: Number(info.size),
      lastModified: Option.getOrElse(info.mtime, () => new Date(0)),
      readable: true,
      extension: dot === -1 ? "" : validatedPath.substring(dot),
    };
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Create a streaming reader for a file
 *
 * Gzipped files are decompressed on the fly. They are recognized by
 * `compressionFormat`, then by extension, then by their leading magic bytes.
 *
 * @throws {FileError} If file cannot be opened or read
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const validation = await validateFile(validatedPath, mergedOptions);
  if (!validation.isValid) {
    throw new FileError(validation.error ?? "File validation failed", validatedPath, "read");
  }

  const startTime = Date.now();

  try {
    const stream = await createBaseStream(validatedPath, mergedOptions);
    if (!mergedOptions.autoDecompress) {
      return stream;
    }

    const format =
      mergedOptions.compressionFormat === "none"
        ? CompressionDetector.fromExtension(validatedPath)
        : mergedOptions.compressionFormat;
    return format === "none"
      ? await decompressIfNeeded(stream, mergedOptions.signal)
      : createDecompressor(format).wrapStream(stream, mergedOptions.signal);
  } catch (error) {
    const elapsed = Date.now() - startTime;
    const enhanced = FileError.fromSystemError("open", validatedPath, error);
    enhanced.message += ` (failed after ${elapsed}ms, bufferSize: ${mergedOptions.bufferSize})`;
    throw enhanced;
  }
}

/**
 * Read entire file to string, decompressing gzip when needed
 *
 * @throws {FileError} If file cannot be read or is too large
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const stream = await createStream(path, options);
  const reader = stream.getReader();
  const decoder = new TextDecoder(options.encoding === "binary" ? "latin1" : "utf-8");
  let text = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      text += decoder.decode(value, { stream: true });
    }
  } catch (error) {
    throw FileError.fromSystemError("read", path, error);
  } finally {
    reader.releaseLock();
  }

  return text + decoder.decode();
}

export const FileReader = {
  exists,
  getSize,
  getMetadata,
  createStream,
  readToString,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Validate file path using ArkType and return branded type
 */
function validatePath(path: string): FilePath {
  try {
    const validationResult = FilePathSchema(path);
    if (validationResult instanceof type.errors) {
      throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
    }
    return validationResult;
  } catch (error) {
    if (error instanceof FileError) throw error;
    throw new FileError(
      `Invalid file path: ${error instanceof Error ? error.message : String(error)}`,
      path,
      "stat"
    );
  }
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): ResolvedReaderOptions {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return { ...DEFAULT_OPTIONS, ...options };
}
