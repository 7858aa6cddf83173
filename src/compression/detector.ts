/**
 * Compression format detection for report files
 *
 * HH-suite runs are often archived gzipped; the reader recognizes them by
 * extension when opening a path and by magic bytes when handed raw bytes.
 */

import { CompressionError } from "../errors";
import type { CompressionDetection, CompressionFormat } from "../types";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_MAGIC_BYTES = new Uint8Array([GZIP_MAGIC_FIRST_BYTE, GZIP_MAGIC_SECOND_BYTE]);

const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

/**
 * Compression format detector
 *
 * @example Detection from file extension
 * ```typescript
 * CompressionDetector.fromExtension("/runs/query.hhr.gz"); // "gzip"
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
  }

  /**
   * Detect compression format from the leading bytes of a file
   *
   * @throws {CompressionError} If no bytes are given
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    if (bytes.length === 0) {
      throw new CompressionError("Bytes array must not be empty", "none", "detect");
    }

    const matches =
      bytes.length >= GZIP_MAGIC_BYTES.length &&
      GZIP_MAGIC_BYTES.every((byte, index) => bytes[index] === byte);

    if (matches) {
      return {
        format: "gzip",
        confidence: 1.0,
        magicBytes: bytes.slice(0, GZIP_MAGIC_BYTES.length),
        detectionMethod: "magic-bytes",
      };
    }

    return {
      format: "none",
      confidence: bytes.length >= GZIP_MAGIC_BYTES.length ? 0.9 : 0.5,
      detectionMethod: "magic-bytes",
    };
  }
}
