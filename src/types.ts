/**
 * Core type definitions shared across the library
 *
 * Parser and file reader options, file metadata, and the ArkType schemas
 * that validate them at the library boundary. Format-specific types live
 * beside their parser (see formats/hhr/types.ts).
 */

import { type } from "arktype";

/**
 * Base options understood by every parser
 */
export interface ParserOptions {
  /** Maximum line length before the line is rejected */
  maxLineLength?: number;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Compression formats the file reader can undo
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Compression detection result with confidence scoring
 */
export interface CompressionDetection {
  /** Detected compression format */
  readonly format: CompressionFormat;
  /** Detection confidence level (0-1) */
  readonly confidence: number;
  /** Magic bytes that led to detection */
  readonly magicBytes?: Uint8Array;
  /** File extension used in detection */
  readonly extension?: string;
  readonly detectionMethod: "magic-bytes" | "extension";
}

/**
 * Validated file path
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * Options for streaming reads from disk
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64KB) */
  readonly bufferSize?: number;
  /** Text encoding for file content (default: 'utf8') */
  readonly encoding?: "utf8" | "binary" | "ascii";
  /** Maximum file size to prevent memory exhaustion (default: 100MB) */
  readonly maxFileSize?: number;
  /** AbortController signal for cancelling operations */
  readonly signal?: AbortSignal;
  /** Whether to automatically detect and decompress compressed files (default: true) */
  readonly autoDecompress?: boolean;
  /** Force a compression format instead of detecting it from the extension */
  readonly compressionFormat?: CompressionFormat;
}

/**
 * File metadata
 */
export interface FileMetadata {
  readonly path: FilePath;
  /** File size in bytes */
  readonly size: number;
  readonly lastModified: Date;
  readonly readable: boolean;
  /** File extension for format detection, including the dot */
  readonly extension: string;
}

/**
 * Result of splitting a text buffer into lines
 */
export interface LineProcessingResult {
  /** Complete lines extracted from buffer */
  readonly lines: string[];
  /** Incomplete line remainder to carry forward */
  readonly remainder: string;
  readonly totalLines: number;
  /** Whether the buffer ended on a line boundary */
  readonly isComplete: boolean;
}

/**
 * File validation result with detailed feedback
 */
export interface FileValidationResult {
  readonly isValid: boolean;
  readonly metadata?: FileMetadata;
  readonly error?: string;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * File path validation schema
 * Rejects NUL bytes, shell metacharacters and directory traversal
 */
export const FilePathSchema = type("string>0").pipe((path: string) => {
  if (path.includes("\0")) {
    throw new Error("File paths cannot contain null characters");
  }

  const invalidChars = /[<>"|*?]/;
  if (invalidChars.test(path)) {
    throw new Error("File path contains invalid characters");
  }

  const normalized = path.replace(/[\\/]+/g, "/");

  if (normalized.includes("../")) {
    throw new Error("Directory traversal not allowed in file paths");
  }

  return normalized as FilePath;
});

/**
 * File reader options validation schema
 * Ensures all options are within safe and reasonable bounds
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "1024<=number<=1048576",
  "encoding?": '"utf8"|"binary"|"ascii"',
  "maxFileSize?": "0<=number<=10737418240",
  "signal?": "unknown",
  "autoDecompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
});

// =============================================================================
// SEQUENCES AND ALIGNMENTS
// =============================================================================

/**
 * Known stretch of residues inside a longer sequence
 */
export interface SequenceSegment {
  /** 0-based offset of the first residue */
  readonly start: number;
  readonly residues: string;
}

/**
 * Sequence of known total length of which only one stretch is known,
 * carrying per-residue annotation tracks
 *
 * Every letter annotation is exactly `length` characters long.
 */
export interface LabeledSequence {
  readonly id: string;
  readonly description?: string;
  /** Declared total length, including residues outside the known segment */
  readonly length: number;
  readonly segment: SequenceSegment;
  /** Free-text annotations (for hhr targets: hmm_name, hmm_description) */
  readonly annotations: Readonly<Record<string, string>>;
  /** Per-residue tracks keyed by name (Consensus, ss_pred, ss_dssp, Confidence) */
  readonly letterAnnotations: Readonly<Record<string, string>>;
}

/**
 * Breakpoints of a pairwise alignment
 *
 * Both arrays have the same length. Between consecutive breakpoints either
 * both offsets advance by the same amount (aligned residues) or exactly one
 * of them advances (a gap in the other sequence).
 */
export interface AlignmentCoordinates {
  readonly target: readonly number[];
  readonly query: readonly number[];
}

/**
 * Pairwise alignment of a target against the query
 */
export interface PairwiseAlignment {
  /** Target first, then query */
  readonly sequences: readonly [target: LabeledSequence, query: LabeledSequence];
  readonly coordinates: AlignmentCoordinates;
  /** Numeric scores from the hit header (Probab, E-value, Score, ...) */
  readonly annotations: Readonly<Record<string, number>>;
  /** Column-indexed tracks; hhr alignments carry "column score" */
  readonly columnAnnotations: Readonly<Record<string, string>>;
}
