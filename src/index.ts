/**
 * hhrkit - streaming reader for HHsearch / HHblits result files
 *
 * Reads hhr reports into run metadata, the hit table, and one pairwise
 * alignment per hit with secondary structure, consensus and confidence
 * tracks attached to the aligned sequences.
 */

// Compression infrastructure
export {
  CompressionDetector,
  createDecompressor,
  decompressIfNeeded,
  GzipDecompressor,
} from "./compression";
export type { Decompressor } from "./compression";

// Error types
export {
  BufferError,
  CompressionError,
  ConsistencyError,
  FileError,
  getErrorSuggestion,
  HhrKitError,
  ParseError,
  StreamError,
  StructuralFormatError,
  TruncationError,
  ValidationError,
} from "./errors";

// hhr format
export {
  AbstractParser,
  countHhrHits,
  detectHhrFormat,
  HhrFormat,
  HhrParser,
  HhrReader,
  HhrUtils,
  parseHhr,
} from "./formats";
export type { HhrParserOptions, HhrReport, HitSummaryRow, RunMetadata } from "./formats";

// File I/O infrastructure
export { FileReader } from "./io/file-reader";
export { LineCursor, StreamUtils } from "./io/stream-utils";

// Alignment and sequence operations
export {
  alignedColumns,
  alignedRanges,
  applyGaps,
  createLabeledSequence,
  formatGapped,
  GAP,
  inferCoordinates,
  isDefined,
  offsetCoordinates,
  padTrack,
  residueAt,
  sliceResidues,
} from "./operations/core";

// Core types
export type {
  AlignmentCoordinates,
  CompressionFormat,
  FileReaderOptions,
  LabeledSequence,
  PairwiseAlignment,
  ParserOptions,
  SequenceSegment,
} from "./types";
