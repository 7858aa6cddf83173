/**
 * Core primitives for alignments and partially known sequences
 */

export { alignedRanges, formatGapped } from "./alignment";
export {
  alignedColumns,
  applyGaps,
  GAP,
  inferCoordinates,
  offsetCoordinates,
} from "./coordinates";
export {
  ANNOTATION_FILLER,
  createLabeledSequence,
  isDefined,
  type LabeledSequenceInit,
  padTrack,
  residueAt,
  sliceResidues,
} from "./labeled-sequence";
