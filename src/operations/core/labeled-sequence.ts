/**
 * Construction and access for partially known sequences
 *
 * A report only shows the aligned stretch of each sequence, so a labeled
 * sequence knows its full length but only one segment of residues. Letter
 * annotations always span the full length.
 *
 * @module labeled-sequence
 */

import { ValidationError } from "../../errors";
import type { LabeledSequence, SequenceSegment } from "../../types";

/** Filler placed in letter annotations outside the known segment */
export const ANNOTATION_FILLER = " ";

export interface LabeledSequenceInit {
  id: string;
  description?: string;
  length: number;
  segment: SequenceSegment;
  annotations?: Record<string, string>;
  letterAnnotations?: Record<string, string>;
}

/**
 * Build a labeled sequence, checking the segment and every letter
 * annotation against the declared length
 *
 * @throws {ValidationError} If the segment or an annotation does not fit
 */
export function createLabeledSequence(init: LabeledSequenceInit): LabeledSequence {
  const { id, length, segment } = init;

  if (!Number.isInteger(length) || length < 0) {
    throw new ValidationError(`Sequence '${id}' has invalid length ${length}`);
  }
  if (segment.start < 0 || segment.start + segment.residues.length > length) {
    throw new ValidationError(
      `Segment ${segment.start}-${segment.start + segment.residues.length} of '${id}' exceeds sequence length ${length}`
    );
  }

  const letterAnnotations = init.letterAnnotations ?? {};
  for (const [name, track] of Object.entries(letterAnnotations)) {
    if (track.length !== length) {
      throw new ValidationError(
        `Letter annotation '${name}' of '${id}' has length ${track.length}, expected ${length}`
      );
    }
  }

  return {
    id,
    ...(init.description !== undefined && { description: init.description }),
    length,
    segment,
    annotations: init.annotations ?? {},
    letterAnnotations,
  };
}

/**
 * Whether every residue in [start, end) is known
 */
export function isDefined(sequence: LabeledSequence, start: number, end: number): boolean {
  const { segment } = sequence;
  return start >= segment.start && end <= segment.start + segment.residues.length && start <= end;
}

/**
 * Residue at a 0-based offset, or undefined where it is unknown
 */
export function residueAt(sequence: LabeledSequence, offset: number): string | undefined {
  const { segment } = sequence;
  const index = offset - segment.start;
  if (index < 0 || index >= segment.residues.length) return undefined;
  return segment.residues[index];
}

/**
 * Residues in [start, end)
 *
 * @throws {ValidationError} If any residue in the range is unknown
 */
export function sliceResidues(sequence: LabeledSequence, start: number, end: number): string {
  if (!isDefined(sequence, start, end)) {
    throw new ValidationError(
      `Residues ${start}-${end} of '${sequence.id}' are not all known (known: ${sequence.segment.start}-${sequence.segment.start + sequence.segment.residues.length})`
    );
  }
  const offset = sequence.segment.start;
  return sequence.segment.residues.slice(start - offset, end - offset);
}

/**
 * Place a track at `start` inside a filler string of `length` characters
 *
 * @throws {ValidationError} If the track does not fit
 */
export function padTrack(
  track: string,
  start: number,
  length: number,
  filler: string = ANNOTATION_FILLER
): string {
  if (start + track.length > length) {
    throw new ValidationError(
      `Track of ${track.length} characters at offset ${start} exceeds length ${length}`
    );
  }
  return filler.repeat(start) + track + filler.repeat(length - start - track.length);
}
