/**
 * Turns a finished hit accumulator into a pairwise alignment
 *
 * The report shows both sequences as column-aligned gapped text. Here the
 * gaps are taken out: residues become a known segment of a sequence of the
 * declared length, annotation tracks are padded to that length, and the
 * gap pattern is kept as alignment coordinates.
 *
 * @module hhr/assembler
 */

import { ConsistencyError, StructuralFormatError } from "../../errors";
import { GAP, inferCoordinates, offsetCoordinates } from "../../operations/core/coordinates";
import { createLabeledSequence, padTrack } from "../../operations/core/labeled-sequence";
import type { PairwiseAlignment } from "../../types";
import { COLUMN_SCORE, LETTER_ANNOTATIONS } from "./constants";
import type { AssemblyContext, HitAccumulator } from "./types";

interface ResolvedSide {
  readonly name: string;
  readonly start: number;
  readonly length: number;
}

/**
 * Build the alignment for one hit
 *
 * @throws {StructuralFormatError} If the hit lacks its Q or T sequence lines
 * @throws {ConsistencyError} If the gapped rows differ in length, a track
 *   does not fit the declared length, or the query length contradicts the header
 */
export function buildAlignment(hit: HitAccumulator, context: AssemblyContext): PairwiseAlignment {
  const target = resolveSide(hit, "target", hit.targetName);
  const query = resolveSide(hit, "query", context.queryName);

  if (hit.targetSequence.length !== hit.querySequence.length) {
    throw new ConsistencyError(
      `Hit ${hit.number} (${hit.hmmName}): aligned target and query differ in length`,
      hit.querySequence.length,
      hit.targetSequence.length,
      hit.lineNumber
    );
  }

  const matchColumns = context.metadata.Match_columns;
  if (context.checkMatchColumns && matchColumns !== undefined && query.length !== matchColumns) {
    throw new ConsistencyError(
      `Hit ${hit.number} (${hit.hmmName}): query length ${query.length} differs from Match_columns ${matchColumns}`,
      matchColumns,
      query.length,
      hit.lineNumber
    );
  }

  const coordinates = offsetCoordinates(
    inferCoordinates(hit.targetSequence, hit.querySequence),
    target.start,
    query.start
  );

  const pad = (track: string, side: ResolvedSide, name: string): string => {
    checkFits(track, side, name, hit);
    return padTrack(track, side.start, side.length);
  };

  const targetResidues = stripGaps(hit.targetSequence);
  checkFits(targetResidues, target, "target sequence", hit);
  const queryResidues = stripGaps(hit.querySequence);
  checkFits(queryResidues, query, "query sequence", hit);

  const targetRecord = createLabeledSequence({
    id: target.name,
    length: target.length,
    segment: { start: target.start, residues: targetResidues },
    annotations: { hmm_name: hit.hmmName, hmm_description: hit.hmmDescription },
    letterAnnotations: {
      [LETTER_ANNOTATIONS.CONSENSUS]: pad(stripGaps(hit.targetConsensus), target, "target Consensus"),
      [LETTER_ANNOTATIONS.SS_DSSP]: pad(stripGaps(hit.targetSsDssp), target, "target ss_dssp"),
      [LETTER_ANNOTATIONS.SS_PRED]: pad(stripGaps(hit.targetSsPred), target, "target ss_pred"),
      [LETTER_ANNOTATIONS.CONFIDENCE]: pad(hit.confidence.replaceAll(" ", ""), target, "Confidence"),
    },
  });

  const queryRecord = createLabeledSequence({
    id: query.name,
    length: query.length,
    segment: { start: query.start, residues: queryResidues },
    letterAnnotations: {
      [LETTER_ANNOTATIONS.CONSENSUS]: pad(stripGaps(hit.queryConsensus), query, "query Consensus"),
      [LETTER_ANNOTATIONS.SS_PRED]: pad(stripGaps(hit.querySsPred), query, "query ss_pred"),
    },
  });

  return {
    sequences: [targetRecord, queryRecord],
    coordinates,
    annotations: hit.scores,
    columnAnnotations: { [COLUMN_SCORE]: hit.columnScore },
  };
}

function stripGaps(gapped: string): string {
  return gapped.replaceAll(GAP, "");
}

function resolveSide(
  hit: HitAccumulator,
  side: "target" | "query",
  name: string | undefined
): ResolvedSide {
  const start = side === "target" ? hit.targetStart : hit.queryStart;
  const length = side === "target" ? hit.targetLength : hit.queryLength;

  if (name === undefined || start === undefined || length === undefined) {
    const tag = side === "target" ? "T" : "Q";
    throw new StructuralFormatError(
      `Hit ${hit.number} (${hit.hmmName}) has no '${tag}' sequence line`,
      hit.lineNumber
    );
  }

  return { name, start, length };
}

function checkFits(track: string, side: ResolvedSide, name: string, hit: HitAccumulator): void {
  const end = side.start + track.length;
  if (end > side.length) {
    throw new ConsistencyError(
      `Hit ${hit.number} (${hit.hmmName}): ${name} ends at ${end}, beyond length ${side.length}`,
      side.length,
      end,
      hit.lineNumber
    );
  }
}
