/**
 * Pairwise alignment helpers
 *
 * @module alignment
 */

import type { PairwiseAlignment } from "../../types";
import { applyGaps, offsetCoordinates } from "./coordinates";
import { sliceResidues } from "./labeled-sequence";

/**
 * Reconstruct the gapped target and query rows of an alignment
 *
 * @returns `[gappedTarget, gappedQuery]`, equal in length
 * @throws {ValidationError} If the aligned range of either sequence is not known
 */
export function formatGapped(alignment: PairwiseAlignment): [string, string] {
  const [target, query] = alignment.sequences;
  const { coordinates } = alignment;

  const targetStart = coordinates.target[0] ?? 0;
  const queryStart = coordinates.query[0] ?? 0;
  const targetEnd = coordinates.target[coordinates.target.length - 1] ?? targetStart;
  const queryEnd = coordinates.query[coordinates.query.length - 1] ?? queryStart;

  const relative = offsetCoordinates(coordinates, -targetStart, -queryStart);

  return [
    applyGaps(sliceResidues(target, targetStart, targetEnd), relative, "target"),
    applyGaps(sliceResidues(query, queryStart, queryEnd), relative, "query"),
  ];
}

/**
 * Aligned range of each sequence as [start, end) pairs
 */
export function alignedRanges(alignment: PairwiseAlignment): {
  target: [number, number];
  query: [number, number];
} {
  const { target, query } = alignment.coordinates;
  const targetStart = target[0] ?? 0;
  const queryStart = query[0] ?? 0;
  return {
    target: [targetStart, target[target.length - 1] ?? targetStart],
    query: [queryStart, query[query.length - 1] ?? queryStart],
  };
}
