/**
 * Alignment coordinate utilities
 *
 * Pure functions converting between column-aligned gapped text and the
 * breakpoint representation of a pairwise alignment.
 *
 * @module coordinates
 */

import { ConsistencyError, ValidationError } from "../../errors";
import type { AlignmentCoordinates } from "../../types";

/** Gap character used in gapped alignment rows */
export const GAP = "-";

type ColumnKind = "match" | "deletion" | "insertion";

/**
 * Infer alignment breakpoints from two column-aligned gapped strings
 *
 * Each step between consecutive breakpoints is a maximal run of aligned
 * residues (both offsets advance), of residues only in the target (query
 * gapped) or of residues only in the query (target gapped). Columns gapped
 * in both rows advance neither offset and are skipped. Offsets start at 0.
 *
 * @throws {ConsistencyError} If the rows differ in length
 *
 * @example
 * ```typescript
 * inferCoordinates("AB--CD", "A-XYCD");
 * // { target: [0, 1, 2, 2, 4], query: [0, 1, 1, 3, 5] }
 * ```
 */
export function inferCoordinates(
  gappedTarget: string,
  gappedQuery: string,
  gap: string = GAP
): AlignmentCoordinates {
  if (gappedTarget.length !== gappedQuery.length) {
    throw new ConsistencyError(
      `Aligned sequences differ in length: target ${gappedTarget.length}, query ${gappedQuery.length}`,
      gappedTarget.length,
      gappedQuery.length
    );
  }

  const target: number[] = [0];
  const query: number[] = [0];
  let targetOffset = 0;
  let queryOffset = 0;
  let previous: ColumnKind | undefined;

  for (let column = 0; column < gappedTarget.length; column++) {
    const targetGap = gappedTarget[column] === gap;
    const queryGap = gappedQuery[column] === gap;
    if (targetGap && queryGap) continue;

    const kind: ColumnKind = targetGap ? "insertion" : queryGap ? "deletion" : "match";
    if (previous !== undefined && kind !== previous) {
      target.push(targetOffset);
      query.push(queryOffset);
    }
    previous = kind;

    if (!targetGap) targetOffset++;
    if (!queryGap) queryOffset++;
  }

  if (previous !== undefined) {
    target.push(targetOffset);
    query.push(queryOffset);
  }

  return { target, query };
}

/**
 * Shift every breakpoint by the start offsets of the two sequences
 */
export function offsetCoordinates(
  coordinates: AlignmentCoordinates,
  targetStart: number,
  queryStart: number
): AlignmentCoordinates {
  return {
    target: coordinates.target.map((offset) => offset + targetStart),
    query: coordinates.query.map((offset) => offset + queryStart),
  };
}

/**
 * Number of alignment columns the coordinates describe
 */
export function alignedColumns(coordinates: AlignmentCoordinates): number {
  let columns = 0;
  for (let step = 1; step < coordinates.target.length; step++) {
    const [targetRun, queryRun] = stepLengths(coordinates, step);
    columns += Math.max(targetRun, queryRun);
  }
  return columns;
}

/**
 * Re-insert gaps into one row of an alignment
 *
 * @param residues Ungapped residues covering the row's aligned range
 * @param coordinates Breakpoints relative to the start of `residues`
 * @param row Which side of the alignment `residues` belongs to
 * @throws {ValidationError} If the residues do not cover the aligned range
 */
export function applyGaps(
  residues: string,
  coordinates: AlignmentCoordinates,
  row: "target" | "query",
  gap: string = GAP
): string {
  const offsets = coordinates[row];
  const first = offsets[0] ?? 0;
  const last = offsets[offsets.length - 1] ?? first;
  if (residues.length !== last - first) {
    throw new ValidationError(
      `Residues (${residues.length}) do not cover the aligned ${row} range ${first}-${last}`
    );
  }

  const parts: string[] = [];
  for (let step = 1; step < coordinates.target.length; step++) {
    const [targetRun, queryRun] = stepLengths(coordinates, step);
    const width = Math.max(targetRun, queryRun);
    const ownRun = row === "target" ? targetRun : queryRun;
    const from = (offsets[step - 1] ?? first) - first;

    parts.push(ownRun === 0 ? gap.repeat(width) : residues.slice(from, from + ownRun));
  }
  return parts.join("");
}

function stepLengths(coordinates: AlignmentCoordinates, step: number): [number, number] {
  const targetRun = (coordinates.target[step] ?? 0) - (coordinates.target[step - 1] ?? 0);
  const queryRun = (coordinates.query[step] ?? 0) - (coordinates.query[step - 1] ?? 0);
  return [targetRun, queryRun];
}
