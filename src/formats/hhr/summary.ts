/**
 * hhr hit ranking table reader
 *
 * The table is only used to learn how many hits follow; its numeric
 * columns are kept as text.
 *
 * @module hhr/summary
 */

import { ConsistencyError, StructuralFormatError, TruncationError } from "../../errors";
import type { LineCursor } from "../../io/stream-utils";
import { SUMMARY_HEADER_TOKENS } from "./constants";
import { splitFirst, tokenize } from "./primitives";
import type { HitSummaryRow } from "./types";

/**
 * Read the table header row and the numbered rows below it
 *
 * @throws {TruncationError} If input ends before the table header
 * @throws {StructuralFormatError} If the header row is not the expected one
 * @throws {ConsistencyError} If rows are not numbered 1, 2, 3, ...
 */
export async function readSummary(cursor: LineCursor): Promise<HitSummaryRow[]> {
  const headerLine = await cursor.next();
  if (headerLine === undefined) {
    throw new TruncationError("Truncated file: hit table header is missing", "summary", cursor.lineNumber);
  }

  const tokens = tokenize(headerLine);
  const matches =
    tokens.length === SUMMARY_HEADER_TOKENS.length &&
    SUMMARY_HEADER_TOKENS.every((token, index) => tokens[index] === token);
  if (!matches) {
    throw new StructuralFormatError(
      "Malformed file: unexpected hit table header",
      cursor.lineNumber,
      headerLine.trim()
    );
  }

  const rows: HitSummaryRow[] = [];

  while (true) {
    const line = await cursor.next();
    if (line === undefined || line.trim() === "") break;

    const expected = rows.length + 1;
    const [word, rest] = splitFirst(line);
    if (!/^\d+$/.test(word) || Number.parseInt(word, 10) !== expected) {
      throw new ConsistencyError(
        `Hit table row numbered '${word}', expected ${expected}`,
        expected,
        word,
        cursor.lineNumber
      );
    }

    rows.push({ index: expected, hit: splitFirst(rest)[0], text: rest });
  }

  return rows;
}
