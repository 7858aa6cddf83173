/**
 * hhr format utilities
 *
 * Cheap checks on report text that do not run the full parser.
 *
 * @module hhr/utils
 */

import { SUMMARY_HEADER_TOKENS } from "./constants";
import { splitFirst, tokenize } from "./primitives";

/**
 * Detect if string looks like an hhr report
 *
 * The first line must be a `Query` line and the hit table header must
 * appear before the first alignment.
 *
 * @example
 * ```typescript
 * if (detectHhrFormat(text)) {
 *   const report = await parseHhr(text);
 * }
 * ```
 */
function detectHhrFormat(data: string): boolean {
  if (typeof data !== "string" || data.length === 0) {
    return false;
  }

  const lines = data.split(/\r?\n/);
  const [first = ""] = lines;
  if (splitFirst(first)[0] !== "Query") return false;

  for (const line of lines) {
    if (line.startsWith(">")) return false;
    if (isSummaryHeader(line)) return true;
  }
  return false;
}

/**
 * Count the rows of the hit table without parsing alignments
 *
 * @returns Number of hits, or 0 if no hit table is found
 */
function countHhrHits(data: string): number {
  if (typeof data !== "string") return 0;

  const lines = data.split(/\r?\n/);
  const headerIndex = lines.findIndex(isSummaryHeader);
  if (headerIndex === -1) return 0;

  let count = 0;
  for (const line of lines.slice(headerIndex + 1)) {
    if (line.trim() === "") break;
    count++;
  }
  return count;
}

function isSummaryHeader(line: string): boolean {
  const tokens = tokenize(line);
  return (
    tokens.length === SUMMARY_HEADER_TOKENS.length &&
    SUMMARY_HEADER_TOKENS.every((token, index) => tokens[index] === token)
  );
}

// =============================================================================
// EXPORTS
// =============================================================================

export { detectHhrFormat, countHhrHits };
