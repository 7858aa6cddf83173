/**
 * hhr preamble reader
 *
 * Reads the `key value` lines at the top of a report up to the first blank
 * line. Every key must be known; the report format has no extension
 * mechanism, so an unknown key means the input is not what we expect.
 *
 * @module hhr/header
 */

import { StructuralFormatError, TruncationError } from "../../errors";
import type { LineCursor } from "../../io/stream-utils";
import { parseDecimal, parseInteger, splitFirst } from "./primitives";
import type { HeaderResult, MutableRunMetadata } from "./types";

/**
 * Read the run metadata block
 *
 * @throws {StructuralFormatError} On an unknown key or malformed value
 * @throws {TruncationError} If input ends before the blank line
 */
export async function readHeader(cursor: LineCursor): Promise<HeaderResult> {
  const metadata: MutableRunMetadata = {};
  let queryName: string | undefined;

  while (true) {
    const raw = await cursor.next();
    if (raw === undefined) {
      throw new TruncationError("Truncated file: input ended inside the header", "header", cursor.lineNumber);
    }

    const line = raw.trim();
    if (line === "") break;

    const lineNumber = cursor.lineNumber;
    const [key, value] = splitFirst(line);
    if (value === "") {
      throw new StructuralFormatError(`Missing value for key '${key}'`, lineNumber);
    }

    switch (key) {
      case "Query":
        queryName = value;
        break;
      case "Match_columns":
        metadata.Match_columns = parseInteger(value, key, lineNumber);
        break;
      case "No_of_seqs":
        metadata.No_of_seqs = parseSequenceCounts(value, lineNumber);
        break;
      case "Neff":
        metadata.Neff = parseDecimal(value, key, lineNumber);
        break;
      case "Template_Neff":
        metadata.Template_Neff = parseDecimal(value, key, lineNumber);
        break;
      case "Searched_HMMs":
        metadata.Searched_HMMs = parseInteger(value, key, lineNumber);
        break;
      case "Date":
        metadata.Rundate = value;
        break;
      case "Command":
        metadata["Command line"] = value;
        break;
      default:
        throw new StructuralFormatError(`Unknown key '${key}'`, lineNumber, line);
    }
  }

  if (queryName === undefined) {
    throw new StructuralFormatError("Header has no 'Query' line", cursor.lineNumber);
  }

  return { queryName, metadata };
}

/**
 * Parse `A out of B`
 */
function parseSequenceCounts(value: string, lineNumber: number): [number, number] {
  const parts = value.split(" out of ");
  const [shown, searched] = parts;
  if (parts.length !== 2 || shown === undefined || searched === undefined) {
    throw new StructuralFormatError(`Expected 'A out of B' for No_of_seqs, got '${value}'`, lineNumber);
  }
  return [parseInteger(shown, "No_of_seqs", lineNumber), parseInteger(searched, "No_of_seqs", lineNumber)];
}
