/**
 * hhr parsing primitives
 *
 * Small pure functions turning single report lines or tokens into values.
 * Each throws StructuralFormatError on malformed input, with the line
 * number when the caller knows it.
 */

import { StructuralFormatError } from "../../errors";
import { DROPPED_SCORE_KEYS, PERCENT_SCORE_KEYS } from "./constants";
import type { AlignmentLine } from "./types";

const INTEGER = /^[+-]?\d+$/;

/**
 * Split on whitespace, dropping empty tokens
 */
export function tokenize(line: string): string[] {
  const trimmed = line.trim();
  return trimmed === "" ? [] : trimmed.split(/\s+/);
}

/**
 * Split a line into its first token and the rest (leading whitespace of
 * the rest removed)
 */
export function splitFirst(line: string): [string, string] {
  const trimmed = line.trim();
  const match = /\s+/.exec(trimmed);
  if (match === null) return [trimmed, ""];
  return [trimmed.slice(0, match.index), trimmed.slice(match.index + match[0].length)];
}

/**
 * Last whitespace-separated token of a line
 */
export function lastToken(line: string): string {
  const tokens = tokenize(line);
  return tokens[tokens.length - 1] ?? "";
}

export function parseInteger(value: string, what: string, lineNumber?: number): number {
  const trimmed = value.trim();
  if (!INTEGER.test(trimmed)) {
    throw new StructuralFormatError(`Expected an integer for ${what}, got '${value}'`, lineNumber);
  }
  return Number.parseInt(trimmed, 10);
}

export function parseDecimal(value: string, what: string, lineNumber?: number): number {
  const trimmed = value.trim();
  const parsed = trimmed === "" ? Number.NaN : Number(trimmed);
  if (Number.isNaN(parsed)) {
    throw new StructuralFormatError(`Expected a number for ${what}, got '${value}'`, lineNumber);
  }
  return parsed;
}

/**
 * Parse a parenthesized total such as `(171)`
 */
export function parseTotal(token: string, lineNumber?: number): number {
  if (!token.startsWith("(") || !token.endsWith(")")) {
    throw new StructuralFormatError(
      `Expected a parenthesized total length, got '${token}'`,
      lineNumber
    );
  }
  return parseInteger(token.slice(1, -1), "total length", lineNumber);
}

/**
 * Parse `<tag> <name> <start> <residues> <end> (<total>)`
 *
 * Used for `Q`/`T` sequence lines and, with name `Consensus`, for
 * consensus lines.
 */
export function parseAlignmentLine(line: string, lineNumber?: number): AlignmentLine {
  const tokens = tokenize(line);
  if (tokens.length !== 6) {
    throw new StructuralFormatError(
      `Expected 6 fields on alignment line, found ${tokens.length}`,
      lineNumber,
      line.slice(0, 60)
    );
  }
  const [, name = "", start = "", residues = "", end = "", total = ""] = tokens;

  return {
    name,
    start: parseInteger(start, "start position", lineNumber) - 1,
    residues,
    end: parseInteger(end, "end position", lineNumber),
    total: parseTotal(total, lineNumber),
  };
}

/**
 * Split a `>` line into the HMM name and its description
 */
export function parseHitTitle(line: string, lineNumber?: number): [name: string, description: string] {
  const [name, description] = splitFirst(line.slice(1));
  if (name === "") {
    throw new StructuralFormatError("Hit header has no name", lineNumber);
  }
  return [name, description];
}

/**
 * Parse the `key=value` score line following a `>` line
 *
 * Values become numbers; `%` is stripped from percentages and
 * `Aligned_cols` is dropped.
 */
export function parseScoreLine(line: string, lineNumber?: number): Record<string, number> {
  const scores: Record<string, number> = {};

  for (const word of tokenize(line)) {
    const parts = word.split("=");
    const [key, rawValue] = parts;
    if (parts.length !== 2 || key === undefined || key === "" || rawValue === undefined) {
      throw new StructuralFormatError(`Malformed score token '${word}'`, lineNumber);
    }
    if (DROPPED_SCORE_KEYS.has(key)) continue;

    const value = PERCENT_SCORE_KEYS.has(key) ? rawValue.replace(/%+$/, "") : rawValue;
    scores[key] = parseDecimal(value, `score '${key}'`, lineNumber);
  }

  return scores;
}
