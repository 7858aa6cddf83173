/**
 * Type definitions for hhr report parsing
 *
 * Contains the run metadata, summary table rows, per-hit accumulator and
 * parser options used by the hhr module.
 */

import type { PairwiseAlignment, ParserOptions } from "../../types";

/**
 * Run metadata from the report preamble
 *
 * Keys follow the report, except `Date` and `Command`, which are stored as
 * `Rundate` and `Command line`. The query identifier is kept separately.
 */
export interface RunMetadata {
  /** Number of match columns, equal to the query length */
  readonly Match_columns?: number;
  /** Sequences shown, out of sequences searched */
  readonly No_of_seqs?: readonly [shown: number, searched: number];
  readonly Neff?: number;
  readonly Template_Neff?: number;
  readonly Searched_HMMs?: number;
  readonly Rundate?: string;
  readonly "Command line"?: string;
}

export type MutableRunMetadata = { -readonly [K in keyof RunMetadata]: RunMetadata[K] };

/**
 * Result of reading the preamble
 */
export interface HeaderResult {
  readonly queryName: string;
  readonly metadata: RunMetadata;
}

/**
 * One row of the hit ranking table
 *
 * Only the row number is validated; the rest of the row is kept verbatim.
 */
export interface HitSummaryRow {
  /** 1-based row number */
  readonly index: number;
  /** First word after the row number */
  readonly hit: string;
  /** Row text after the row number, trimmed */
  readonly text: string;
}

/**
 * Parsed `Q`/`T` sequence or consensus line:
 * `<tag> <name> <start> <residues> <end> (<total>)`
 */
export interface AlignmentLine {
  readonly name: string;
  /** 0-based start offset */
  readonly start: number;
  readonly residues: string;
  /** 1-based inclusive end */
  readonly end: number;
  readonly total: number;
}

/**
 * Mutable state of the hit whose blocks are being read
 *
 * Created fresh at each `>` line and consumed when the hit is finalized.
 */
export interface HitAccumulator {
  /** 1-based hit number from the preceding `No` line */
  readonly number: number;
  /** Line the hit's `>` header was read from */
  readonly lineNumber: number;
  readonly hmmName: string;
  readonly hmmDescription: string;
  readonly scores: Record<string, number>;
  targetName?: string;
  queryStart?: number;
  targetStart?: number;
  queryLength?: number;
  targetLength?: number;
  querySequence: string;
  queryConsensus: string;
  querySsPred: string;
  targetSequence: string;
  targetConsensus: string;
  targetSsPred: string;
  targetSsDssp: string;
  confidence: string;
  columnScore: string;
}

/**
 * Block assembler state
 */
export type AssemblerState =
  /** `number` is set once a `No` line has been read and its `>` header is due */
  | { readonly kind: "awaiting-hit"; readonly number: number | undefined }
  | { readonly kind: "in-hit"; readonly hit: HitAccumulator }
  | { readonly kind: "done" };

/**
 * Everything the block assembler needs besides the line cursor
 */
export interface AssemblyContext {
  readonly queryName: string;
  readonly metadata: RunMetadata;
  /** Number of hits the summary table lists */
  readonly hitCount: number;
  readonly strictTotals: boolean;
  readonly checkMatchColumns: boolean;
  readonly warn: (message: string, lineNumber?: number) => void;
}

/**
 * hhr parser options
 */
export interface HhrParserOptions extends ParserOptions {
  /**
   * Treat a `(total)` that disagrees with an earlier one for the same hit
   * as an error (default). When false, warn and keep the later value.
   */
  strictTotals?: boolean;
  /** Require the query length to equal the header's Match_columns (default: true) */
  checkMatchColumns?: boolean;
}

/**
 * Fully read report
 */
export interface HhrReport {
  readonly queryName: string;
  readonly metadata: RunMetadata;
  readonly summary: readonly HitSummaryRow[];
  readonly alignments: readonly PairwiseAlignment[];
}
