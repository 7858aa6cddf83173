/**
 * hhr (HHsearch / HHblits result) module exports
 *
 * @example Streaming alignments
 * ```typescript
 * import { HhrParser } from "./formats/hhr";
 *
 * const parser = new HhrParser();
 * for await (const alignment of parser.parseFile("query.hhr")) {
 *   const [target, query] = alignment.sequences;
 *   console.log(`${query.id} -> ${target.id} (${target.annotations.hmm_description})`);
 * }
 * ```
 *
 * @example Metadata before alignments
 * ```typescript
 * const reader = await new HhrParser().openString(text);
 * console.log(reader.metadata.Searched_HMMs, reader.hitCount);
 * ```
 *
 * @module hhr
 */

import { parseAlignmentLine, parseHitTitle, parseScoreLine } from "./primitives";
import { countHhrHits, detectHhrFormat } from "./utils";

const HhrFormat = {
  parseAlignmentLine,
  parseHitTitle,
  parseScoreLine,
} as const;

const HhrUtils = {
  detectHhrFormat,
  countHhrHits,
} as const;

// =============================================================================
// EXPORTS
// =============================================================================

export { HhrParser, HhrReader, parseHhr } from "./parser";
export { buildAlignment } from "./assembler";
export { readHeader } from "./header";
export { readSummary } from "./summary";
export { assembleHits, classifyLine, type LineTag } from "./state-machine";

export type {
  AlignmentLine,
  AssemblyContext,
  HeaderResult,
  HhrParserOptions,
  HhrReport,
  HitSummaryRow,
  RunMetadata,
} from "./types";

export { COLUMN_SCORE, END_SENTINEL, LETTER_ANNOTATIONS, SUMMARY_HEADER_TOKENS } from "./constants";

export { countHhrHits, detectHhrFormat } from "./utils";

export { HhrFormat, HhrUtils };
