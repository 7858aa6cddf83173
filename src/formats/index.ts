/**
 * Central format module exports
 */

export { AbstractParser } from "./abstract-parser";

export {
  HhrFormat,
  HhrParser,
  HhrReader,
  HhrUtils,
  countHhrHits,
  detectHhrFormat,
  parseHhr,
} from "./hhr";
export type { HhrParserOptions, HhrReport, HitSummaryRow, RunMetadata } from "./hhr";
