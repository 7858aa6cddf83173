/**
 * Constants for hhr report parsing
 */

/** Tokens of the ranking table's header row */
export const SUMMARY_HEADER_TOKENS = [
  "No",
  "Hit",
  "Prob",
  "E-value",
  "P-value",
  "Score",
  "SS",
  "Cols",
  "Query",
  "HMM",
  "Template",
  "HMM",
] as const;

/** Last line of the alignment section */
export const END_SENTINEL = "Done!";

/** Hit header score tokens not kept; recoverable from the coordinates */
export const DROPPED_SCORE_KEYS: ReadonlySet<string> = new Set(["Aligned_cols"]);

/** Score keys whose values carry a trailing percent sign */
export const PERCENT_SCORE_KEYS: ReadonlySet<string> = new Set(["Identities"]);

/** Letter annotation names on the labeled sequences */
export const LETTER_ANNOTATIONS = {
  CONSENSUS: "Consensus",
  SS_PRED: "ss_pred",
  SS_DSSP: "ss_dssp",
  CONFIDENCE: "Confidence",
} as const;

/** Column annotation holding the per-column match score */
export const COLUMN_SCORE = "column score";
