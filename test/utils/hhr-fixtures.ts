/**
 * Hand-written hhr reports shared by the format tests
 *
 * REPORT_LINES is a two-hit report: hit 1 spans two blocks and has no
 * `T ss_pred` lines, hit 2 is a single block with no annotation tracks.
 * Line numbers in the comments are 1-based.
 */

export const QUERY_NAME = "sp|P0TEST|TEST_QUERY Test query protein";

export const ROW_1 =
  "d1abca_ a.1.1.1 (A:) Test dom   99.5 1.2E-20 3.4E-25  120.3   5.1   11    1-12      3-13 (15)";
export const ROW_2 =
  "d2xyzb_                        50.1    0.31 8.7E-06   20.5   1.2    3    5-8       1-3 (6)";

export const TABLE_HEADER =
  " No Hit                             Prob E-value P-value  Score    SS Cols Query HMM  Template HMM";

export const REPORT_LINES: readonly string[] = [
  `Query         ${QUERY_NAME}`, // 1
  "Match_columns 12",
  "No_of_seqs    5 out of 40",
  "Neff          2.4",
  "Searched_HMMs 100", // 5
  "Date          Mon Jan  1 10:00:00 2024",
  "Command       hhblits -i query.a3m -d testdb",
  "",
  TABLE_HEADER,
  `  1 ${ROW_1}`, // 10
  `  2 ${ROW_2}`,
  "",
  "No 1",
  ">d1abca_ a.1.1.1 (A:) Test domain",
  "Probab=99.50  E-value=1.2e-20  Score=120.30  Aligned_cols=11  Identities=45%  Similarity=0.612  Sum_probs=9.8  Template_Neff=3.1", // 15
  "",
  "Q ss_pred             CCH-HH",
  "Q sp|P0TEST|TE    1 MKV-LA    5 (12)",
  "Q Consensus       1 mkv-la    5 (12)",
  "                   ||| ||", // 20
  "T Consensus       3 mkavls    8 (15)",
  "T d1abca_         3 MKAVLS    8 (15)",
  "T ss_dssp          CHHHHH",
  "Confidence          678999",
  "", // 25
  "Q ss_pred             HHHCCCC",
  "Q sp|P0TEST|TE    6 GHTWPQK   12 (12)",
  "Q Consensus       6 ghtwpqk   12 (12)",
  "                   |  ||||",
  "T Consensus       9 g--wpqk   13 (15)", // 30
  "T d1abca_         9 G--WPQK   13 (15)",
  "T ss_dssp          C--HHHC",
  "Confidence          5  6789",
  "",
  "No 2", // 35
  ">d2xyzb_",
  "Probab=50.10  E-value=0.31  Score=20.50  Aligned_cols=3  Identities=67%  Similarity=0.9  Sum_probs=2.0  Template_Neff=1.0",
  "",
  "Q sp|P0TEST|TE    5 AGHT    8 (12)",
  "T d2xyzb_         1 AG-T    3 (6)", // 40
  "",
  "Done!",
];

export const REPORT = `${REPORT_LINES.join("\n")}\n`;

/**
 * Report with the given 1-based lines replaced
 */
export function withLines(replacements: Record<number, string>, lines: readonly string[] = REPORT_LINES): string {
  return lines.map((line, index) => replacements[index + 1] ?? line).join("\n");
}

/**
 * The first `count` lines of the report
 */
export function truncated(count: number): string {
  return REPORT_LINES.slice(0, count).join("\n");
}

export const EMPTY_REPORT = [
  "Query         q_empty",
  "Match_columns 5",
  "No_of_seqs    1 out of 1",
  "Neff          1.0",
  "Searched_HMMs 10",
  "",
  TABLE_HEADER,
  "",
  "Done!",
  "",
].join("\n");

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
