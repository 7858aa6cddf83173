#!/usr/bin/env -S npx tsx
/**
 * Print the hits of an hhr report
 *
 * Usage: tsx examples/basic-usage.ts <query.hhr[.gz]>
 */

import { fileURLToPath } from "node:url";
import { formatGapped, getErrorSuggestion, HhrKitError, HhrParser } from "../src";

async function main(filePath: string | undefined): Promise<void> {
  if (filePath === undefined) {
    console.error("Usage: basic-usage.ts <report.hhr>");
    process.exit(2);
  }

  try {
    const reader = await new HhrParser({ strictTotals: false }).openFile(filePath);
    const { metadata } = reader;

    console.log(`Query: ${reader.queryName}`);
    console.log(`Match columns: ${metadata.Match_columns ?? "?"}, searched HMMs: ${metadata.Searched_HMMs ?? "?"}`);
    console.log(`${reader.hitCount} hits\n`);

    for await (const alignment of reader) {
      const [target, query] = alignment.sequences;
      const [gappedTarget, gappedQuery] = formatGapped(alignment);

      console.log(`${target.id} ${target.annotations.hmm_description ?? ""}`);
      console.log(`  Probab=${alignment.annotations.Probab}  E-value=${alignment.annotations["E-value"]}`);
      console.log(`  Q ${gappedQuery}`);
      console.log(`  T ${gappedTarget}`);
      console.log(`  query length ${query.length}, target length ${target.length}\n`);
    }
  } catch (error) {
    if (error instanceof HhrKitError) {
      console.error(error.toString());
      const suggestion = getErrorSuggestion(error);
      if (suggestion !== undefined) console.error(`Suggestion: ${suggestion}`);
      process.exit(1);
    }
    throw error;
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  await main(process.argv[2]);
}

export { main };
