/**
 * Tests for the hhr report parser
 *
 * Covers metadata and hit table reading, multi-block alignment assembly,
 * annotation tracks, and the failure modes of malformed or cut reports.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { afterAll, beforeAll, describe, expect, test, vi } from "vitest";
import {
  ConsistencyError,
  ParseError,
  StructuralFormatError,
  TruncationError,
  ValidationError,
} from "../../src/errors";
import { HhrParser, parseHhr } from "../../src/formats/hhr";
import { alignedColumns, formatGapped } from "../../src/operations/core";
import {
  collect,
  EMPTY_REPORT,
  QUERY_NAME,
  REPORT,
  REPORT_LINES,
  ROW_1,
  ROW_2,
  truncated,
  withLines,
} from "../utils/hhr-fixtures";

function byteStream(
  data: string | Uint8Array,
  chunkSize: number,
  onCancel?: () => void
): ReadableStream<Uint8Array> {
  const bytes = typeof data === "string" ? new TextEncoder().encode(data) : data;
  let offset = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      if (offset >= bytes.length) {
        controller.close();
        return;
      }
      controller.enqueue(bytes.slice(offset, offset + chunkSize));
      offset += chunkSize;
    },
    cancel() {
      onCancel?.();
    },
  });
}

const LONG_COMMAND = `hhblits ${"x".repeat(1_500_000)}`;

describe("HhrParser", () => {
  describe("header and hit table", () => {
    test("reads run metadata and query name", async () => {
      const reader = await new HhrParser().openString(REPORT);

      expect(reader.queryName).toBe(QUERY_NAME);
      expect(reader.metadata).toEqual({
        Match_columns: 12,
        No_of_seqs: [5, 40],
        Neff: 2.4,
        Searched_HMMs: 100,
        Rundate: "Mon Jan  1 10:00:00 2024",
        "Command line": "hhblits -i query.a3m -d testdb",
      });
      await reader.close();
    });

    test("reads hit table rows", async () => {
      const reader = await new HhrParser().openString(REPORT);

      expect(reader.hitCount).toBe(2);
      expect(reader.summary).toEqual([
        { index: 1, hit: "d1abca_", text: ROW_1 },
        { index: 2, hit: "d2xyzb_", text: ROW_2 },
      ]);
      expect(reader.emitted).toBe(0);
      await reader.close();
    });

    test("rejects unknown header key", async () => {
      const text = withLines({ 4: "Nefff         2.4" });

      await expect(new HhrParser().openString(text)).rejects.toThrow(StructuralFormatError);
      await expect(new HhrParser().openString(text)).rejects.toMatchObject({
        message: "Unknown key 'Nefff'",
        lineNumber: 4,
      });
    });

    test("rejects misnumbered hit table row", async () => {
      const text = withLines({ 11: `  3 ${ROW_2}` });

      await expect(new HhrParser().openString(text)).rejects.toThrow(ConsistencyError);
      await expect(new HhrParser().openString(text)).rejects.toMatchObject({
        message: "Hit table row numbered '3', expected 2",
        lineNumber: 11,
      });
    });

    test("rejects unexpected table header", async () => {
      const text = withLines({ 9: " No Hit Prob E-value" });

      await expect(new HhrParser().openString(text)).rejects.toThrow(
        "Malformed file: unexpected hit table header"
      );
    });

    test("reports truncation inside the header", async () => {
      await expect(new HhrParser().openString(truncated(5))).rejects.toThrow(TruncationError);
    });

    test("reports truncation before the table header", async () => {
      await expect(new HhrParser().openString(truncated(8))).rejects.toMatchObject({
        name: "TruncationError",
        section: "summary",
      });
    });
  });

  describe("alignments", () => {
    test("assembles a hit spread over two blocks", async () => {
      const [first] = await collect(new HhrParser().parseString(REPORT));
      if (first === undefined) throw new Error("no alignment");
      const [target, query] = first.sequences;

      expect(target.id).toBe("d1abca_");
      expect(target.length).toBe(15);
      expect(target.segment).toEqual({ start: 2, residues: "MKAVLSGWPQK" });
      expect(target.annotations).toEqual({
        hmm_name: "d1abca_",
        hmm_description: "a.1.1.1 (A:) Test domain",
      });

      expect(query.id).toBe(QUERY_NAME);
      expect(query.length).toBe(12);
      expect(query.segment).toEqual({ start: 0, residues: "MKVLAGHTWPQK" });

      expect(first.coordinates).toEqual({
        target: [2, 5, 6, 9, 9, 13],
        query: [0, 3, 3, 6, 8, 12],
      });
    });

    test("attaches padded annotation tracks", async () => {
      const [first] = await collect(new HhrParser().parseString(REPORT));
      if (first === undefined) throw new Error("no alignment");
      const [target, query] = first.sequences;

      expect(target.letterAnnotations).toEqual({
        Consensus: "  mkavlsgwpqk  ",
        ss_dssp: "  CHHHHHCHHHC  ",
        ss_pred: " ".repeat(15),
        Confidence: "  67899956789  ",
      });
      expect(query.letterAnnotations).toEqual({
        Consensus: "mkvlaghtwpqk",
        ss_pred: "CCHHHHHHCCCC",
      });
      expect(first.columnAnnotations).toEqual({ "column score": "||| |||  ||||" });
    });

    test("parses hit scores", async () => {
      const [first, second] = await collect(new HhrParser().parseString(REPORT));

      expect(first?.annotations).toEqual({
        Probab: 99.5,
        "E-value": 1.2e-20,
        Score: 120.3,
        Identities: 45,
        Similarity: 0.612,
        Sum_probs: 9.8,
        Template_Neff: 3.1,
      });
      expect(second?.annotations).toEqual({
        Probab: 50.1,
        "E-value": 0.31,
        Score: 20.5,
        Identities: 67,
        Similarity: 0.9,
        Sum_probs: 2,
        Template_Neff: 1,
      });
    });

    test("assembles a single-block hit without tracks", async () => {
      const [, second] = await collect(new HhrParser().parseString(REPORT));
      if (second === undefined) throw new Error("no second alignment");
      const [target, query] = second.sequences;

      expect(target.annotations).toEqual({ hmm_name: "d2xyzb_", hmm_description: "" });
      expect(target.segment).toEqual({ start: 0, residues: "AGT" });
      expect(query.segment).toEqual({ start: 4, residues: "AGHT" });
      expect(second.coordinates).toEqual({ target: [0, 2, 2, 3], query: [4, 6, 7, 8] });
      expect(target.letterAnnotations.Confidence).toBe("      ");
      expect(query.letterAnnotations.Consensus).toBe(" ".repeat(12));
      expect(second.columnAnnotations).toEqual({ "column score": "" });
    });

    test("final breakpoints end where the known residues end", async () => {
      const alignments = await collect(new HhrParser().parseString(REPORT));

      for (const alignment of alignments) {
        const [target, query] = alignment.sequences;
        expect(alignment.coordinates.target.at(-1)).toBe(
          target.segment.start + target.segment.residues.length
        );
        expect(alignment.coordinates.query.at(-1)).toBe(
          query.segment.start + query.segment.residues.length
        );
      }
    });

    test("every letter annotation spans the declared length", async () => {
      const alignments = await collect(new HhrParser().parseString(REPORT));

      for (const alignment of alignments) {
        for (const sequence of alignment.sequences) {
          for (const track of Object.values(sequence.letterAnnotations)) {
            expect(track).toHaveLength(sequence.length);
          }
        }
      }
    });

    test("gapped rows are recovered from sequences and coordinates", async () => {
      const [first, second] = await collect(new HhrParser().parseString(REPORT));
      if (first === undefined || second === undefined) throw new Error("missing alignments");

      expect(formatGapped(first)).toEqual(["MKAVLSG--WPQK", "MKV-LAGHTWPQK"]);
      expect(formatGapped(second)).toEqual(["AG-T", "AGHT"]);
      expect(alignedColumns(first.coordinates)).toBe(13);
    });

    test("reads reports with CRLF line endings", async () => {
      const alignments = await collect(new HhrParser().parseString(REPORT.replaceAll("\n", "\r\n")));
      expect(alignments).toHaveLength(2);
    });

    test("empty hit table yields no alignments", async () => {
      const report = await parseHhr(EMPTY_REPORT);

      expect(report.queryName).toBe("q_empty");
      expect(report.summary).toEqual([]);
      expect(report.alignments).toEqual([]);
    });

    test("parseHhr collects the whole report", async () => {
      const report = await parseHhr(REPORT);

      expect(report.metadata.Match_columns).toBe(12);
      expect(report.summary).toHaveLength(2);
      expect(report.alignments.map((a) => a.sequences[0].id)).toEqual(["d1abca_", "d2xyzb_"]);
    });
  });

  describe("malformed alignments", () => {
    test("rejects aligned rows of different length", async () => {
      const text = withLines({ 40: "T d2xyzb_         1 AG-    2 (6)" });

      await expect(collect(new HhrParser().parseString(text))).rejects.toMatchObject({
        name: "ConsistencyError",
        message: "Hit 2 (d2xyzb_): aligned target and query differ in length",
        lineNumber: 36,
      });
    });

    test("rejects data after Done!", async () => {
      const text = [...REPORT_LINES, "", "trailing garbage"].join("\n");

      await expect(collect(new HhrParser().parseString(text))).rejects.toMatchObject({
        name: "StructuralFormatError",
        message: "Found additional data after 'Done!'; corrupt file?",
        lineNumber: 44,
      });
    });

    test("yields alignments before reaching trailing data", async () => {
      const text = [...REPORT_LINES, "trailing garbage"].join("\n");
      const reader = await new HhrParser().openString(text);
      const iterator = reader[Symbol.asyncIterator]();

      expect((await iterator.next()).done).toBe(false);
      expect((await iterator.next()).done).toBe(false);
      expect(reader.emitted).toBe(2);
      await expect(iterator.next()).rejects.toThrow(StructuralFormatError);
    });

    test("rejects an unparsable line", async () => {
      const text = withLines({ 38: "X unexpected line" });

      await expect(collect(new HhrParser().parseString(text))).rejects.toMatchObject({
        name: "StructuralFormatError",
        message: "Failed to parse line 'X unexpected line...'",
        lineNumber: 38,
      });
    });

    test("rejects misnumbered hit", async () => {
      const text = withLines({ 35: "No 3" });

      await expect(collect(new HhrParser().parseString(text))).rejects.toMatchObject({
        name: "ConsistencyError",
        message: "Hit numbered 3, expected 2",
        lineNumber: 35,
      });
    });

    test("rejects hit header without a No line", async () => {
      const text = withLines({ 13: "" });

      await expect(collect(new HhrParser().parseString(text))).rejects.toMatchObject({
        name: "StructuralFormatError",
        lineNumber: 14,
      });
    });

    test("rejects query line naming another query", async () => {
      const text = withLines({ 39: "Q other_query     5 AGHT    8 (12)" });

      await expect(collect(new HhrParser().parseString(text))).rejects.toThrow(ConsistencyError);
    });

    test("rejects a track longer than its sequence", async () => {
      const text = withLines({ 38: "T ss_dssp          CCCCCCC" });

      await expect(collect(new HhrParser().parseString(text))).rejects.toMatchObject({
        name: "ConsistencyError",
        message: "Hit 2 (d2xyzb_): target ss_dssp ends at 7, beyond length 6",
      });
    });

    test("checks query length against Match_columns", async () => {
      const text = withLines({ 2: "Match_columns 11" });

      await expect(collect(new HhrParser().parseString(text))).rejects.toMatchObject({
        name: "ConsistencyError",
        message: "Hit 1 (d1abca_): query length 12 differs from Match_columns 11",
      });

      const alignments = await collect(new HhrParser({ checkMatchColumns: false }).parseString(text));
      expect(alignments).toHaveLength(2);
    });

    test("reports input ending after a No line", async () => {
      await expect(collect(new HhrParser().parseString(truncated(35)))).rejects.toThrow(
        TruncationError
      );
    });

    test("reports input ending before a score line", async () => {
      await expect(collect(new HhrParser().parseString(truncated(36)))).rejects.toMatchObject({
        name: "TruncationError",
        message: "Input ended after the header of hit 2",
      });
    });

    test("reports a report with no alignment blocks", async () => {
      const text = [...REPORT_LINES.slice(0, 12), "Done!"].join("\n");

      await expect(collect(new HhrParser().parseString(text))).rejects.toThrow(TruncationError);
    });

    test("reports fewer alignments than the hit table lists", async () => {
      const text = [...REPORT_LINES.slice(0, 34), "Done!"].join("\n");

      await expect(collect(new HhrParser().parseString(text))).rejects.toMatchObject({
        name: "ConsistencyError",
        message: "Expected 2 alignments, found 1",
      });
    });
  });

  describe("total length consistency", () => {
    const conflicting = withLines({
      30: "T Consensus       9 g--wpqk   13 (16)",
      31: "T d1abca_         9 G--WPQK   13 (16)",
    });

    test("conflicting totals are an error by default", async () => {
      await expect(collect(new HhrParser().parseString(conflicting))).rejects.toMatchObject({
        name: "ConsistencyError",
        message: "Hit 1: target total length 16 disagrees with earlier 15",
        lineNumber: 30,
      });
    });

    test("lenient mode warns and keeps the later total", async () => {
      const onWarning = vi.fn();
      const parser = new HhrParser({ strictTotals: false, onWarning });

      const [first] = await collect(parser.parseString(conflicting));

      expect(onWarning).toHaveBeenCalledTimes(1);
      expect(onWarning).toHaveBeenCalledWith(
        "Hit 1: target total length 16 disagrees with earlier 15",
        30
      );
      expect(first?.sequences[0].length).toBe(16);
      expect(first?.sequences[0].letterAnnotations.Consensus).toBe("  mkavlsgwpqk   ");
    });

    test("default warning handler logs through console.warn", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

      await collect(new HhrParser({ strictTotals: false }).parseString(conflicting));

      expect(warn).toHaveBeenCalledWith(
        "HHR Warning (line 30): Hit 1: target total length 16 disagrees with earlier 15"
      );
      warn.mockRestore();
    });
  });

  describe("options and reader lifecycle", () => {
    test("rejects invalid options", () => {
      expect(() => new HhrParser({ maxLineLength: 0 })).toThrow(ValidationError);
    });

    test("enforces the maximum line length", async () => {
      await expect(new HhrParser({ maxLineLength: 40 }).openString(REPORT)).rejects.toMatchObject({
        name: "StructuralFormatError",
        lineNumber: 1,
      });
    });

    test("stops when the signal is aborted", async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        new HhrParser({ signal: controller.signal }).openString(REPORT)
      ).rejects.toThrow(ParseError);
    });

    test("a reader can only be iterated once", async () => {
      const reader = await new HhrParser().openString(REPORT);
      const alignments = await collect(reader);

      expect(alignments).toHaveLength(2);
      expect(reader.emitted).toBe(2);
      await expect(collect(reader)).rejects.toThrow(ValidationError);
    });

    test("parses from a byte stream split mid-line", async () => {
      const alignments = await collect(new HhrParser().parse(byteStream(REPORT, 7)));

      expect(alignments).toHaveLength(2);
      expect(alignments[0]?.sequences[1].segment.residues).toBe("MKVLAGHTWPQK");
    });

    test("parses a gzipped byte stream", async () => {
      const compressed = new Uint8Array(gzipSync(Buffer.from(REPORT)));
      const alignments = await collect(new HhrParser().parse(byteStream(compressed, 1)));

      expect(alignments.map((a) => a.sequences[0].id)).toEqual(["d1abca_", "d2xyzb_"]);
    });

    test("accepts lines up to a raised maximum length on byte streams", async () => {
      const report = withLines({ 7: `Command       ${LONG_COMMAND}` });
      const reader = await new HhrParser({ maxLineLength: 2_000_000 }).openStream(
        byteStream(report, 65536)
      );

      expect(reader.metadata["Command line"]).toBe(LONG_COMMAND);
      expect(await collect(reader)).toHaveLength(2);
    });

    test("enforces the default maximum line length on byte streams", async () => {
      const report = withLines({ 7: `Command       ${LONG_COMMAND}` });

      await expect(new HhrParser().openStream(byteStream(report, 65536))).rejects.toMatchObject({
        name: "StructuralFormatError",
        message: "Line exceeds maximum length of 1000000 characters",
        lineNumber: 7,
      });
    });

    test("breaking out of iteration cancels the source stream", async () => {
      let cancelled = false;
      const reader = await new HhrParser().openStream(
        byteStream(REPORT, 64, () => {
          cancelled = true;
        })
      );

      const ids: string[] = [];
      for await (const alignment of reader) {
        ids.push(alignment.sequences[0].id);
        break;
      }

      expect(ids).toEqual(["d1abca_"]);
      expect(cancelled).toBe(true);
    });

    test("close cancels the source stream", async () => {
      let cancelled = false;
      const reader = await new HhrParser().openStream(
        byteStream(REPORT, 64, () => {
          cancelled = true;
        })
      );

      await reader.close();

      expect(cancelled).toBe(true);
    });

    test("parses from an array of lines", async () => {
      const alignments = await collect(new HhrParser().parseLines(REPORT_LINES));
      expect(alignments).toHaveLength(2);
    });
  });

  describe("files", () => {
    let dir: string;

    beforeAll(() => {
      dir = mkdtempSync(join(tmpdir(), "hhrkit-"));
      writeFileSync(join(dir, "query.hhr"), REPORT);
      writeFileSync(join(dir, "query.hhr.gz"), gzipSync(Buffer.from(REPORT)));
      writeFileSync(join(dir, "archived.hhr"), gzipSync(Buffer.from(REPORT)));
    });

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    test("parses a plain report file", async () => {
      const alignments = await collect(new HhrParser().parseFile(join(dir, "query.hhr")));
      expect(alignments.map((a) => a.sequences[0].id)).toEqual(["d1abca_", "d2xyzb_"]);
    });

    test("parses a gzipped report file", async () => {
      const reader = await new HhrParser().openFile(join(dir, "query.hhr.gz"));

      expect(reader.queryName).toBe(QUERY_NAME);
      const alignments = await collect(reader);
      expect(alignments).toHaveLength(2);
    });

    test("recognizes a gzipped report by its magic bytes", async () => {
      const reader = await new HhrParser().openFile(join(dir, "archived.hhr"));

      expect(reader.queryName).toBe(QUERY_NAME);
      expect(await collect(reader)).toHaveLength(2);
    });

    test("reports a missing file", async () => {
      await expect(
        collect(new HhrParser().parseFile(join(dir, "missing.hhr")))
      ).rejects.toMatchObject({ name: "FileError" });
    });
  });
});
