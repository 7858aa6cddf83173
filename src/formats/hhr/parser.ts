/**
 * hhr report parser
 *
 * Reads the run metadata and hit table eagerly when a report is opened,
 * then yields one pairwise alignment per hit as the caller iterates.
 *
 * @module hhr/parser
 */

import { type } from "arktype";
import { decompressIfNeeded } from "../../compression";
import {
  BufferError,
  HhrKitError,
  ParseError,
  StructuralFormatError,
  ValidationError,
} from "../../errors";
import { createStream } from "../../io/file-reader";
import { LineCursor, readLines } from "../../io/stream-utils";
import type { FileReaderOptions, PairwiseAlignment } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { readHeader } from "./header";
import { assembleHits } from "./state-machine";
import { readSummary } from "./summary";
import type {
  AssemblyContext,
  HhrParserOptions,
  HhrReport,
  HitSummaryRow,
  RunMetadata,
} from "./types";

/**
 * ArkType validation for hhr parser options
 */
const HhrParserOptionsSchema = type({
  "maxLineLength?": "0<number<=10000000",
  "strictTotals?": "boolean",
  "checkMatchColumns?": "boolean",
  "signal?": "unknown", // AbortSignal
  "onWarning?": "unknown", // (message, lineNumber?) => void
});

/**
 * An opened report: metadata and hit table are available immediately,
 * alignments are read on iteration
 *
 * @example
 * ```typescript
 * const reader = await new HhrParser().openFile("query.hhr");
 * console.log(`${reader.queryName}: ${reader.hitCount} hits`);
 * for await (const alignment of reader) {
 *   console.log(alignment.sequences[0].id, alignment.annotations.Probab);
 * }
 * ```
 */
export class HhrReader implements AsyncIterable<PairwiseAlignment> {
  private started = false;
  private count = 0;

  constructor(
    readonly queryName: string,
    readonly metadata: RunMetadata,
    readonly summary: readonly HitSummaryRow[],
    private readonly cursor: LineCursor,
    private readonly context: AssemblyContext
  ) {}

  /** Number of hits listed in the hit table */
  get hitCount(): number {
    return this.summary.length;
  }

  /** Alignments yielded so far */
  get emitted(): number {
    return this.count;
  }

  /**
   * @throws {ValidationError} If the reader has already been iterated
   */
  async *[Symbol.asyncIterator](): AsyncIterator<PairwiseAlignment> {
    if (this.started) {
      throw new ValidationError("HhrReader can only be iterated once");
    }
    this.started = true;

    try {
      for await (const alignment of assembleHits(this.cursor, this.context)) {
        this.count++;
        yield alignment;
      }
    } finally {
      await this.cursor.close();
    }
  }

  /**
   * Stop reading without consuming the remaining hits; a stream or file
   * source is cancelled
   */
  async close(): Promise<void> {
    this.started = true;
    await this.cursor.close();
  }
}

/**
 * Streaming parser for HHsearch / HHblits result files
 *
 * @example
 * ```typescript
 * const parser = new HhrParser({ strictTotals: false });
 * for await (const alignment of parser.parseFile("query.hhr.gz")) {
 *   const [target, query] = alignment.sequences;
 *   console.log(`${query.id} vs ${target.id}: E=${alignment.annotations["E-value"]}`);
 * }
 * ```
 */
export class HhrParser extends AbstractParser<PairwiseAlignment, HhrParserOptions> {
  protected getDefaultOptions(): Partial<HhrParserOptions> {
    return {
      strictTotals: true,
      checkMatchColumns: true,
    };
  }

  constructor(options: HhrParserOptions = {}) {
    const validationResult = HhrParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid HHR parser options: ${validationResult.summary}`);
    }
    super(options);
  }

  protected getFormatName(): string {
    return "HHR";
  }

  /**
   * Open a report from a line source, reading the header and hit table
   *
   * @throws {StructuralFormatError} On malformed header or table
   * @throws {TruncationError} If input ends before the table is complete
   */
  async open(lines: Iterable<string> | AsyncIterable<string>): Promise<HhrReader> {
    const cursor = new LineCursor(this.guardLines(lines));

    try {
      const { queryName, metadata } = await readHeader(cursor);
      const summary = await readSummary(cursor);

      return new HhrReader(queryName, metadata, summary, cursor, {
        queryName,
        metadata,
        hitCount: summary.length,
        strictTotals: this.options.strictTotals ?? true,
        checkMatchColumns: this.options.checkMatchColumns ?? true,
        warn: (message, lineNumber) => this.warn(message, lineNumber),
      });
    } catch (error) {
      await cursor.close();
      throw error;
    }
  }

  async openString(data: string): Promise<HhrReader> {
    return this.open(data.split(/\r?\n/));
  }

  /**
   * Open a report file, decompressing `.gz` files on the fly
   *
   * @throws {FileError} If the file cannot be read
   */
  async openFile(filePath: string, options?: FileReaderOptions): Promise<HhrReader> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath must not be empty");
    }
    const stream = await createStream(filePath, {
      ...options,
      ...(this.options.signal !== undefined && { signal: this.options.signal }),
    });
    return this.open(readLines(stream, options?.encoding ?? "utf8", this.options.maxLineLength));
  }

  /**
   * Open a report from a byte stream, decompressing gzip data on the fly
   */
  async openStream(stream: ReadableStream<Uint8Array>): Promise<HhrReader> {
    const bytes = await decompressIfNeeded(stream, this.options.signal);
    return this.open(readLines(bytes, "utf8", this.options.maxLineLength));
  }

  /**
   * Parse alignments from report text
   */
  async *parseString(data: string): AsyncIterable<PairwiseAlignment> {
    yield* await this.openString(data);
  }

  /**
   * Parse alignments from a report file
   *
   * @throws {ParseError} Wrapping unexpected failures with the file path
   */
  async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<PairwiseAlignment> {
    try {
      yield* await this.openFile(filePath, options);
    } catch (error) {
      if (error instanceof HhrKitError) throw error;
      throw new ParseError(
        `Failed to parse HHR file '${filePath}': ${error instanceof Error ? error.message : String(error)}`,
        "HHR",
        undefined,
        error instanceof Error ? error.stack : undefined
      );
    }
  }

  /**
   * Parse alignments from a byte stream, plain or gzipped
   */
  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<PairwiseAlignment> {
    yield* await this.openStream(stream);
  }

  /**
   * Parse alignments from already split lines
   */
  async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<PairwiseAlignment> {
    yield* await this.open(lines);
  }

  /**
   * Apply line length limit and abort checks to every line read
   */
  private async *guardLines(lines: Iterable<string> | AsyncIterable<string>): AsyncGenerator<string> {
    const { maxLineLength } = this.options;
    let lineNumber = 0;
    try {
      for await (const line of lines) {
        lineNumber++;
        this.checkAborted();
        if (line.length > maxLineLength) {
          throw new StructuralFormatError(
            `Line exceeds maximum length of ${maxLineLength} characters`,
            lineNumber,
            line.slice(0, 30)
          );
        }
        yield line;
      }
    } catch (error) {
      // the byte-stream line splitter stops at the same limit
      if (error instanceof BufferError && error.operation === "overflow") {
        throw new StructuralFormatError(
          `Line exceeds maximum length of ${maxLineLength} characters`,
          lineNumber + 1,
          error.context
        );
      }
      throw error;
    }
  }
}

/**
 * Read a whole report into memory
 *
 * @example
 * ```typescript
 * const report = await parseHhr(text);
 * console.log(report.metadata.Match_columns, report.alignments.length);
 * ```
 */
export async function parseHhr(data: string, options?: HhrParserOptions): Promise<HhrReport> {
  const reader = await new HhrParser(options).openString(data);
  const alignments: PairwiseAlignment[] = [];
  for await (const alignment of reader) {
    alignments.push(alignment);
  }
  return {
    queryName: reader.queryName,
    metadata: reader.metadata,
    summary: reader.summary,
    alignments,
  };
}
