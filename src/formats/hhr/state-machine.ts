/**
 * Block assembler for the alignment section of an hhr report
 *
 * The alignment section is a flat run of tagged lines. Each hit opens with
 * a `No <n>` line and a `>` header; its alignment is wrapped into blocks
 * that repeat the same Q/T line tags, so every track is accumulated across
 * blocks until the next `No` line, `Done!` or end of input closes the hit.
 *
 * State transitions:
 * ```
 *   awaiting-hit ──">"──▶ in-hit ──"No n"──▶ awaiting-hit
 *                           │
 *                         "Done!" ──▶ done (only blank lines may follow)
 * ```
 *
 * @module hhr/state-machine
 */

import { ConsistencyError, StructuralFormatError, TruncationError } from "../../errors";
import type { LineCursor } from "../../io/stream-utils";
import type { PairwiseAlignment } from "../../types";
import { buildAlignment } from "./assembler";
import { END_SENTINEL } from "./constants";
import {
  lastToken,
  parseAlignmentLine,
  parseHitTitle,
  parseInteger,
  parseScoreLine,
  splitFirst,
  tokenize,
} from "./primitives";
import type { AssemblerState, AssemblyContext, HitAccumulator } from "./types";

/**
 * Kind of a line in the alignment section, decided by its prefix
 */
export type LineTag =
  | "blank"
  | "hit-header"
  | "end"
  | "column-score"
  | "hit-number"
  | "confidence"
  | "query-ss-pred"
  | "query-consensus"
  | "query-sequence"
  | "target-ss-pred"
  | "target-ss-dssp"
  | "target-consensus"
  | "target-sequence"
  | "unknown";

/**
 * Classify a right-trimmed line; more specific prefixes win
 */
export function classifyLine(line: string): LineTag {
  if (line === "") return "blank";
  if (line.startsWith(">")) return "hit-header";
  if (line === END_SENTINEL) return "end";
  if (line.startsWith(" ")) return "column-score";
  if (line.startsWith("No ")) return "hit-number";
  if (line.startsWith("Confidence")) return "confidence";
  if (line.startsWith("Q ss_pred ")) return "query-ss-pred";
  if (line.startsWith("Q Consensus ")) return "query-consensus";
  if (line.startsWith("Q ")) return "query-sequence";
  if (line.startsWith("T ss_pred ")) return "target-ss-pred";
  if (line.startsWith("T ss_dssp ")) return "target-ss-dssp";
  if (line.startsWith("T Consensus ")) return "target-consensus";
  if (line.startsWith("T ")) return "target-sequence";
  return "unknown";
}

export function createHitAccumulator(
  number: number,
  lineNumber: number,
  hmmName: string,
  hmmDescription: string,
  scores: Record<string, number>
): HitAccumulator {
  return {
    number,
    lineNumber,
    hmmName,
    hmmDescription,
    scores,
    querySequence: "",
    queryConsensus: "",
    querySsPred: "",
    targetSequence: "",
    targetConsensus: "",
    targetSsPred: "",
    targetSsDssp: "",
    confidence: "",
    columnScore: "",
  };
}

/**
 * Read the alignment section and yield one alignment per hit
 *
 * Pulls lines from the cursor only as far as needed to complete the next
 * hit. With an empty hit table nothing is read.
 *
 * @throws {StructuralFormatError} On a line no tag matches, a tag out of
 *   place, or data after `Done!`
 * @throws {ConsistencyError} On misnumbered hits, mismatched tracks or a
 *   hit count different from the table's
 * @throws {TruncationError} If input ends inside a hit
 */
export async function* assembleHits(
  cursor: LineCursor,
  context: AssemblyContext
): AsyncGenerator<PairwiseAlignment, void, undefined> {
  if (context.hitCount === 0) return;

  let state: AssemblerState = { kind: "awaiting-hit", number: undefined };
  let hitsNumbered = 0;
  let emitted = 0;

  while (true) {
    const raw = await cursor.next();
    if (raw === undefined) break;

    const line = raw.trimEnd();
    const lineNumber = cursor.lineNumber;
    const tag = classifyLine(line);

    if (state.kind === "done") {
      if (tag !== "blank") {
        throw new StructuralFormatError(
          `Found additional data after '${END_SENTINEL}'; corrupt file?`,
          lineNumber,
          line.slice(0, 30)
        );
      }
      continue;
    }

    switch (tag) {
      case "blank":
        break;

      case "hit-number": {
        if (state.kind === "in-hit") {
          yield buildAlignment(state.hit, context);
          emitted++;
        } else if (state.number !== undefined) {
          throw new StructuralFormatError(`Hit ${state.number} has no alignment block`, lineNumber);
        }

        const number = parseHitNumber(line, lineNumber);
        hitsNumbered++;
        if (number !== hitsNumbered) {
          throw new ConsistencyError(
            `Hit numbered ${number}, expected ${hitsNumbered}`,
            hitsNumbered,
            number,
            lineNumber
          );
        }
        if (number > context.hitCount) {
          throw new ConsistencyError(
            `Found hit ${number}, but the hit table lists only ${context.hitCount}`,
            context.hitCount,
            number,
            lineNumber
          );
        }
        state = { kind: "awaiting-hit", number };
        break;
      }

      case "hit-header": {
        if (state.kind !== "awaiting-hit" || state.number === undefined) {
          throw new StructuralFormatError("Hit header without a preceding 'No' line", lineNumber, line.slice(0, 30));
        }
        const [hmmName, hmmDescription] = parseHitTitle(line, lineNumber);

        const scoreLine = await cursor.next();
        if (scoreLine === undefined) {
          throw new TruncationError(`Input ended after the header of hit ${state.number}`, "hit", lineNumber);
        }
        const scores = parseScoreLine(scoreLine, cursor.lineNumber);

        state = {
          kind: "in-hit",
          hit: createHitAccumulator(state.number, lineNumber, hmmName, hmmDescription, scores),
        };
        break;
      }

      case "end":
        if (state.kind === "in-hit") {
          yield buildAlignment(state.hit, context);
          emitted++;
        } else if (state.number !== undefined) {
          throw new TruncationError(`Hit ${state.number} has no alignment block`, "hit", lineNumber);
        }
        state = { kind: "done" };
        break;

      case "unknown":
        throw StructuralFormatError.unparsableLine(line, lineNumber);

      default:
        if (state.kind !== "in-hit") {
          throw new StructuralFormatError(
            "Alignment line outside of a hit block",
            lineNumber,
            line.slice(0, 30)
          );
        }
        accumulate(state.hit, tag, line, lineNumber, context);
    }
  }

  if (state.kind === "in-hit") {
    yield buildAlignment(state.hit, context);
    emitted++;
  } else if (state.kind === "awaiting-hit" && state.number !== undefined) {
    throw new TruncationError(`Input ended before the alignment of hit ${state.number}`, "hit", cursor.lineNumber);
  }

  if (emitted === 0) {
    throw new TruncationError(
      `Input ended before any alignment; the hit table lists ${context.hitCount}`,
      "hit",
      cursor.lineNumber
    );
  }
  if (emitted !== context.hitCount) {
    throw new ConsistencyError(
      `Expected ${context.hitCount} alignments, found ${emitted}`,
      context.hitCount,
      emitted,
      cursor.lineNumber
    );
  }
}

/**
 * Add one track line to the current hit
 */
function accumulate(
  hit: HitAccumulator,
  tag: Exclude<LineTag, "blank" | "hit-header" | "end" | "hit-number" | "unknown">,
  line: string,
  lineNumber: number,
  context: AssemblyContext
): void {
  switch (tag) {
    case "column-score":
      hit.columnScore += line.trim();
      break;

    case "confidence":
      hit.confidence += splitFirst(line)[1];
      break;

    case "query-ss-pred":
      hit.querySsPred += lastToken(line);
      break;

    case "query-consensus": {
      const parsed = parseAlignmentLine(line, lineNumber);
      recordTotal(hit, "query", parsed.total, lineNumber, context);
      hit.queryConsensus += parsed.residues;
      break;
    }

    case "query-sequence": {
      const parsed = parseAlignmentLine(line, lineNumber);
      if (!context.queryName.startsWith(parsed.name) && !parsed.name.startsWith(context.queryName)) {
        throw new ConsistencyError(
          `Query line names '${parsed.name}', which does not match query '${context.queryName}'`,
          context.queryName,
          parsed.name,
          lineNumber
        );
      }
      recordTotal(hit, "query", parsed.total, lineNumber, context);
      hit.queryStart ??= parsed.start;
      hit.querySequence += parsed.residues;
      break;
    }

    case "target-ss-pred":
      hit.targetSsPred += lastToken(line);
      break;

    case "target-ss-dssp":
      hit.targetSsDssp += lastToken(line);
      break;

    case "target-consensus": {
      const parsed = parseAlignmentLine(line, lineNumber);
      recordTotal(hit, "target", parsed.total, lineNumber, context);
      hit.targetConsensus += parsed.residues;
      break;
    }

    case "target-sequence": {
      const parsed = parseAlignmentLine(line, lineNumber);
      if (hit.targetName !== undefined && hit.targetName !== parsed.name) {
        throw new ConsistencyError(
          `Target line names '${parsed.name}', earlier blocks of hit ${hit.number} name '${hit.targetName}'`,
          hit.targetName,
          parsed.name,
          lineNumber
        );
      }
      hit.targetName = parsed.name;
      recordTotal(hit, "target", parsed.total, lineNumber, context);
      hit.targetStart ??= parsed.start;
      hit.targetSequence += parsed.residues;
      break;
    }
  }
}

/**
 * Keep the declared total length of one side, checking later occurrences
 * against the first
 */
function recordTotal(
  hit: HitAccumulator,
  side: "query" | "target",
  total: number,
  lineNumber: number,
  context: AssemblyContext
): void {
  const previous = side === "query" ? hit.queryLength : hit.targetLength;

  if (previous !== undefined && previous !== total) {
    const message = `Hit ${hit.number}: ${side} total length ${total} disagrees with earlier ${previous}`;
    if (context.strictTotals) {
      throw new ConsistencyError(message, previous, total, lineNumber);
    }
    context.warn(message, lineNumber);
  }

  if (side === "query") {
    hit.queryLength = total;
  } else {
    hit.targetLength = total;
  }
}

function parseHitNumber(line: string, lineNumber: number): number {
  const tokens = tokenize(line);
  const [, value] = tokens;
  if (tokens.length !== 2 || value === undefined) {
    throw new StructuralFormatError("Expected 'No <number>'", lineNumber, line.slice(0, 30));
  }
  return parseInteger(value, "hit number", lineNumber);
}
