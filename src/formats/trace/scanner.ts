/**
 * @module formats/trace/scanner
 * @description Trace log scanner and event helpers
 *
 * A scan turns a whole log into its recognized events. Lines without a marker,
 * marker lines whose fields cannot be recovered and lines over `maxLineLength`
 * are dropped silently; a partial trace is still worth reading.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { readToString, requireInput, splitLines } from "../../io/file-reader";
import type { Candidate, CandidateFields, ChunkEvent } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { classifyLine } from "./grammar";
import type {
  CandidateMarker,
  ChunkBoundaryEvent,
  HitTraceEvent,
  ModePartition,
  RawCandidateEvent,
  TraceEvent,
  TraceLineMatch,
  TraceScannerOptions,
} from "./types";

const TraceScannerOptionsSchema = type({
  "defaultMode?": '"whole-reference"|"chunked"',
  "caseSensitive?": "boolean",
  "maxLineLength?": "number>0",
});

/**
 * TraceScanner - pipeline log → TraceEvent[]
 *
 * @example
 * ```typescript
 * const scanner = new TraceScanner({ defaultMode: "chunked" });
 * const events = await scanner.parseFile("trace_stream/run.log");
 * const chunks = extractChunks(events);
 * ```
 */
export class TraceScanner extends AbstractParser<TraceEvent, TraceScannerOptions> {
  protected getDefaultOptions(): Partial<TraceScannerOptions> {
    return {
      caseSensitive: false,
    };
  }

  constructor(options: TraceScannerOptions = {}) {
    const { defaultMode, caseSensitive, maxLineLength } = options;
    const validationResult = TraceScannerOptionsSchema({
      ...(defaultMode !== undefined && { defaultMode }),
      ...(caseSensitive !== undefined && { caseSensitive }),
      ...(maxLineLength !== undefined && { maxLineLength }),
    });
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid trace scanner options: ${validationResult.summary}`);
    }
    super(options);
  }

  protected getFormatName(): string {
    return "TRACE";
  }

  /**
   * @throws {MissingInputError} When the log does not exist
   */
  async parseFile(filePath: string): Promise<TraceEvent[]> {
    await requireInput(filePath, "trace log");
    return this.parseString(await readToString(filePath));
  }

  parseString(data: string): TraceEvent[] {
    return this.scanLines(splitLines(data));
  }

  /**
   * Scan pre-split lines; line indices are positions in `lines`
   */
  scanLines(lines: readonly string[]): TraceEvent[] {
    const events: TraceEvent[] = [];
    const { defaultMode, caseSensitive } = this.options;

    for (let i = 0; i < lines.length; i++) {
      if (i % 4096 === 0) this.checkAborted("log scanning");
      const line = lines[i] ?? "";
      // over-long lines are dropped like any other unreadable line
      if (line.length > this.options.maxLineLength) continue;

      const classified = classifyLine(line, i, {
        ...(defaultMode !== undefined && { defaultMode }),
        ...(caseSensitive !== undefined && { caseSensitive }),
      });
      if (classified === undefined || classified.kind === "Unrecognized") continue;
      events.push(classified);
    }

    return events;
  }
}

/**
 * Scan in-memory log text
 */
export function scanLog(text: string, options: TraceScannerOptions = {}): TraceEvent[] {
  return new TraceScanner(options).parseString(text);
}

/**
 * Scan a log file (gzip handled transparently)
 */
export async function scanLogFile(
  filePath: string,
  options: TraceScannerOptions = {}
): Promise<TraceEvent[]> {
  return new TraceScanner(options).parseFile(filePath);
}

function isRawCandidate(event: TraceEvent): event is RawCandidateEvent {
  return event.kind === "RawCandidate";
}

function isChunkBoundary(event: TraceEvent): event is ChunkBoundaryEvent {
  return event.kind === "ChunkBoundary";
}

function isHitEvent(event: TraceEvent): event is HitTraceEvent {
  return event.kind === "MergedHit" || event.kind === "StreamHit";
}

/**
 * Split `RawCandidate` events by execution mode
 *
 * Events without a mode are left out. Any number of logs may be concatenated
 * into `events`; a candidate keeps the line index of its own log.
 *
 * @param filter - Keep only candidates for which this returns true
 */
export function partitionCandidates(
  events: Iterable<TraceEvent>,
  filter?: (fields: CandidateFields) => boolean
): ModePartition<Candidate> {
  const partition: ModePartition<Candidate> = { wholeReference: [], chunked: [] };

  for (const event of events) {
    if (!isRawCandidate(event) || event.mode === undefined) continue;
    if (filter !== undefined && !filter(event.fields)) continue;

    const candidate: Candidate = { ...event.fields, mode: event.mode, lineIndex: event.lineIndex };
    if (event.mode === "chunked") {
      partition.chunked.push(candidate);
    } else {
      partition.wholeReference.push(candidate);
    }
  }

  return partition;
}

/**
 * Chunk announcements in log order
 */
export function extractChunks(events: Iterable<TraceEvent>): ChunkEvent[] {
  const chunks: ChunkEvent[] = [];
  for (const event of events) {
    if (isChunkBoundary(event)) {
      chunks.push(event.chunk);
    }
  }
  return chunks.sort((a, b) => a.logPosition - b.logPosition);
}

/**
 * `MergedHit` and `StreamHit` events in log order
 */
export function hitEvents(events: Iterable<TraceEvent>): HitTraceEvent[] {
  const hits: HitTraceEvent[] = [];
  for (const event of events) {
    if (isHitEvent(event)) {
      hits.push(event);
    }
  }
  return hits;
}

function candidateMarker(event: Exclude<TraceEvent, ChunkBoundaryEvent>): CandidateMarker {
  switch (event.kind) {
    case "RawCandidate":
      return "RAW_G4";
    case "FamilyGroup":
      return "FAMILY";
    case "MergedHit":
      return "MERGED_G4";
    case "StreamHit":
      return "STREAM_HIT";
  }
}

/**
 * Candidate-bearing lines of one log whose fields pass `filter`, in log order
 *
 * @param events - Events scanned from `lines`
 * @param lines - The log's lines, indexed as the scan indexed them
 */
export function matchingTraceLines(
  events: Iterable<TraceEvent>,
  lines: readonly string[],
  filter: (fields: CandidateFields) => boolean
): TraceLineMatch[] {
  const matches: TraceLineMatch[] = [];
  for (const event of events) {
    if (event.kind === "ChunkBoundary" || !filter(event.fields)) continue;
    matches.push({
      lineIndex: event.lineIndex,
      marker: candidateMarker(event),
      text: lines[event.lineIndex] ?? "",
    });
  }
  return matches;
}
