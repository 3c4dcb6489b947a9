/**
 * @module formats/trace/grammar
 * @description Two-stage line grammar for trace logs
 *
 * Stage one matches the exact layout the pipeline prints for each marker.
 * Stage two, for lines that carry a marker but not that layout, looks for
 * every `key=value` field on its own. Lines whose fields cannot be recovered
 * either way yield `undefined`; trace logs are best-effort output and a bad
 * line is never an error.
 */

import type { CandidateFields, ExecutionMode } from "../../types";
import { ExecutionMode as Modes } from "../../types";
import { normalizeSequence } from "../dsv/parser";
import type { ClassifiedLine, TraceEvent, TraceMarker } from "./types";

const MARKER_PATTERN = /\b(RAW_G4|FAMILY|MERGED_G4|STREAM_HIT|STREAM_CHUNK)\b/;

const FIELDS = String.raw`start=(\d+) end=(\d+) gscore=(\d+) seq=(\S+)\s*$`;

const STRICT = {
  RAW_G4: new RegExp(String.raw`RAW_G4: ${FIELDS}`),
  FAMILY: new RegExp(String.raw`FAMILY(?: \(id=(\d+)\))?: ${FIELDS}`),
  MERGED_G4: new RegExp(String.raw`MERGED_G4(?: \(offset=(\d+)\))?: ${FIELDS}`),
  STREAM_HIT: new RegExp(String.raw`STREAM_HIT \(offset=(\d+)\): ${FIELDS}`),
  STREAM_CHUNK: /STREAM_CHUNK \(offset=(\d+), len=(\d+)\):(?: contains target;)? snippet="([^"]*)"/,
} as const satisfies Record<TraceMarker, RegExp>;

const LOOSE = {
  start: /\bstart=(\d+)/,
  end: /\bend=(\d+)/,
  score: /\b(?:gscore|score)=(\d+)/,
  seq: /\bseq=([^\s,;"]+)/,
  offset: /\boffset=(\d+)/,
  len: /\blen=(\d+)/,
  id: /\bid=(\d+)/,
  snippet: /snippet="([^"]*)"/,
} as const;

const PREFIX_MODE = /^\s*\[(MMAP|STREAM)\]/i;
const FIELD_MODE = /\bmode=(mmap|stream|whole-reference|chunked)\b/i;
const TOKEN_MODE = /\b(MMAP|STREAM)\b/;

export interface ClassifyOptions {
  defaultMode?: ExecutionMode;
  caseSensitive?: boolean;
}

/**
 * Map the pipeline's own mode vocabulary onto ExecutionMode
 */
export function parseExecutionMode(text: string): ExecutionMode | undefined {
  switch (text.toLowerCase()) {
    case "mmap":
    case "whole-reference":
      return Modes.WHOLE_REFERENCE;
    case "stream":
    case "chunked":
      return Modes.CHUNKED;
    default:
      return undefined;
  }
}

/**
 * Mode tag written on the line itself: a `[MMAP]`/`[STREAM]` prefix, a
 * `mode=` field, or a standalone MMAP/STREAM token
 */
export function detectLineMode(line: string): ExecutionMode | undefined {
  const tagged = PREFIX_MODE.exec(line) ?? FIELD_MODE.exec(line) ?? TOKEN_MODE.exec(line);
  return tagged?.[1] === undefined ? undefined : parseExecutionMode(tagged[1]);
}

function toInt(text: string | undefined): number | undefined {
  return text === undefined ? undefined : Number.parseInt(text, 10);
}

function strictFields(
  match: RegExpExecArray,
  firstGroup: number,
  caseSensitive: boolean
): CandidateFields | undefined {
  const start = toInt(match[firstGroup]);
  const end = toInt(match[firstGroup + 1]);
  const score = toInt(match[firstGroup + 2]);
  const seq = match[firstGroup + 3];
  if (start === undefined || end === undefined || score === undefined || seq === undefined) {
    return undefined;
  }
  return { start, end, score, sequence: normalizeSequence(seq, caseSensitive) };
}

function looseFields(line: string, caseSensitive: boolean): CandidateFields | undefined {
  const start = toInt(LOOSE.start.exec(line)?.[1]);
  const end = toInt(LOOSE.end.exec(line)?.[1]);
  const score = toInt(LOOSE.score.exec(line)?.[1]);
  const seq = LOOSE.seq.exec(line)?.[1];
  if (start === undefined || end === undefined || score === undefined || seq === undefined) {
    return undefined;
  }
  return { start, end, score, sequence: normalizeSequence(seq, caseSensitive) };
}

/**
 * Marker-specific parse, strict layout first, then loose field extraction
 */
function parseMarker(
  marker: TraceMarker,
  line: string,
  base: { lineIndex: number; mode?: ExecutionMode },
  caseSensitive: boolean
): TraceEvent | undefined {
  if (marker === "STREAM_CHUNK") {
    const strict = STRICT.STREAM_CHUNK.exec(line);
    const offset = toInt(strict?.[1] ?? LOOSE.offset.exec(line)?.[1]);
    const length = toInt(strict?.[2] ?? LOOSE.len.exec(line)?.[1]);
    if (offset === undefined || length === undefined) {
      return undefined;
    }
    const snippet = strict?.[3] ?? LOOSE.snippet.exec(line)?.[1] ?? "";
    return {
      kind: "ChunkBoundary",
      ...base,
      chunk: { logPosition: base.lineIndex, offset, length, snippet },
    };
  }

  const strict = STRICT[marker].exec(line);
  // RAW_G4 has no leading optional group; the others put id/offset first
  const firstField = marker === "RAW_G4" ? 1 : 2;
  const fields =
    (strict === null ? undefined : strictFields(strict, firstField, caseSensitive)) ??
    looseFields(line, caseSensitive);
  if (fields === undefined) {
    return undefined;
  }

  const extra = toInt(strict?.[1]);
  switch (marker) {
    case "RAW_G4":
      return { kind: "RawCandidate", ...base, fields };
    case "FAMILY": {
      const familyId = strict === null ? toInt(LOOSE.id.exec(line)?.[1]) : extra;
      return { kind: "FamilyGroup", ...base, fields, ...(familyId !== undefined && { familyId }) };
    }
    case "MERGED_G4": {
      const offset = strict === null ? toInt(LOOSE.offset.exec(line)?.[1]) : extra;
      return { kind: "MergedHit", ...base, fields, ...(offset !== undefined && { offset }) };
    }
    case "STREAM_HIT": {
      const offset = strict === null ? toInt(LOOSE.offset.exec(line)?.[1]) : extra;
      return { kind: "StreamHit", ...base, fields, ...(offset !== undefined && { offset }) };
    }
  }
}

/**
 * Classify one log line
 *
 * @returns The typed event, `Unrecognized` for lines without a marker, or
 * `undefined` for a marker line whose fields could not be recovered
 *
 * @example
 * ```typescript
 * classifyLine("[STREAM] DEBUG RAW_G4: start=10 end=25 gscore=19 seq=GGGAGGGAGGGAGGG", 7);
 * // { kind: "RawCandidate", lineIndex: 7, mode: "chunked",
 * //   fields: { start: 10, end: 25, score: 19, sequence: "gggagggagggaggg" } }
 * ```
 */
export function classifyLine(
  line: string,
  lineIndex: number,
  options: ClassifyOptions = {}
): ClassifiedLine | undefined {
  const markerMatch = MARKER_PATTERN.exec(line);
  const marker = markerMatch?.[1];
  if (!isTraceMarker(marker)) {
    return { kind: "Unrecognized", lineIndex, text: line };
  }

  const intrinsic =
    marker === "STREAM_HIT" || marker === "STREAM_CHUNK" ? Modes.CHUNKED : undefined;
  const mode = intrinsic ?? detectLineMode(line) ?? options.defaultMode;
  const base = mode === undefined ? { lineIndex } : { lineIndex, mode };

  return parseMarker(marker, line, base, options.caseSensitive ?? false);
}

function isTraceMarker(value: string | undefined): value is TraceMarker {
  return (
    value === "RAW_G4" ||
    value === "FAMILY" ||
    value === "MERGED_G4" ||
    value === "STREAM_HIT" ||
    value === "STREAM_CHUNK"
  );
}
