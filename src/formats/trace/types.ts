/**
 * @module formats/trace/types
 * @description Tagged events recognized in pipeline trace logs
 *
 * Downstream logic consumes only these variants, never raw log text.
 */

import type { CandidateFields, ChunkEvent, ExecutionMode, ParserOptions } from "../../types";

/**
 * Markers the pipeline writes on lines of diagnostic interest
 */
export const TRACE_MARKERS = ["RAW_G4", "FAMILY", "MERGED_G4", "STREAM_HIT", "STREAM_CHUNK"] as const;

export type TraceMarker = (typeof TRACE_MARKERS)[number];

/**
 * Markers whose lines carry candidate fields
 */
export const CANDIDATE_MARKERS = ["RAW_G4", "FAMILY", "MERGED_G4", "STREAM_HIT"] as const;

export type CandidateMarker = (typeof CANDIDATE_MARKERS)[number];

interface TraceEventBase {
  /** 0-based index of the line within its log */
  readonly lineIndex: number;
  /** Mode tag carried by the line, or assigned from the scan's default */
  readonly mode?: ExecutionMode;
}

/** `RAW_G4`: candidate emitted before consolidation */
export interface RawCandidateEvent extends TraceEventBase {
  readonly kind: "RawCandidate";
  readonly fields: CandidateFields;
}

/** `FAMILY`: candidate grouped into an overlap family */
export interface FamilyGroupEvent extends TraceEventBase {
  readonly kind: "FamilyGroup";
  readonly fields: CandidateFields;
  readonly familyId?: number;
}

/** `MERGED_G4`: consolidated hit */
export interface MergedHitEvent extends TraceEventBase {
  readonly kind: "MergedHit";
  readonly fields: CandidateFields;
  readonly offset?: number;
}

/** `STREAM_HIT`: hit reported by the chunked strategy */
export interface StreamHitEvent extends TraceEventBase {
  readonly kind: "StreamHit";
  readonly fields: CandidateFields;
  readonly offset?: number;
}

/** `STREAM_CHUNK`: chunk-boundary announcement */
export interface ChunkBoundaryEvent extends TraceEventBase {
  readonly kind: "ChunkBoundary";
  readonly chunk: ChunkEvent;
}

/** A line carrying no marker */
export interface UnrecognizedLine {
  readonly kind: "Unrecognized";
  readonly lineIndex: number;
  readonly text: string;
}

export type TraceEvent =
  | RawCandidateEvent
  | FamilyGroupEvent
  | MergedHitEvent
  | StreamHitEvent
  | ChunkBoundaryEvent;

/** Events that report a final hit, the ones unmatched records are traced to */
export type HitTraceEvent = MergedHitEvent | StreamHitEvent;

export type ClassifiedLine = TraceEvent | UnrecognizedLine;

/**
 * A logged line whose candidate fields matched a filter, with its original text
 */
export interface TraceLineMatch {
  readonly lineIndex: number;
  readonly marker: CandidateMarker;
  readonly text: string;
}

export interface TraceScannerOptions extends ParserOptions {
  /** Mode for lines that carry no tag of their own (the log of a known run) */
  defaultMode?: ExecutionMode;
  /** Keep sequence case as logged (default false: lower-case) */
  caseSensitive?: boolean;
}

/**
 * Candidates of one or more logs split by the mode that produced them
 */
export interface ModePartition<T> {
  readonly wholeReference: T[];
  readonly chunked: T[];
}
