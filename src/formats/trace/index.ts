/**
 * Trace log support: line grammar, scanner and event helpers
 */

export { classifyLine, detectLineMode, parseExecutionMode } from "./grammar";
export type { ClassifyOptions } from "./grammar";
export {
  extractChunks,
  hitEvents,
  matchingTraceLines,
  partitionCandidates,
  scanLog,
  scanLogFile,
  TraceScanner,
} from "./scanner";
export { CANDIDATE_MARKERS, TRACE_MARKERS } from "./types";
export type {
  CandidateMarker,
  ChunkBoundaryEvent,
  ClassifiedLine,
  FamilyGroupEvent,
  HitTraceEvent,
  MergedHitEvent,
  ModePartition,
  RawCandidateEvent,
  StreamHitEvent,
  TraceEvent,
  TraceLineMatch,
  TraceMarker,
  TraceScannerOptions,
  UnrecognizedLine,
} from "./types";
