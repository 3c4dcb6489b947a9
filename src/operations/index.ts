/**
 * Reconciliation operations
 *
 * @example
 * ```typescript
 * import { compareHitTables } from "./operations";
 *
 * const result = await compareHitTables({
 *   left: "output/mmap/chr2L.csv",
 *   right: "output/stream/chr2L.csv",
 *   reference: "dm6.fa",
 *   referenceName: "chr2L",
 * });
 * ```
 */

export { chunkKey, locateChunk } from "./core/chunk-locator";
export {
  candidateKey,
  collapseEntries,
  compareRecords,
  hitKey,
  multisetDiff,
} from "./core/multiset";
export type { MultisetDiff, PositionedRecord, RecordKey } from "./core/multiset";
export { buildTraceIndex, lookupRecord } from "./core/trace-index";
export type { MatchKind, TraceIndex, TraceLookup } from "./core/trace-index";
export { compareHitTables, runCompare, validateCompareConfig } from "./compare";
export { compareDirectories, formatDirectoryReport } from "./compare-dirs";
export {
  CHUNK_MAPPING_FILE,
  CHUNK_SUMMARY_FILE,
  CORRELATION_REPORT_FILE,
  correlateDifferences,
  correlateRecord,
  runCorrelate,
  summarizeChunks,
} from "./correlate";
export {
  RAW_DIFF_SUMMARY_FILE,
  rankDifferingSequences,
  reportFileName,
  runRawDiff,
} from "./raw-diff";
export {
  countMarkers,
  countStatuses,
  formatCandidateLine,
  formatCompareReport,
  formatCorrelationReport,
  formatHitLine,
  formatListing,
  formatTraceSection,
  previewSequence,
} from "./report";
export { ExitCode, RUNNER_DEFAULTS } from "./types";
export type {
  ChunkMatch,
  ChunkTally,
  CompareConfig,
  CompareDirectoriesConfig,
  CompareDirectoriesResult,
  CompareResult,
  CorrelateConfig,
  CorrelateResult,
  CorrelationStatus,
  DiffDirection,
  DirectionalCorrelations,
  FileComparison,
  RankedSequence,
  RawDiffConfig,
  RawDiffResult,
  RecordCorrelation,
  SequenceReport,
} from "./types";
export { formatOutcome, ValidationFailure, validateHit, validateHits } from "./validate";
export type { HitValidationOptions, ValidatedHit, ValidationOutcome } from "./validate";
