/**
 * Shared types for reconciliation runners
 *
 * Each runner takes one explicit configuration record; nothing is read from
 * global state. Optional fields fall back to the defaults in
 * `RUNNER_DEFAULTS`.
 */

import type { HitTraceEvent } from "../formats/trace/types";
import type { ChunkEvent, DiffEntry, Hit } from "../types";
import type { MatchKind } from "./core/trace-index";
import type { ValidatedHit } from "./validate";

/**
 * Process exit statuses
 */
export const ExitCode = {
  OK: 0,
  FAILURES: 1,
  CONFIGURATION: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export const RUNNER_DEFAULTS = {
  reportLimit: 20,
  sampleLimit: 50,
  maxSamples: 50,
  topN: 10,
  caseSensitive: false,
} as const;

// =============================================================================
// COMPARE
// =============================================================================

export interface CompareConfig {
  /** First hit table (side A) */
  left: string;
  /** Second hit table (side B) */
  right: string;
  /** FASTA holding the reference the hits were called on */
  reference: string;
  /** FASTA record to validate against */
  referenceName: string;
  /** Rows listed per direction; negative lists every row */
  reportLimit?: number;
  caseSensitive?: boolean;
}

export interface CompareResult {
  readonly leftPath: string;
  readonly rightPath: string;
  readonly leftCount: number;
  readonly rightCount: number;
  /** `A − B`, validated, in diff order */
  readonly leftOnly: ValidatedHit[];
  /** `B − A`, validated, in diff order */
  readonly rightOnly: ValidatedHit[];
  /** Failing hits across both directions, listed or not */
  readonly failures: number;
  readonly exitCode: ExitCode;
}

// =============================================================================
// CORRELATE
// =============================================================================

/**
 * Which run holds the record the other lacks
 */
export type DiffDirection = "whole-reference-only" | "chunked-only";

export type CorrelationStatus = "not_found" | "unresolved" | "resolved" | "ambiguous_chunk";

/**
 * One log event that reports the record, with the chunk it is attributed to
 */
export interface ChunkMatch {
  readonly event: HitTraceEvent;
  readonly chunk?: ChunkEvent;
}

export interface RecordCorrelation {
  readonly entry: DiffEntry<Hit>;
  readonly matchKind: MatchKind;
  /** Every matching event, in log order */
  readonly matches: ChunkMatch[];
  /** Distinct chunks among the matches, in first-match order */
  readonly chunks: ChunkEvent[];
  readonly status: CorrelationStatus;
}

export interface DirectionalCorrelations {
  readonly wholeReferenceOnly: RecordCorrelation[];
  readonly chunkedOnly: RecordCorrelation[];
}

/**
 * Unmatched records attributed to one chunk, counted by multiplicity
 */
export interface ChunkTally {
  readonly offset: number;
  readonly length: number;
  readonly snippet: string;
  readonly count: number;
}

export interface CorrelateConfig {
  /** Hit table of the whole-reference run */
  wholeReferenceTable: string;
  /** Hit table of the chunked run */
  chunkedTable: string;
  /** Trace log of the chunked run */
  chunkedLog: string;
  /** Directory receiving the report artifacts */
  outDir: string;
  /** Records listed per direction in the text report */
  sampleLimit?: number;
  caseSensitive?: boolean;
}

export interface CorrelateResult {
  readonly correlations: DirectionalCorrelations;
  readonly summary: ChunkTally[];
  readonly reportPath: string;
  readonly mappingPath: string;
  readonly summaryPath: string;
  readonly exitCode: ExitCode;
}

// =============================================================================
// RAW DIFF
// =============================================================================

export interface RankedSequence {
  readonly sequence: string;
  /** Differing rows carrying this sequence, both directions */
  readonly diffCount: number;
}

export interface RawDiffConfig {
  wholeReferenceTable: string;
  chunkedTable: string;
  wholeReferenceLog: string;
  chunkedLog: string;
  outDir: string;
  /** Sequences examined, most-differing first */
  topN?: number;
  /** Candidates listed per side in each report */
  maxSamples?: number;
  caseSensitive?: boolean;
}

export interface SequenceReport {
  /** 1-based rank */
  readonly rank: number;
  readonly sequence: string;
  readonly diffCount: number;
  readonly wholeReferenceTotal: number;
  readonly chunkedTotal: number;
  readonly chunkedOnly: number;
  readonly wholeReferenceOnly: number;
  /** Candidate-bearing lines of the whole-reference log mentioning the sequence */
  readonly wholeReferenceMatches: number;
  /** Same, in the chunked log */
  readonly chunkedMatches: number;
  readonly reportPath: string;
}

export interface RawDiffResult {
  readonly reports: SequenceReport[];
  readonly summaryPath: string;
  readonly exitCode: ExitCode;
}

// =============================================================================
// COMPARE DIRECTORIES
// =============================================================================

export interface CompareDirectoriesConfig {
  /** Output directory of the whole-reference run */
  wholeReferenceDir: string;
  /** Output directory of the chunked run */
  chunkedDir: string;
  caseSensitive?: boolean;
}

export interface FileComparison {
  readonly file: string;
  readonly wholeReferenceCount: number;
  readonly chunkedCount: number;
  readonly wholeReferenceOnly: number;
  readonly chunkedOnly: number;
}

export interface CompareDirectoriesResult {
  readonly compared: FileComparison[];
  /** CSV names present only in the whole-reference directory */
  readonly missingFromChunked: string[];
  /** CSV names present only in the chunked directory */
  readonly missingFromWholeReference: string[];
  readonly exitCode: ExitCode;
}
