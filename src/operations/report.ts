/**
 * Report formatting
 *
 * Every formatter is a pure function of its input and emits records in the
 * order it receives them, so identical runs give byte-identical reports.
 */

import type { DSVCell } from "../formats/dsv/types";
import { CANDIDATE_MARKERS } from "../formats/trace/types";
import type { CandidateMarker, TraceLineMatch } from "../formats/trace/types";
import type { CandidateFields, ChunkEvent, Hit } from "../types";
import type {
  ChunkTally,
  CompareResult,
  CorrelationStatus,
  DiffDirection,
  RecordCorrelation,
  SequenceReport,
} from "./types";
import { formatOutcome } from "./validate";
import type { ValidationOutcome } from "./validate";

const PREVIEW_WIDTH = 30;

export const CORRELATION_STATUSES: readonly CorrelationStatus[] = [
  "resolved",
  "ambiguous_chunk",
  "unresolved",
  "not_found",
];

export const MAPPING_COLUMNS = [
  "direction",
  "start",
  "end",
  "length",
  "tetrads",
  "y1",
  "y2",
  "y3",
  "gscore",
  "sequence",
  "multiplicity",
  "status",
  "match_kind",
  "match_count",
  "chunk_offsets",
  "chunk_lengths",
  "chunk_snippets",
  "log_positions",
] as const;

export const CHUNK_SUMMARY_COLUMNS = ["chunk_offset", "chunk_length", "count", "snippet"] as const;

export const RAW_DIFF_SUMMARY_COLUMNS = [
  "rank",
  "sequence",
  "diff_count",
  "chunked_only",
  "whole_reference_only",
  "mmap_matches",
  "stream_matches",
  "report",
] as const;

/**
 * First 30 characters, with `...` when cut
 */
export function previewSequence(sequence: string): string {
  return sequence.length > PREVIEW_WIDTH ? `${sequence.slice(0, PREVIEW_WIDTH)}...` : sequence;
}

/**
 * One listing line for a hit, with its validation status when given
 *
 * @example
 * ```typescript
 * formatHitLine(hit, { status: "OK" });
 * // "  start=   100 end=   130 len= 30 gscore=19 status=OK seq=gggttaggg"
 * ```
 */
export function formatHitLine(hit: Hit, outcome?: ValidationOutcome): string {
  const status = outcome === undefined ? "" : ` status=${formatOutcome(outcome)}`;
  return (
    `  start=${String(hit.start).padStart(6)} end=${String(hit.end).padStart(6)} ` +
    `len=${String(hit.length).padStart(3)} gscore=${String(hit.score).padStart(2)}` +
    `${status} seq=${previewSequence(hit.sequence)}`
  );
}

export function formatCandidateLine(candidate: CandidateFields): string {
  return `start=${candidate.start} end=${candidate.end} gscore=${candidate.score} seq=${candidate.sequence}`;
}

function formatChunkRef(chunk: Pick<ChunkEvent, "offset" | "length">): string {
  return `${chunk.offset}+${chunk.length}`;
}

/**
 * A capped listing: every item up to `limit` (negative lists all), then a
 * `... (N more)` line for the rest
 */
export function formatListing<T>(
  header: string,
  items: readonly T[],
  limit: number,
  formatItem: (item: T) => string
): string[] {
  const shown = limit < 0 ? items : items.slice(0, limit);
  const lines = [header, ...shown.map(formatItem)];
  const remaining = items.length - shown.length;
  if (remaining > 0) {
    lines.push(`  ... (${remaining} more)`);
  }
  return lines;
}

/**
 * Console report of a table comparison
 */
export function formatCompareReport(result: CompareResult, reportLimit: number): string[] {
  const direction = (label: string, rows: CompareResult["leftOnly"]): string[] =>
    formatListing(`${label}: ${rows.length} unique row(s)`, rows, reportLimit, (row) =>
      formatHitLine(row.hit, row.outcome)
    );

  return [
    `Comparing ${result.leftPath} (rows=${result.leftCount}) vs ${result.rightPath} (rows=${result.rightCount})`,
    "",
    ...direction(`Rows only in ${result.leftPath}`, result.leftOnly),
    "",
    ...direction(`Rows only in ${result.rightPath}`, result.rightOnly),
    "",
    result.failures > 0
      ? `Validation completed with ${result.failures} failure(s).`
      : "Validation completed with no sequence mismatches.",
  ];
}

export function formatCorrelationLine(correlation: RecordCorrelation): string {
  const chunks =
    correlation.chunks.length > 0
      ? ` chunks=${correlation.chunks.map(formatChunkRef).join(";")}`
      : "";
  return (
    `${formatHitLine(correlation.entry.record)} count=${correlation.entry.multiplicity}` +
    ` status=${correlation.status}${chunks}`
  );
}

/**
 * Per-status totals, counted by multiplicity
 */
export function countStatuses(
  correlations: readonly RecordCorrelation[]
): Record<CorrelationStatus, number> {
  const counts: Record<CorrelationStatus, number> = {
    resolved: 0,
    ambiguous_chunk: 0,
    unresolved: 0,
    not_found: 0,
  };
  for (const correlation of correlations) {
    counts[correlation.status] += correlation.entry.multiplicity;
  }
  return counts;
}

function totalRows(correlations: readonly RecordCorrelation[]): number {
  return correlations.reduce((sum, c) => sum + c.entry.multiplicity, 0);
}

/**
 * Text report of a correlation run
 */
export function formatCorrelationReport(
  sections: ReadonlyArray<{ direction: DiffDirection; correlations: readonly RecordCorrelation[] }>,
  summary: readonly ChunkTally[],
  sampleLimit: number
): string[] {
  const lines: string[] = [];

  for (const { direction, correlations } of sections) {
    const header = `${direction}: ${totalRows(correlations)} row(s), ${correlations.length} distinct`;
    lines.push(...formatListing(header, correlations, sampleLimit, formatCorrelationLine));
    const counts = countStatuses(correlations);
    lines.push(
      `  status: ${CORRELATION_STATUSES.map((status) => `${status}=${counts[status]}`).join(" ")}`
    );
    lines.push("");
  }

  lines.push(
    ...formatListing(`chunks: ${summary.length}`, summary, sampleLimit, (tally) =>
      `  offset=${tally.offset} len=${tally.length} count=${tally.count}`
    )
  );
  return lines;
}

/**
 * Rows of the full record → chunk mapping
 */
export function mappingRows(
  direction: DiffDirection,
  correlations: readonly RecordCorrelation[]
): DSVCell[][] {
  return correlations.map(({ entry, matchKind, matches, chunks, status }) => {
    const hit = entry.record;
    return [
      direction,
      hit.start,
      hit.end,
      hit.length,
      hit.tetrads,
      hit.y1,
      hit.y2,
      hit.y3,
      hit.score,
      hit.sequence,
      entry.multiplicity,
      status,
      matchKind,
      matches.length,
      chunks.map((chunk) => chunk.offset).join(";"),
      chunks.map((chunk) => chunk.length).join(";"),
      chunks
        .slice(0, 3)
        .map((chunk) => chunk.snippet)
        .join("||"),
      matches.map((match) => match.event.lineIndex).join(";"),
    ];
  });
}

export function chunkSummaryRows(summary: readonly ChunkTally[]): DSVCell[][] {
  return summary.map((tally) => [tally.offset, tally.length, tally.count, tally.snippet]);
}

/**
 * Matching trace lines per marker
 */
export function countMarkers(matches: readonly TraceLineMatch[]): Record<CandidateMarker, number> {
  const counts: Record<CandidateMarker, number> = {
    RAW_G4: 0,
    FAMILY: 0,
    MERGED_G4: 0,
    STREAM_HIT: 0,
  };
  for (const match of matches) {
    counts[match.marker] += 1;
  }
  return counts;
}

/**
 * Matching lines of one log, tagged with the run's own mode name
 *
 * @example
 * ```typescript
 * formatTraceSection("MMAP", matches, 8);
 * // ["--- MMAP trace: 1 matching line(s) ---",
 * //  "RAW_G4=1 FAMILY=0 MERGED_G4=0 STREAM_HIT=0",
 * //  "[MMAP] 12: DEBUG RAW_G4: start=100 end=109 gscore=19 seq=gggttaggg"]
 * ```
 */
export function formatTraceSection(
  tag: "MMAP" | "STREAM",
  matches: readonly TraceLineMatch[],
  maxSamples: number
): string[] {
  const counts = countMarkers(matches);
  return [
    `--- ${tag} trace: ${matches.length} matching line(s) ---`,
    ...formatListing(
      CANDIDATE_MARKERS.map((marker) => `${marker}=${counts[marker]}`).join(" "),
      matches,
      maxSamples,
      (match) => `[${tag}] ${match.lineIndex}: ${match.text}`
    ),
  ];
}

/**
 * Per-sequence candidate diff report, followed by the matching lines of both
 * logs
 */
export function formatSequenceReport(
  report: Omit<SequenceReport, "reportPath">,
  candidates: {
    readonly chunkedOnly: readonly CandidateFields[];
    readonly wholeReferenceOnly: readonly CandidateFields[];
  },
  trace: {
    readonly wholeReference: readonly TraceLineMatch[];
    readonly chunked: readonly TraceLineMatch[];
  },
  maxSamples: number
): string[] {
  return [
    `Sequence: ${report.sequence}`,
    `Rank: ${report.rank}`,
    `diff_count: ${report.diffCount}`,
    "",
    `whole_reference_total: ${report.wholeReferenceTotal}`,
    `chunked_total: ${report.chunkedTotal}`,
    `chunked_only_count: ${report.chunkedOnly}`,
    `whole_reference_only_count: ${report.wholeReferenceOnly}`,
    "",
    ...formatListing(
      "--- chunked_only (examples) ---",
      candidates.chunkedOnly,
      maxSamples,
      formatCandidateLine
    ),
    "",
    ...formatListing(
      "--- whole_reference_only (examples) ---",
      candidates.wholeReferenceOnly,
      maxSamples,
      formatCandidateLine
    ),
    "",
    ...formatTraceSection("MMAP", trace.wholeReference, maxSamples),
    "",
    ...formatTraceSection("STREAM", trace.chunked, maxSamples),
  ];
}

export function rawDiffSummaryRows(reports: readonly SequenceReport[]): DSVCell[][] {
  return reports.map((report) => [
    report.rank,
    report.sequence,
    report.diffCount,
    report.chunkedOnly,
    report.wholeReferenceOnly,
    report.wholeReferenceMatches,
    report.chunkedMatches,
    report.reportPath,
  ]);
}
