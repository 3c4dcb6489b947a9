/**
 * Candidate-level diff between execution modes
 *
 * For the sequences that differ most between two runs' tables, compares the
 * raw candidates each mode logged before consolidation. A candidate only one
 * mode produced points at the stage where the runs diverge. Each report also
 * carries every RAW_G4, FAMILY, MERGED_G4 and STREAM_HIT line of both logs
 * that mentions the sequence, counted per marker.
 */

import { join } from "path";
import { type } from "arktype";
import { ValidationError } from "../errors";
import { HitTableParser } from "../formats/dsv/parser";
import { DSVWriter } from "../formats/dsv/writer";
import { matchingTraceLines, partitionCandidates, TraceScanner } from "../formats/trace/scanner";
import type { TraceEvent } from "../formats/trace/types";
import { readLines, requireInput } from "../io/file-reader";
import { writeString } from "../io/file-writer";
import type { CandidateFields, Hit } from "../types";
import { ExecutionMode } from "../types";
import { candidateKey, hitKey, multisetDiff } from "./core/multiset";
import type { MultisetDiff } from "./core/multiset";
import { formatSequenceReport, RAW_DIFF_SUMMARY_COLUMNS, rawDiffSummaryRows } from "./report";
import type { RankedSequence, RawDiffConfig, RawDiffResult, SequenceReport } from "./types";
import { ExitCode, RUNNER_DEFAULTS } from "./types";

export const RAW_DIFF_SUMMARY_FILE = "rawdiff_summary.tsv";

const RawDiffConfigSchema = type({
  wholeReferenceTable: "string>0",
  chunkedTable: "string>0",
  wholeReferenceLog: "string>0",
  chunkedLog: "string>0",
  outDir: "string>0",
  "topN?": "number.integer",
  "maxSamples?": "number.integer",
  "caseSensitive?": "boolean",
});

/**
 * Sequences ordered by how many differing rows carry them
 *
 * Ties are broken by sequence. A negative `topN` keeps every sequence.
 */
export function rankDifferingSequences(diff: MultisetDiff<Hit>, topN: number): RankedSequence[] {
  const counts = new Map<string, number>();
  for (const hit of [...diff.leftOnly, ...diff.rightOnly]) {
    counts.set(hit.sequence, (counts.get(hit.sequence) ?? 0) + 1);
  }

  const ranked = [...counts.entries()]
    .map(([sequence, diffCount]) => ({ sequence, diffCount }))
    .sort(
      (a, b) =>
        b.diffCount - a.diffCount ||
        (a.sequence === b.sequence ? 0 : a.sequence < b.sequence ? -1 : 1)
    );
  return topN < 0 ? ranked : ranked.slice(0, topN);
}

/**
 * File-name-safe form of a sequence
 */
export function reportFileName(rank: number, sequence: string): string {
  const safe = sequence.replace(/[^A-Za-z0-9._-]/g, "_").slice(0, 120);
  return `rawdiff_${rank}_${safe}.report.txt`;
}

interface LoadedLog {
  readonly lines: string[];
  readonly events: TraceEvent[];
}

/**
 * Read a log once and keep its lines beside the events, so matching lines can
 * be quoted verbatim
 */
async function loadLog(
  path: string,
  defaultMode: ExecutionMode,
  caseSensitive: boolean
): Promise<LoadedLog> {
  await requireInput(path, "trace log");
  const lines = await readLines(path);
  return { lines, events: new TraceScanner({ defaultMode, caseSensitive }).scanLines(lines) };
}

/**
 * Rank differing sequences and write one candidate report per sequence plus
 * a TSV summary
 *
 * Sequences neither log mentions, as a candidate or on any other
 * candidate-bearing line, get no report.
 *
 * @throws {ValidationError} When the configuration is malformed
 * @throws {MissingInputError} When a table or log does not exist
 */
export async function runRawDiff(config: RawDiffConfig): Promise<RawDiffResult> {
  const validation = RawDiffConfigSchema(config);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid raw-diff configuration: ${validation.summary}`);
  }
  const caseSensitive = config.caseSensitive ?? RUNNER_DEFAULTS.caseSensitive;
  const topN = config.topN ?? RUNNER_DEFAULTS.topN;
  const maxSamples = config.maxSamples ?? RUNNER_DEFAULTS.maxSamples;

  const parser = new HitTableParser({ caseSensitive });
  const tableDiff = multisetDiff(
    await parser.parseFile(config.wholeReferenceTable),
    await parser.parseFile(config.chunkedTable),
    hitKey
  );
  const wholeReferenceLog = await loadLog(
    config.wholeReferenceLog,
    ExecutionMode.WHOLE_REFERENCE,
    caseSensitive
  );
  const chunkedLog = await loadLog(config.chunkedLog, ExecutionMode.CHUNKED, caseSensitive);
  const events = [...wholeReferenceLog.events, ...chunkedLog.events];

  const reports: SequenceReport[] = [];
  const ranked = rankDifferingSequences(tableDiff, topN);
  for (const [position, { sequence, diffCount }] of ranked.entries()) {
    const mentions = (fields: CandidateFields): boolean => fields.sequence.includes(sequence);
    const partition = partitionCandidates(events, mentions);
    const trace = {
      wholeReference: matchingTraceLines(wholeReferenceLog.events, wholeReferenceLog.lines, mentions),
      chunked: matchingTraceLines(chunkedLog.events, chunkedLog.lines, mentions),
    };
    if (
      partition.wholeReference.length === 0 &&
      partition.chunked.length === 0 &&
      trace.wholeReference.length === 0 &&
      trace.chunked.length === 0
    ) {
      continue;
    }

    const candidateDiff = multisetDiff(partition.chunked, partition.wholeReference, candidateKey);
    const rank = position + 1;
    const report = {
      rank,
      sequence,
      diffCount,
      wholeReferenceTotal: partition.wholeReference.length,
      chunkedTotal: partition.chunked.length,
      chunkedOnly: candidateDiff.leftOnly.length,
      wholeReferenceOnly: candidateDiff.rightOnly.length,
      wholeReferenceMatches: trace.wholeReference.length,
      chunkedMatches: trace.chunked.length,
      reportPath: join(config.outDir, reportFileName(rank, sequence)),
    };

    const lines = formatSequenceReport(
      report,
      { chunkedOnly: candidateDiff.leftOnly, wholeReferenceOnly: candidateDiff.rightOnly },
      trace,
      maxSamples
    );
    await writeString(report.reportPath, `${lines.join("\n")}\n`);
    reports.push(report);
  }

  const summaryPath = join(config.outDir, RAW_DIFF_SUMMARY_FILE);
  await new DSVWriter({ delimiter: "\t" }).writeFile(
    summaryPath,
    RAW_DIFF_SUMMARY_COLUMNS,
    rawDiffSummaryRows(reports)
  );

  return { reports, summaryPath, exitCode: ExitCode.OK };
}
