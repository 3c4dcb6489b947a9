/**
 * Trace-log correlation of unmatched hits
 *
 * Each record one run reports and the other does not is looked up among the
 * hits the chunked run logged, and every match is attributed to the chunk
 * announced most recently before it. Records nobody logged are reported as
 * `not_found`; no cause is guessed.
 */

import { join } from "path";
import { type } from "arktype";
import { ValidationError } from "../errors";
import { HitTableParser } from "../formats/dsv/parser";
import { DSVWriter } from "../formats/dsv/writer";
import { extractChunks, scanLogFile } from "../formats/trace/scanner";
import type { TraceEvent } from "../formats/trace/types";
import { writeString } from "../io/file-writer";
import type { ChunkEvent, DiffEntry, Hit } from "../types";
import { ExecutionMode } from "../types";
import { chunkKey, locateChunk } from "./core/chunk-locator";
import { collapseEntries, hitKey, multisetDiff } from "./core/multiset";
import type { MultisetDiff } from "./core/multiset";
import { buildTraceIndex, lookupRecord } from "./core/trace-index";
import type { TraceIndex } from "./core/trace-index";
import {
  CHUNK_SUMMARY_COLUMNS,
  chunkSummaryRows,
  formatCorrelationReport,
  MAPPING_COLUMNS,
  mappingRows,
} from "./report";
import type {
  ChunkMatch,
  ChunkTally,
  CorrelateConfig,
  CorrelateResult,
  CorrelationStatus,
  DirectionalCorrelations,
  RecordCorrelation,
} from "./types";
import { ExitCode, RUNNER_DEFAULTS } from "./types";

export const CORRELATION_REPORT_FILE = "correlation_report.txt";
export const CHUNK_MAPPING_FILE = "chunk_mapping.csv";
export const CHUNK_SUMMARY_FILE = "chunk_summary.csv";

const CorrelateConfigSchema = type({
  wholeReferenceTable: "string>0",
  chunkedTable: "string>0",
  chunkedLog: "string>0",
  outDir: "string>0",
  "sampleLimit?": "number.integer",
  "caseSensitive?": "boolean",
});

function statusOf(matchCount: number, chunkCount: number): CorrelationStatus {
  if (matchCount === 0) return "not_found";
  if (chunkCount === 0) return "unresolved";
  return chunkCount === 1 ? "resolved" : "ambiguous_chunk";
}

/**
 * Correlate one unmatched record with a log
 *
 * Every matching event is resolved to its own chunk. Chunks are identified
 * by `(offset, length)`; more than one distinct chunk flags the record
 * `ambiguous_chunk`.
 *
 * @param chunks - Chunk announcements of the same log, in log order
 */
export function correlateRecord(
  entry: DiffEntry<Hit>,
  index: TraceIndex,
  chunks: readonly ChunkEvent[]
): RecordCorrelation {
  const { matchKind, events } = lookupRecord(index, entry.record);

  const distinct = new Map<string, ChunkEvent>();
  const matches: ChunkMatch[] = events.map((event) => {
    const chunk = locateChunk(chunks, event.lineIndex);
    if (chunk === undefined) {
      return { event };
    }
    const key = chunkKey(chunk);
    if (!distinct.has(key)) {
      distinct.set(key, chunk);
    }
    return { event, chunk };
  });

  return {
    entry,
    matchKind,
    matches,
    chunks: [...distinct.values()],
    status: statusOf(matches.length, distinct.size),
  };
}

/**
 * Correlate both directions of a whole-reference vs chunked diff against the
 * chunked run's log
 *
 * @param diff - `leftOnly` from the whole-reference run, `rightOnly` from the
 * chunked run
 */
export function correlateDifferences(
  diff: MultisetDiff<Hit>,
  chunkedEvents: readonly TraceEvent[]
): DirectionalCorrelations {
  const index = buildTraceIndex(chunkedEvents);
  const chunks = extractChunks(chunkedEvents);
  const correlate = (records: readonly Hit[]): RecordCorrelation[] =>
    collapseEntries(records, hitKey).map((entry) => correlateRecord(entry, index, chunks));

  return {
    wholeReferenceOnly: correlate(diff.leftOnly),
    chunkedOnly: correlate(diff.rightOnly),
  };
}

/**
 * Tally unmatched records per chunk, by multiplicity
 *
 * An ambiguous record counts once toward each of its chunks. Ordered by
 * count descending, then offset and length ascending.
 */
export function summarizeChunks(correlations: Iterable<RecordCorrelation>): ChunkTally[] {
  const tallies = new Map<string, { offset: number; length: number; snippet: string; count: number }>();

  for (const correlation of correlations) {
    for (const chunk of correlation.chunks) {
      const key = chunkKey(chunk);
      const tally = tallies.get(key);
      if (tally === undefined) {
        tallies.set(key, {
          offset: chunk.offset,
          length: chunk.length,
          snippet: chunk.snippet,
          count: correlation.entry.multiplicity,
        });
      } else {
        tally.count += correlation.entry.multiplicity;
      }
    }
  }

  return [...tallies.values()].sort(
    (a, b) => b.count - a.count || a.offset - b.offset || a.length - b.length
  );
}

/**
 * Diff two runs' tables, correlate the differences with the chunked run's
 * log and write the report artifacts
 *
 * Writes `correlation_report.txt`, `chunk_mapping.csv` and
 * `chunk_summary.csv` under `outDir`, each replaced in one step.
 *
 * @throws {ValidationError} When the configuration is malformed
 * @throws {MissingInputError} When a table or the log does not exist
 */
export async function runCorrelate(config: CorrelateConfig): Promise<CorrelateResult> {
  const validation = CorrelateConfigSchema(config);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid correlate configuration: ${validation.summary}`);
  }
  const caseSensitive = config.caseSensitive ?? RUNNER_DEFAULTS.caseSensitive;
  const sampleLimit = config.sampleLimit ?? RUNNER_DEFAULTS.sampleLimit;

  const parser = new HitTableParser({ caseSensitive });
  const wholeReferenceHits = await parser.parseFile(config.wholeReferenceTable);
  const chunkedHits = await parser.parseFile(config.chunkedTable);
  const events = await scanLogFile(config.chunkedLog, {
    defaultMode: ExecutionMode.CHUNKED,
    caseSensitive,
  });

  const diff = multisetDiff(wholeReferenceHits, chunkedHits, hitKey);
  const correlations = correlateDifferences(diff, events);
  const summary = summarizeChunks([...correlations.chunkedOnly, ...correlations.wholeReferenceOnly]);

  const reportPath = join(config.outDir, CORRELATION_REPORT_FILE);
  const mappingPath = join(config.outDir, CHUNK_MAPPING_FILE);
  const summaryPath = join(config.outDir, CHUNK_SUMMARY_FILE);
  const sections = [
    { direction: "chunked-only", correlations: correlations.chunkedOnly },
    { direction: "whole-reference-only", correlations: correlations.wholeReferenceOnly },
  ] as const;

  const report = formatCorrelationReport(sections, summary, sampleLimit);
  await writeString(reportPath, `${report.join("\n")}\n`);

  const writer = new DSVWriter();
  await writer.writeFile(
    mappingPath,
    MAPPING_COLUMNS,
    sections.flatMap(({ direction, correlations: rows }) => mappingRows(direction, rows))
  );
  await writer.writeFile(summaryPath, CHUNK_SUMMARY_COLUMNS, chunkSummaryRows(summary));

  return {
    correlations,
    summary,
    reportPath,
    mappingPath,
    summaryPath,
    exitCode: ExitCode.OK,
  };
}
