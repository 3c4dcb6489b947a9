/**
 * Chunk correlation of unmatched records
 */

import { readFileSync } from "fs";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { MissingInputError } from "../../src/errors";
import { extractChunks, scanLog } from "../../src/formats/trace";
import { hitKey, multisetDiff } from "../../src/operations/core/multiset";
import { buildTraceIndex } from "../../src/operations/core/trace-index";
import {
  correlateDifferences,
  correlateRecord,
  runCorrelate,
  summarizeChunks,
} from "../../src/operations/correlate";
import type { Hit } from "../../src/types";
import { createWorkspace, hitTableCsv, makeHit, type TempWorkspace } from "../utils/fixtures";

const CHUNKED_LOG = [
  "DEBUG STREAM_HIT (offset=0): start=10 end=25 gscore=19 seq=gggagggagggaggg",
  'DEBUG STREAM_CHUNK (offset=0, len=1000): snippet="aaaa"',
  "DEBUG STREAM_HIT (offset=0): start=100 end=130 gscore=19 seq=gggttaggg",
  'DEBUG STREAM_CHUNK (offset=900, len=1000): contains target; snippet="cccc"',
  "DEBUG MERGED_G4 (offset=900): start=950 end=959 gscore=19 seq=gggttaggg",
  "DEBUG MERGED_G4: start=300 end=315 gscore=19 seq=gggcgggcgggcggg",
  "DEBUG MERGED_G4: start=320 end=335 gscore=19 seq=gggcgggcgggcggg",
  "",
].join("\n");

const A = makeHit(100, 130, "gggttaggg");
const B = makeHit(500, 509, "gggttaggg");
const C = makeHit(10, 25, "gggagggagggaggg");
const D = makeHit(700, 715, "gggtgggtgggtggg");
const E = makeHit(300, 315, "gggcgggcgggcggg");
const G = makeHit(1000, 1015, "gggcgggcgggcggg");

describe("correlateRecord", () => {
  const events = scanLog(CHUNKED_LOG, { defaultMode: "chunked" });
  const index = buildTraceIndex(events);
  const chunks = extractChunks(events);
  const correlate = (hit: Hit, multiplicity = 1) =>
    correlateRecord({ record: hit, multiplicity }, index, chunks);

  test("an exact match inside a chunk is resolved", () => {
    const result = correlate(A);
    expect(result.status).toBe("resolved");
    expect(result.matchKind).toBe("exact");
    expect(result.matches.map((m) => m.event.lineIndex)).toEqual([2]);
    expect(result.chunks).toEqual([{ logPosition: 1, offset: 0, length: 1000, snippet: "aaaa" }]);
  });

  test("sequence matches in different chunks are ambiguous", () => {
    const result = correlate(B);
    expect(result.status).toBe("ambiguous_chunk");
    expect(result.matchKind).toBe("sequence");
    expect(result.chunks.map((chunk) => chunk.offset)).toEqual([0, 900]);
  });

  test("a match logged before any chunk is unresolved", () => {
    const result = correlate(C);
    expect(result.status).toBe("unresolved");
    expect(result.matches).toHaveLength(1);
    expect(result.matches[0]?.chunk).toBeUndefined();
    expect(result.chunks).toEqual([]);
  });

  test("a record nobody logged is not found", () => {
    expect(correlate(D)).toEqual({
      entry: { record: D, multiplicity: 1 },
      matchKind: "none",
      matches: [],
      chunks: [],
      status: "not_found",
    });
  });

  test("several matches in one chunk stay resolved and are all kept", () => {
    const result = correlate(G);
    expect(result.status).toBe("resolved");
    expect(result.matches.map((m) => m.event.lineIndex)).toEqual([5, 6]);
    expect(result.chunks.map((chunk) => chunk.offset)).toEqual([900]);
  });

  test("an exact match wins over sequence matches", () => {
    const result = correlate(E);
    expect(result.matchKind).toBe("exact");
    expect(result.matches.map((m) => m.event.lineIndex)).toEqual([5]);
  });
});

describe("summarizeChunks", () => {
  test("counts by multiplicity and orders by count, then offset", () => {
    const events = scanLog(CHUNKED_LOG, { defaultMode: "chunked" });
    const diff = multisetDiff([A, B], [E, E, C], hitKey);
    const correlations = correlateDifferences(diff, events);

    expect(correlations.chunkedOnly.map((c) => [c.entry.record.start, c.entry.multiplicity])).toEqual([
      [10, 1],
      [300, 2],
    ]);
    expect(correlations.wholeReferenceOnly.map((c) => c.status)).toEqual([
      "resolved",
      "ambiguous_chunk",
    ]);

    // E x2 and B -> 900; A and B -> 0; C has no chunk
    expect(
      summarizeChunks([...correlations.chunkedOnly, ...correlations.wholeReferenceOnly])
    ).toEqual([
      { offset: 900, length: 1000, snippet: "cccc", count: 3 },
      { offset: 0, length: 1000, snippet: "aaaa", count: 2 },
    ]);
  });

  test("equal counts are ordered by offset", () => {
    const events = scanLog(CHUNKED_LOG, { defaultMode: "chunked" });
    const diff = multisetDiff([], [E, A], hitKey);
    const { chunkedOnly } = correlateDifferences(diff, events);

    expect(summarizeChunks(chunkedOnly).map((tally) => tally.offset)).toEqual([0, 900]);
  });
});

describe("runCorrelate", () => {
  let workspace: TempWorkspace;

  beforeEach(() => {
    workspace = createWorkspace();
  });

  afterEach(() => {
    workspace.cleanup();
  });

  test("writes the report, mapping and summary", async () => {
    const result = await runCorrelate({
      wholeReferenceTable: workspace.write("mmap/chr1.csv", hitTableCsv([A, C])),
      chunkedTable: workspace.write("stream/chr1.csv", hitTableCsv([C, E, E])),
      chunkedLog: workspace.write("stream.log", CHUNKED_LOG),
      outDir: workspace.path("out"),
    });

    expect(result.exitCode).toBe(0);
    expect(readFileSync(result.summaryPath, "utf8")).toBe(
      "chunk_offset,chunk_length,count,snippet\n900,1000,2,cccc\n0,1000,1,aaaa\n"
    );

    const mapping = readFileSync(result.mappingPath, "utf8").split("\n");
    expect(mapping[0]).toBe(
      "direction,start,end,length,tetrads,y1,y2,y3,gscore,sequence,multiplicity,status," +
        "match_kind,match_count,chunk_offsets,chunk_lengths,chunk_snippets,log_positions"
    );
    expect(mapping.slice(1)).toEqual([
      "chunked-only,300,315,15,2,1,1,1,19,gggcgggcgggcggg,2,resolved,exact,1,900,1000,cccc,5",
      "whole-reference-only,100,130,30,2,1,1,1,19,gggttaggg,1,resolved,exact,1,0,1000,aaaa,2",
      "",
    ]);

    expect(readFileSync(result.reportPath, "utf8")).toBe(
      [
        "chunked-only: 2 row(s), 1 distinct",
        "  start=   300 end=   315 len= 15 gscore=19 seq=gggcgggcgggcggg count=2 status=resolved chunks=900+1000",
        "  status: resolved=2 ambiguous_chunk=0 unresolved=0 not_found=0",
        "",
        "whole-reference-only: 1 row(s), 1 distinct",
        "  start=   100 end=   130 len= 30 gscore=19 seq=gggttaggg count=1 status=resolved chunks=0+1000",
        "  status: resolved=1 ambiguous_chunk=0 unresolved=0 not_found=0",
        "",
        "chunks: 2",
        "  offset=900 len=1000 count=2",
        "  offset=0 len=1000 count=1",
        "",
      ].join("\n")
    );
  });

  test("identical tables give empty sections and a header-only summary", async () => {
    const table = hitTableCsv([A]);
    const result = await runCorrelate({
      wholeReferenceTable: workspace.write("a.csv", table),
      chunkedTable: workspace.write("b.csv", table),
      chunkedLog: workspace.write("stream.log", ""),
      outDir: workspace.path("out"),
    });

    expect(result.summary).toEqual([]);
    expect(readFileSync(result.summaryPath, "utf8")).toBe("chunk_offset,chunk_length,count,snippet\n");
  });

  test("a missing log is a configuration failure", async () => {
    await expect(
      runCorrelate({
        wholeReferenceTable: workspace.write("a.csv", hitTableCsv([A])),
        chunkedTable: workspace.write("b.csv", hitTableCsv([])),
        chunkedLog: workspace.path("missing.log"),
        outDir: workspace.path("out"),
      })
    ).rejects.toBeInstanceOf(MissingInputError);
  });
});
