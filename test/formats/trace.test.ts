/**
 * Trace log grammar and scanning
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { MissingInputError } from "../../src/errors";
import {
  classifyLine,
  detectLineMode,
  extractChunks,
  hitEvents,
  matchingTraceLines,
  parseExecutionMode,
  partitionCandidates,
  scanLog,
  scanLogFile,
} from "../../src/formats/trace";
import { writeString } from "../../src/io/file-writer";
import { candidateKey, multisetDiff } from "../../src/operations/core/multiset";
import { createWorkspace, type TempWorkspace } from "../utils/fixtures";

describe("classifyLine", () => {
  test("parses a tagged raw candidate", () => {
    expect(
      classifyLine("[STREAM] DEBUG RAW_G4: start=10 end=25 gscore=19 seq=GGGAGGGAGGGAGGG", 7)
    ).toEqual({
      kind: "RawCandidate",
      lineIndex: 7,
      mode: "chunked",
      fields: { start: 10, end: 25, score: 19, sequence: "gggagggagggaggg" },
    });
  });

  test("parses a merged hit with its offset and falls back to the default mode", () => {
    const line = "DEBUG MERGED_G4 (offset=4096): start=5000 end=5015 gscore=30 seq=gggagggagggaggg";
    expect(classifyLine(line, 0, { defaultMode: "whole-reference" })).toEqual({
      kind: "MergedHit",
      lineIndex: 0,
      mode: "whole-reference",
      fields: { start: 5000, end: 5015, score: 30, sequence: "gggagggagggaggg" },
      offset: 4096,
    });
  });

  test("leaves mode and offset out when the line carries neither", () => {
    expect(classifyLine("DEBUG MERGED_G4: start=1 end=2 gscore=3 seq=g", 4)).toEqual({
      kind: "MergedHit",
      lineIndex: 4,
      fields: { start: 1, end: 2, score: 3, sequence: "g" },
    });
  });

  test("stream hits and chunks are chunked without a tag", () => {
    const hit = classifyLine("DEBUG STREAM_HIT (offset=0): start=1 end=2 gscore=3 seq=g", 1);
    expect(hit?.kind === "StreamHit" && hit.mode).toBe("chunked");

    expect(
      classifyLine('DEBUG STREAM_CHUNK (offset=8192, len=4096): contains target; snippet="ggga"', 3)
    ).toEqual({
      kind: "ChunkBoundary",
      lineIndex: 3,
      mode: "chunked",
      chunk: { logPosition: 3, offset: 8192, length: 4096, snippet: "ggga" },
    });
  });

  test("parses a family line with its id", () => {
    const event = classifyLine(
      "DEBUG FAMILY (id=3): start=1 end=16 gscore=20 seq=gggagggagggaggg",
      0
    );
    expect(event?.kind === "FamilyGroup" && event.familyId).toBe(3);
  });

  test("recovers fields from a line that does not follow the exact layout", () => {
    expect(classifyLine("RAW_G4 mode=mmap seq=GGG, start=4 end=7 score=12", 0)).toEqual({
      kind: "RawCandidate",
      lineIndex: 0,
      mode: "whole-reference",
      fields: { start: 4, end: 7, score: 12, sequence: "ggg" },
    });
  });

  test("drops a marker line whose fields cannot be recovered", () => {
    expect(classifyLine("DEBUG RAW_G4: garbage", 0)).toBeUndefined();
  });

  test("reports a line without a marker as unrecognized", () => {
    expect(classifyLine("INFO starting", 2)).toEqual({
      kind: "Unrecognized",
      lineIndex: 2,
      text: "INFO starting",
    });
  });

  test("keeps sequence case when case-sensitive", () => {
    const event = classifyLine("DEBUG RAW_G4: start=1 end=4 gscore=3 seq=GgG", 0, {
      caseSensitive: true,
    });
    expect(event?.kind === "RawCandidate" && event.fields.sequence).toBe("GgG");
  });
});

describe("mode vocabulary", () => {
  test("maps the pipeline's names", () => {
    expect(parseExecutionMode("MMAP")).toBe("whole-reference");
    expect(parseExecutionMode("stream")).toBe("chunked");
    expect(parseExecutionMode("chunked")).toBe("chunked");
    expect(parseExecutionMode("bogus")).toBeUndefined();
  });

  test("detects prefix, field and token tags", () => {
    expect(detectLineMode("[MMAP] DEBUG RAW_G4")).toBe("whole-reference");
    expect(detectLineMode("RAW_G4 mode=chunked")).toBe("chunked");
    expect(detectLineMode("STREAM pass: RAW_G4")).toBe("chunked");
    expect(detectLineMode("DEBUG STREAM_HIT")).toBeUndefined();
    expect(detectLineMode("DEBUG RAW_G4")).toBeUndefined();
  });
});

const MIXED_LOG = [
  "[MMAP] DEBUG RAW_G4: start=1 end=16 gscore=20 seq=gggagggagggaggg",
  "INFO chunk loop",
  '[STREAM] DEBUG STREAM_CHUNK (offset=0, len=100): contains target; snippet="ggga"',
  "[STREAM] DEBUG RAW_G4: start=1 end=16 gscore=20 seq=gggagggagggaggg",
  "[STREAM] DEBUG RAW_G4: start=40 end=55 gscore=18 seq=gggtgggtgggtggg",
  "DEBUG RAW_G4: start=70 end=85 gscore=18 seq=gggcgggcgggcggg",
  "[STREAM] DEBUG STREAM_HIT (offset=0): start=40 end=55 gscore=18 seq=gggtgggtgggtggg",
  "DEBUG RAW_G4: broken",
].join("\n");

describe("scanLog", () => {
  test("keeps only recognized events", () => {
    expect(scanLog(MIXED_LOG).map((event) => event.lineIndex)).toEqual([0, 2, 3, 4, 5, 6]);
  });

  test("partitions raw candidates by mode, leaving untagged ones out", () => {
    const { wholeReference, chunked } = partitionCandidates(scanLog(MIXED_LOG));

    expect(wholeReference).toEqual([
      {
        start: 1,
        end: 16,
        score: 20,
        sequence: "gggagggagggaggg",
        mode: "whole-reference",
        lineIndex: 0,
      },
    ]);
    expect(chunked.map((candidate) => candidate.lineIndex)).toEqual([3, 4]);
  });

  test("a default mode claims untagged lines", () => {
    const { wholeReference } = partitionCandidates(
      scanLog(MIXED_LOG, { defaultMode: "whole-reference" })
    );
    expect(wholeReference.map((candidate) => candidate.lineIndex)).toEqual([0, 5]);
  });

  test("filters candidates by their fields", () => {
    const { wholeReference, chunked } = partitionCandidates(scanLog(MIXED_LOG), (fields) =>
      fields.sequence.includes("gggt")
    );
    expect(wholeReference).toEqual([]);
    expect(chunked.map((candidate) => candidate.lineIndex)).toEqual([4]);
  });

  test("mode partitions diff to the candidates only one mode produced", () => {
    const { wholeReference, chunked } = partitionCandidates(scanLog(MIXED_LOG));
    const diff = multisetDiff(chunked, wholeReference, candidateKey);

    expect(diff.leftOnly.map((candidate) => candidate.lineIndex)).toEqual([4]);
    expect(diff.rightOnly).toEqual([]);
  });

  test("extracts chunks and reported hits", () => {
    const events = scanLog(MIXED_LOG);
    expect(extractChunks(events)).toEqual([
      { logPosition: 2, offset: 0, length: 100, snippet: "ggga" },
    ]);
    expect(hitEvents(events).map((event) => [event.kind, event.lineIndex])).toEqual([
      ["StreamHit", 6],
    ]);
  });
});

describe("scanLogFile", () => {
  let workspace: TempWorkspace;

  beforeEach(() => {
    workspace = createWorkspace();
  });

  afterEach(() => {
    workspace.cleanup();
  });

  test("reads a gzip-compressed log", async () => {
    const path = workspace.path("run.log.gz");
    await writeString(path, `${MIXED_LOG}\n`);

    const events = await scanLogFile(path, { defaultMode: "chunked" });

    expect(events.map((event) => event.lineIndex)).toEqual([0, 2, 3, 4, 5, 6]);
  });

  test("a missing log is a configuration error", async () => {
    const path = workspace.path("absent.log");
    await expect(scanLogFile(path)).rejects.toThrow(MissingInputError);
    await expect(scanLogFile(path)).rejects.toThrow(`Missing trace log input: ${path}`);
  });
});

describe("stream markers", () => {
  test("stay chunked under a whole-reference tag", () => {
    const hit = classifyLine("[MMAP] DEBUG STREAM_HIT (offset=0): start=1 end=2 gscore=3 seq=g", 0);
    const chunk = classifyLine('[MMAP] DEBUG STREAM_CHUNK (offset=0, len=10): snippet="g"', 1, {
      defaultMode: "whole-reference",
    });
    expect(hit?.kind === "StreamHit" && hit.mode).toBe("chunked");
    expect(chunk?.kind === "ChunkBoundary" && chunk.mode).toBe("chunked");
  });
});

describe("maxLineLength", () => {
  test("drops over-long lines and keeps scanning", () => {
    const log = [
      `DEBUG RAW_G4: start=1 end=2 gscore=3 seq=${"g".repeat(50)}`,
      "DEBUG RAW_G4: start=4 end=7 gscore=9 seq=ggg",
    ].join("\n");

    expect(scanLog(log, { maxLineLength: 60 })).toEqual([
      {
        kind: "RawCandidate",
        lineIndex: 1,
        fields: { start: 4, end: 7, score: 9, sequence: "ggg" },
      },
    ]);
  });
});

describe("matchingTraceLines", () => {
  test("quotes every candidate-bearing line that passes the filter", () => {
    const lines = [
      'DEBUG STREAM_CHUNK (offset=0, len=64): snippet="gggt"',
      "DEBUG RAW_G4: start=1 end=16 gscore=20 seq=gggagggagggaggg",
      "DEBUG FAMILY (id=3): start=1 end=16 gscore=20 seq=gggagggagggaggg",
      "DEBUG MERGED_G4: start=30 end=39 gscore=12 seq=gggttaggg",
      "DEBUG STREAM_HIT (offset=0): start=1 end=16 gscore=20 seq=gggagggagggaggg",
    ];
    const events = scanLog(lines.join("\n"));

    expect(
      matchingTraceLines(events, lines, (fields) => fields.sequence.includes("gaggg"))
    ).toEqual([
      { lineIndex: 1, marker: "RAW_G4", text: lines[1] },
      { lineIndex: 2, marker: "FAMILY", text: lines[2] },
      { lineIndex: 4, marker: "STREAM_HIT", text: lines[4] },
    ]);
  });
});
