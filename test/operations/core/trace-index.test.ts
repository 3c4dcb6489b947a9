import { describe, expect, test } from "vitest";
import { scanLog } from "../../../src/formats/trace";
import { buildTraceIndex, lookupRecord } from "../../../src/operations/core/trace-index";

const LOG = [
  'DEBUG STREAM_CHUNK (offset=0, len=1000): contains target; snippet="a"',
  "DEBUG MERGED_G4 (offset=0): start=100 end=130 gscore=19 seq=gggttaggg",
  "DEBUG STREAM_HIT (offset=0): start=200 end=230 gscore=19 seq=gggttaggg",
  "DEBUG RAW_G4: start=100 end=130 gscore=19 seq=gggttaggg",
].join("\n");

describe("buildTraceIndex", () => {
  const index = buildTraceIndex(scanLog(LOG));

  test("indexes merged and stream hits only", () => {
    expect([...index.byExact.keys()]).toEqual(["100:130:gggttaggg", "200:230:gggttaggg"]);
    expect(index.bySequence.get("gggttaggg")?.map((event) => event.lineIndex)).toEqual([1, 2]);
  });

  test("prefers an exact position match", () => {
    const lookup = lookupRecord(index, { start: 100, end: 130, sequence: "gggttaggg" });
    expect(lookup.matchKind).toBe("exact");
    expect(lookup.events.map((event) => event.lineIndex)).toEqual([1]);
  });

  test("falls back to the sequence alone", () => {
    const lookup = lookupRecord(index, { start: 5, end: 14, sequence: "gggttaggg" });
    expect(lookup.matchKind).toBe("sequence");
    expect(lookup.events.map((event) => event.lineIndex)).toEqual([1, 2]);
  });

  test("reports no match when nothing was logged", () => {
    expect(lookupRecord(index, { start: 100, end: 130, sequence: "cccc" })).toEqual({
      matchKind: "none",
      events: [],
    });
  });
});
