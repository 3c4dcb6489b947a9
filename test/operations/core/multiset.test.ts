/**
 * Duplicate-aware multiset diff
 */

import { describe, expect, test } from "vitest";
import {
  candidateKey,
  collapseEntries,
  hitKey,
  multisetDiff,
} from "../../../src/operations/core/multiset";
import type { Candidate, Hit } from "../../../src/types";
import { makeHit } from "../../utils/fixtures";

const x = makeHit(100, 130, "gggttaggg");
const y = makeHit(200, 215, "gggagggagggaggg");
const z = makeHit(50, 65, "gggcgggcgggcggg");

describe("multisetDiff", () => {
  test("a collection diffed against itself is empty on both sides", () => {
    const diff = multisetDiff([x, y, x, z], [x, y, x, z], hitKey);
    expect(diff.leftOnly).toEqual([]);
    expect(diff.rightOnly).toEqual([]);
    expect(diff.common).toEqual([z, x, x, y]);
  });

  test("surplus copies of a value land in the difference", () => {
    const diff = multisetDiff([x, x, y], [x], hitKey);
    expect(diff.leftOnly).toEqual([x, y]);
    expect(diff.rightOnly).toEqual([]);
    expect(diff.common).toEqual([x]);
  });

  test("difference and intersection partition each input", () => {
    const left = [y, x, z, x, x];
    const right = [x, z, z, makeHit(1, 4, "ggg")];
    const diff = multisetDiff(left, right, hitKey);

    const keys = (hits: readonly Hit[]): string[] => hits.map(hitKey).sort();
    expect(keys([...diff.leftOnly, ...diff.common])).toEqual(keys(left));
    expect(keys([...diff.rightOnly, ...diff.common])).toEqual(keys(right));
  });

  test("output is ordered by start, end and sequence regardless of input order", () => {
    const a = makeHit(10, 20, "ccc");
    const b = makeHit(10, 20, "aaa");
    const c = makeHit(10, 15, "zzz");
    const d = makeHit(5, 40, "ggg");

    expect(multisetDiff([a, b, c, d], [], hitKey).leftOnly).toEqual([d, c, b, a]);
  });

  test("records equal in position and sequence are ordered by their full key", () => {
    const high = makeHit(1, 4, "ggg", { score: 10 });
    const low = makeHit(1, 4, "ggg", { score: 9 });

    // "...,10,ggg" sorts before "...,9,ggg"
    expect(multisetDiff([low, high], [], hitKey).leftOnly).toEqual([high, low]);
  });

  test("every field takes part in identity", () => {
    const diff = multisetDiff([x], [{ ...x, tetrads: 3 }], hitKey);
    expect(diff.leftOnly).toEqual([x]);
    expect(diff.rightOnly).toEqual([{ ...x, tetrads: 3 }]);
  });
});

describe("collapseEntries", () => {
  test("counts repeats in first-occurrence order", () => {
    expect(collapseEntries([x, y, x], hitKey)).toEqual([
      { record: x, multiplicity: 2 },
      { record: y, multiplicity: 1 },
    ]);
  });
});

describe("candidateKey", () => {
  test("ignores mode and log position", () => {
    const fields = { start: 1, end: 16, score: 20, sequence: "gggagggagggaggg" };
    const whole: Candidate = { ...fields, mode: "whole-reference", lineIndex: 3 };
    const chunked: Candidate = { ...fields, mode: "chunked", lineIndex: 90 };
    expect(candidateKey(whole)).toBe(candidateKey(chunked));
  });
});
