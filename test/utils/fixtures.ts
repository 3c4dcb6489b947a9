/**
 * Fixtures for reconciliation tests
 *
 * Builds hit records and the files the runners read, under a fresh
 * temporary directory per test.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import type { Hit } from "../../src/types";

export const HIT_TABLE_HEADER = "start,end,length,tetrads,y1,y2,y3,gscore,sequence";

/**
 * Hit with `length = end - start` and fixed structural counts unless overridden
 */
export function makeHit(
  start: number,
  end: number,
  sequence: string,
  overrides: Partial<Hit> = {}
): Hit {
  return {
    start,
    end,
    length: end - start,
    tetrads: 2,
    y1: 1,
    y2: 1,
    y3: 1,
    score: 19,
    sequence,
    ...overrides,
  };
}

export function hitRow(hit: Hit): string {
  return [hit.start, hit.end, hit.length, hit.tetrads, hit.y1, hit.y2, hit.y3, hit.score, hit.sequence].join(",");
}

export function hitTableCsv(hits: readonly Hit[]): string {
  return [HIT_TABLE_HEADER, ...hits.map(hitRow)].map((line) => `${line}\n`).join("");
}

export interface TempWorkspace {
  readonly root: string;
  /** Write a file under the workspace and return its absolute path */
  write(relativePath: string, content: string): string;
  path(relativePath: string): string;
  cleanup(): void;
}

export function createWorkspace(): TempWorkspace {
  const root = mkdtempSync(join(tmpdir(), "motif-reconcile-"));
  return {
    root,
    write(relativePath, content) {
      const target = join(root, relativePath);
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(target, content);
      return target;
    },
    path(relativePath) {
      return join(root, relativePath);
    },
    cleanup() {
      rmSync(root, { recursive: true, force: true });
    },
  };
}
