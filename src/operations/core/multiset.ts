/**
 * Duplicate-aware multiset operations
 *
 * Records are compared by a string key covering every identifying field, so
 * two rows with identical fields are the same value and accumulate as
 * multiplicity. One pass over each input builds a frequency table; there is
 * no pairwise comparison.
 *
 * @module operations/core/multiset
 */

import type { CandidateFields, DiffEntry, Hit } from "../../types";

/**
 * Anything the differ can order deterministically
 */
export interface PositionedRecord {
  readonly start: number;
  readonly end: number;
  readonly sequence: string;
}

export type RecordKey<T> = (record: T) => string;

/**
 * Both differences and the shared part, each expanded by multiplicity
 */
export interface MultisetDiff<T> {
  /** `left − right`: values left holds more often than right */
  readonly leftOnly: T[];
  /** `right − left` */
  readonly rightOnly: T[];
  /** `min(countLeft, countRight)` copies of every shared value */
  readonly common: T[];
}

/**
 * Identity of a Hit: the full field tuple
 *
 * The sequence comes last so the numeric prefix stays unambiguous.
 */
export function hitKey(hit: Hit): string {
  return `${hit.start},${hit.end},${hit.length},${hit.tetrads},${hit.y1},${hit.y2},${hit.y3},${hit.score},${hit.sequence}`;
}

/**
 * Identity of a Candidate; mode and log position are not part of it
 */
export function candidateKey(candidate: CandidateFields): string {
  return `${candidate.start},${candidate.end},${candidate.score},${candidate.sequence}`;
}

/**
 * Total order: `(start, end, sequence)` ascending, then the full key
 */
export function compareRecords<T extends PositionedRecord>(
  key: RecordKey<T>
): (a: T, b: T) => number {
  return (a: T, b: T): number => {
    if (a.start !== b.start) return a.start - b.start;
    if (a.end !== b.end) return a.end - b.end;
    if (a.sequence !== b.sequence) return a.sequence < b.sequence ? -1 : 1;
    const keyA = key(a);
    const keyB = key(b);
    return keyA === keyB ? 0 : keyA < keyB ? -1 : 1;
  };
}

/**
 * Multiset difference in both directions plus intersection
 *
 * @example
 * ```typescript
 * const { leftOnly, rightOnly } = multisetDiff(mmapHits, streamHits, hitKey);
 * ```
 */
export function multisetDiff<T extends PositionedRecord>(
  left: readonly T[],
  right: readonly T[],
  key: RecordKey<T>
): MultisetDiff<T> {
  const groups = new Map<string, { left: T[]; right: T[] }>();
  const groupOf = (record: T): { left: T[]; right: T[] } => {
    const k = key(record);
    let group = groups.get(k);
    if (group === undefined) {
      group = { left: [], right: [] };
      groups.set(k, group);
    }
    return group;
  };

  for (const record of left) groupOf(record).left.push(record);
  for (const record of right) groupOf(record).right.push(record);

  const leftOnly: T[] = [];
  const rightOnly: T[] = [];
  const common: T[] = [];
  for (const group of groups.values()) {
    const shared = Math.min(group.left.length, group.right.length);
    common.push(...group.left.slice(0, shared));
    leftOnly.push(...group.left.slice(shared));
    rightOnly.push(...group.right.slice(shared));
  }

  const order = compareRecords(key);
  return {
    leftOnly: leftOnly.sort(order),
    rightOnly: rightOnly.sort(order),
    common: common.sort(order),
  };
}

/**
 * Collapse repeated values into entries with a multiplicity
 *
 * Entries keep the order of each value's first occurrence.
 */
export function collapseEntries<T>(records: readonly T[], key: RecordKey<T>): DiffEntry<T>[] {
  const entries = new Map<string, { record: T; multiplicity: number }>();
  for (const record of records) {
    const k = key(record);
    const entry = entries.get(k);
    if (entry === undefined) {
      entries.set(k, { record, multiplicity: 1 });
    } else {
      entry.multiplicity += 1;
    }
  }
  return [...entries.values()];
}
