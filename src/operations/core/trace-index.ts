/**
 * Per-log index of reported hits
 *
 * Built once per log so each unmatched record is looked up in constant time
 * instead of rescanning the log.
 *
 * @module operations/core/trace-index
 */

import type { HitTraceEvent, TraceEvent } from "../../formats/trace/types";
import { hitEvents } from "../../formats/trace/scanner";

export interface TraceIndex {
  /** `start:end:sequence` → events in log order */
  readonly byExact: ReadonlyMap<string, readonly HitTraceEvent[]>;
  /** `sequence` → events in log order */
  readonly bySequence: ReadonlyMap<string, readonly HitTraceEvent[]>;
}

export type MatchKind = "exact" | "sequence" | "none";

export interface TraceLookup {
  readonly matchKind: MatchKind;
  readonly events: readonly HitTraceEvent[];
}

function exactKey(start: number, end: number, sequence: string): string {
  return `${start}:${end}:${sequence}`;
}

function append<V>(map: Map<string, V[]>, key: string, value: V): void {
  const bucket = map.get(key);
  if (bucket === undefined) {
    map.set(key, [value]);
  } else {
    bucket.push(value);
  }
}

/**
 * Index the `MergedHit` and `StreamHit` events of one log
 */
export function buildTraceIndex(events: Iterable<TraceEvent>): TraceIndex {
  const byExact = new Map<string, HitTraceEvent[]>();
  const bySequence = new Map<string, HitTraceEvent[]>();

  for (const event of hitEvents(events)) {
    const { start, end, sequence } = event.fields;
    append(byExact, exactKey(start, end, sequence), event);
    append(bySequence, sequence, event);
  }

  return { byExact, bySequence };
}

/**
 * Events reporting a record: exact position match first, then any event with
 * the same sequence
 */
export function lookupRecord(
  index: TraceIndex,
  record: { readonly start: number; readonly end: number; readonly sequence: string }
): TraceLookup {
  const exact = index.byExact.get(exactKey(record.start, record.end, record.sequence));
  if (exact !== undefined && exact.length > 0) {
    return { matchKind: "exact", events: exact };
  }
  const bySequence = index.bySequence.get(record.sequence);
  if (bySequence !== undefined && bySequence.length > 0) {
    return { matchKind: "sequence", events: bySequence };
  }
  return { matchKind: "none", events: [] };
}
