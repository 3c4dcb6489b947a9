/**
 * Nearest-preceding chunk lookup
 *
 * A chunked-mode event is attributed to the most recently announced chunk
 * before it in the same log. This is a lookup by log position, not by
 * reference offset.
 *
 * @module operations/core/chunk-locator
 */

import type { ChunkEvent } from "../../types";

/**
 * Chunk with the greatest `logPosition <= index`
 *
 * @param chunks - Announcements of one log, ordered by `logPosition`
 * @returns The chunk, or `undefined` when the event precedes every chunk
 *
 * @example
 * ```typescript
 * // chunks announced at lines 5, 20, 40
 * locateChunk(chunks, 25)?.logPosition; // 20
 * locateChunk(chunks, 3);               // undefined
 * ```
 */
export function locateChunk(chunks: readonly ChunkEvent[], index: number): ChunkEvent | undefined {
  let low = 0;
  let high = chunks.length - 1;
  let found: ChunkEvent | undefined;

  while (low <= high) {
    const mid = (low + high) >>> 1;
    const chunk = chunks[mid];
    if (chunk === undefined) break;
    if (chunk.logPosition <= index) {
      found = chunk;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  return found;
}

/**
 * Identity of a chunk in summaries
 */
export function chunkKey(chunk: Pick<ChunkEvent, "offset" | "length">): string {
  return `${chunk.offset}:${chunk.length}`;
}
