/**
 * Gzip compression for hit tables, logs and reports
 *
 * Inputs are loaded whole, so buffer-based fflate calls are all that is
 * needed.
 */

import { gunzipSync, gzipSync } from 'fflate';
import { CompressionError } from '../errors';

export interface GzipOptions {
  /** Compression level 0-9 (default 6) */
  level?: number;
}

const LEVELS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9] as const;

function toLevel(level: number): (typeof LEVELS)[number] {
  return LEVELS[Math.round(level)] ?? 6;
}

/**
 * Decompress a complete gzip member (or concatenated members)
 *
 * @throws {CompressionError} On invalid or truncated input
 */
export function decompress(compressed: Uint8Array): Uint8Array {
  if (compressed.length === 0) {
    throw new CompressionError('Compressed data must not be empty', 'gzip', 'decompress');
  }
  if (compressed[0] !== 0x1f || compressed[1] !== 0x8b) {
    throw new CompressionError(
      'Invalid gzip magic bytes - file may not be gzip compressed',
      'gzip',
      'decompress'
    );
  }

  try {
    return gunzipSync(compressed);
  } catch (err) {
    throw CompressionError.fromSystemError('gzip', 'decompress', err);
  }
}

export function compress(data: Uint8Array, options: GzipOptions = {}): Uint8Array {
  try {
    return gzipSync(data, { level: toLevel(options.level ?? 6) });
  } catch (err) {
    throw CompressionError.fromSystemError('gzip', 'compress', err);
  }
}
