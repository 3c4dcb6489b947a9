/**
 * Compression format detection for pipeline inputs
 *
 * Hit tables and trace logs are frequently archived as `.gz`; detection by
 * extension decides what the writer does, magic bytes decide what the reader
 * does.
 */

import { CompressionError } from '../errors';
import type { CompressionFormat } from '../types';

const GZIP_MAGIC = new Uint8Array([0x1f, 0x8b]);

const GZIP_EXTENSIONS = ['.gz', '.gzip'] as const;

/**
 * Compression format detector
 *
 * @example
 * ```typescript
 * CompressionDetector.fromExtension('run.log.gz'); // 'gzip'
 * CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08])); // 'gzip'
 * ```
 */
export class CompressionDetector {
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError('File path must not be empty', 'none', 'detect');
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, '/');
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? 'gzip' : 'none';
  }

  static fromMagicBytes(bytes: Uint8Array): CompressionFormat {
    if (bytes.length < GZIP_MAGIC.length) {
      return 'none';
    }
    return GZIP_MAGIC.every((byte, index) => bytes[index] === byte) ? 'gzip' : 'none';
  }

  /**
   * Magic bytes win over the extension; a `.gz` name on plain text is
   * treated as plain text.
   */
  static detect(filePath: string, bytes: Uint8Array): CompressionFormat {
    const fromBytes = CompressionDetector.fromMagicBytes(bytes);
    if (fromBytes !== 'none') {
      return fromBytes;
    }
    return bytes.length === 0 ? CompressionDetector.fromExtension(filePath) : 'none';
  }
}
