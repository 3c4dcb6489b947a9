/**
 * Compression support for pipeline inputs and report outputs
 */

export { CompressionDetector } from "./detector";
export { compress, decompress, type GzipOptions } from "./gzip";
export { CompressionService, type CompressionServiceShape } from "./service";
