/**
 * motif-reconcile - differential reconciliation of motif detection runs
 *
 * Compares the hit tables a detection pipeline writes in whole-reference and
 * chunked modes, validates differing hits against the reference, and traces
 * each difference back to the chunk that produced or suppressed it.
 */

// Compression infrastructure
export { CompressionDetector, CompressionService } from "./compression";
// Error types
export {
  CompressionError,
  ConfigurationError,
  DSVParseError,
  FileError,
  isConfigurationFailure,
  MissingColumnError,
  MissingInputError,
  ParseError,
  ReconcileError,
  ReferenceNotFoundError,
  ValidationError,
} from "./errors";
// Hit tables
export {
  DSVWriter,
  HitTableParser,
  normalizeSequence,
  parseHitRow,
  parseStrictInt,
  REQUIRED_HIT_COLUMNS,
} from "./formats/dsv";
// Reference FASTA
export {
  FastaParser,
  loadReferenceMap,
  requireReference,
  toReferenceMap,
  type ReferenceRecord,
} from "./formats/fasta";
// Trace logs
export * from "./formats/trace";
// File I/O infrastructure
export { FileReader } from "./io/file-reader";
export { FileWriter } from "./io/file-writer";
// Reconciliation
export * from "./operations";
// Core types
export type {
  Candidate,
  CandidateFields,
  ChunkEvent,
  CompressionFormat,
  DiffEntry,
  Hit,
  ParserOptions,
  ReferenceMap,
} from "./types";
export { ExecutionMode } from "./types";
