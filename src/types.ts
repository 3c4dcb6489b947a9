/**
 * Core type definitions for hit records, trace candidates and chunks
 *
 * Every record is created by a one-shot parse of a static input file and is
 * never mutated afterwards, so all fields are readonly.
 */

import { type } from "arktype";

/**
 * Execution strategy that produced a record
 *
 * The pipeline's own vocabulary is `mmap` (whole reference mapped at once)
 * and `stream` (reference processed in chunks).
 */
export const ExecutionMode = {
  WHOLE_REFERENCE: "whole-reference",
  CHUNKED: "chunked",
} as const;

export type ExecutionMode = (typeof ExecutionMode)[keyof typeof ExecutionMode];

/**
 * Motif occurrence as reported in a pipeline result table
 * Coordinates are a half-open interval into the reference.
 */
export interface Hit {
  readonly start: number;
  readonly end: number;
  /** Reported length; expected to equal `end - start` */
  readonly length: number;
  readonly tetrads: number;
  readonly y1: number;
  readonly y2: number;
  readonly y3: number;
  /** G-score (column `gscore`) */
  readonly score: number;
  readonly sequence: string;
}

/**
 * Fields common to every hit-like trace event
 */
export interface CandidateFields {
  readonly start: number;
  readonly end: number;
  readonly score: number;
  readonly sequence: string;
}

/**
 * Reduced hit extracted from a trace log, tagged with the mode that emitted it
 */
export interface Candidate extends CandidateFields {
  readonly mode: ExecutionMode;
  /** 0-based index of the originating log line */
  readonly lineIndex: number;
}

/**
 * One chunk-boundary announcement of the chunked strategy
 */
export interface ChunkEvent {
  /** 0-based line index of the announcement within its log */
  readonly logPosition: number;
  /** Offset of the chunk into the reference */
  readonly offset: number;
  readonly length: number;
  /** Short preview of the chunk content */
  readonly snippet: string;
}

/**
 * Reference name → full sequence; read-only for the lifetime of a run
 */
export type ReferenceMap = ReadonlyMap<string, string>;

/**
 * A record plus the multiplicity by which it exceeds the other collection
 */
export interface DiffEntry<T> {
  readonly record: T;
  readonly multiplicity: number;
}

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Lines longer than this are reported through onError */
  maxLineLength?: number;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

export type CompressionFormat = "gzip" | "none";

/**
 * Branded path that passed FilePathSchema
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

export interface FileReaderOptions {
  /** Maximum file size in bytes */
  maxFileSize?: number;
  /** Decompress `.gz` inputs transparently */
  autoDecompress?: boolean;
  /** Force a compression format instead of detecting it */
  compressionFormat?: CompressionFormat;
}

export interface WriteOptions {
  /** Compress based on the target extension (default: true) */
  autoCompress?: boolean;
  /** Create missing parent directories (default: true) */
  createDirectories?: boolean;
}

/**
 * Path validation; brands the string once it is safe to hand to the platform layer
 */
export const FilePathSchema = type("string>0").pipe((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.error("a path without null characters");
  }
  if (/[<>"|*?]/.test(path)) {
    return ctx.error("a path without <, >, \", |, * or ?");
  }
  return path as FilePath;
});

export const FileReaderOptionsSchema = type({
  "maxFileSize?": "number>0",
  "autoDecompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
});
