/**
 * File reading utilities for hit tables, references and trace logs
 *
 * Inputs are bounded diagnostic files, so every read loads the whole file.
 * Gzip-compressed inputs are decompressed transparently.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Either } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { CompressionError, FileError, MissingInputError } from "../errors";
import type { FilePath, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { getPlatform } from "./runtime";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  maxFileSize: 2_147_483_648, // 2GB, roughly the largest string V8 will build
  autoDecompress: true,
  compressionFormat: "none",
};

/**
 * Check if a regular file exists at the path
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Check if a directory exists at the path
 */
export async function isDirectory(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "Directory";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get file size in bytes
 *
 * @throws {FileError} If file cannot be accessed or doesn't exist
 */
export async function getSize(path: string): Promise<number> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    return Number(info.size);
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Fail with a configuration error unless a regular file exists at the path
 *
 * @param path File that the run cannot proceed without
 * @param role What the file is, for the message ("hit table", "trace log", ...)
 * @throws {MissingInputError}
 */
export async function requireInput(path: string, role: string): Promise<void> {
  if (!(await exists(path))) {
    throw new MissingInputError(role, path);
  }
}

/**
 * Fail with a configuration error unless a directory exists at the path
 *
 * @throws {MissingInputError}
 */
export async function requireDirectory(path: string, role: string): Promise<void> {
  if (!(await isDirectory(path))) {
    throw new MissingInputError(role, path);
  }
}

/**
 * Read an entire file, decompressing gzip content when detected
 *
 * @throws {FileError} If the file cannot be read or is too large
 * @throws {CompressionError} If compressed content is corrupt
 */
export async function readBytes(path: string, options: FileReaderOptions = {}): Promise<Uint8Array> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);
  await validateFileSize(validatedPath, mergedOptions);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const raw = yield* fs.readFile(validatedPath);
    if (!mergedOptions.autoDecompress) {
      return raw;
    }

    const format =
      mergedOptions.compressionFormat !== "none"
        ? mergedOptions.compressionFormat
        : CompressionDetector.detect(validatedPath, raw);
    if (format === "none" || raw.length === 0) {
      return raw;
    }

    const compression = yield* CompressionService;
    return yield* compression.decompress(raw, format);
  });

  const result = await Effect.runPromise(
    Effect.either(
      program.pipe(Effect.provide(CompressionService.Live), Effect.provide(getPlatform()))
    )
  );
  if (Either.isLeft(result)) {
    const failure = result.left;
    throw failure instanceof CompressionError
      ? failure
      : FileError.fromSystemError("read", validatedPath, failure);
  }
  return result.right;
}

/**
 * Read entire file to string
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const bytes = await readBytes(path, options);
  return new TextDecoder("utf-8").decode(bytes);
}

/**
 * Read a text file as lines
 *
 * A trailing newline does not produce a final empty line; CRLF endings are
 * accepted.
 */
export async function readLines(path: string, options: FileReaderOptions = {}): Promise<string[]> {
  return splitLines(await readToString(path, options));
}

/**
 * Split text into lines the way `readLines` does
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * List the entry names of a directory, sorted
 *
 * @throws {FileError} If the directory cannot be read
 */
export async function listDirectory(path: string): Promise<string[]> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readDirectory(validatedPath);
  });

  try {
    const entries = await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
    return [...entries].sort();
  } catch (error) {
    throw FileError.fromSystemError("list", validatedPath, error);
  }
}

export const FileReader = {
  exists,
  isDirectory,
  getSize,
  requireInput,
  requireDirectory,
  readBytes,
  readToString,
  readLines,
  listDirectory,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Validate file path using ArkType and return branded type
 */
function validatePath(path: string): FilePath {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return { ...DEFAULT_OPTIONS, ...validationResult };
}

async function validateFileSize(
  validatedPath: FilePath,
  mergedOptions: Required<FileReaderOptions>
): Promise<number> {
  const fileSize = await getSize(validatedPath);
  if (fileSize > mergedOptions.maxFileSize) {
    throw new FileError(
      `File too large: ${fileSize} bytes exceeds limit of ${mergedOptions.maxFileSize} bytes`,
      validatedPath,
      "read"
    );
  }
  return fileSize;
}
