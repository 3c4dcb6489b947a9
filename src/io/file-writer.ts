/**
 * File writing operations using Effect Platform
 *
 * Reports are written atomically: content goes to a temporary sibling file
 * which is then renamed over the target, so a report on disk is always the
 * complete output of the run that produced it.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect, Either } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { CompressionError, FileError } from "../errors";
import type { WriteOptions } from "../types";
import { getPlatform } from "./runtime";

let temporaryCounter = 0;

/**
 * Write string to file, replacing any previous content in one step
 *
 * Compresses when the target ends in `.gz` unless `autoCompress` is false.
 * Missing parent directories are created unless `createDirectories` is false.
 *
 * @throws {FileError} If the file cannot be written
 */
export async function writeString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  await writeBytes(path, new TextEncoder().encode(content), options);
}

/**
 * Write bytes to file atomically
 *
 * @throws {FileError} If the file cannot be written
 */
export async function writeBytes(
  path: string,
  content: Uint8Array,
  options: WriteOptions = {}
): Promise<void> {
  const autoCompress = options.autoCompress ?? true;
  const createDirectories = options.createDirectories ?? true;
  const format = autoCompress ? CompressionDetector.fromExtension(path) : "none";
  temporaryCounter += 1;
  const temporaryPath = `${path}.tmp-${process.pid}-${temporaryCounter}`;

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;
    const compression = yield* CompressionService;

    if (createDirectories) {
      const parentDir = pathService.dirname(path);
      if (!(yield* fs.exists(parentDir))) {
        yield* fs.makeDirectory(parentDir, { recursive: true });
      }
    }

    const data = yield* compression.compress(content, format);
    yield* fs.writeFile(temporaryPath, data);
    yield* fs.rename(temporaryPath, path).pipe(
      Effect.tapError(() => fs.remove(temporaryPath).pipe(Effect.ignore))
    );
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
      : FileError.fromSystemError("write", path, failure);
  }
}

export const FileWriter = {
  writeString,
  writeBytes,
} as const;
