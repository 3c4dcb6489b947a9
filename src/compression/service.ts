/**
 * Effect-based compression service shared by the file reader and writer
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const compressor = yield* CompressionService;
 *   return yield* compressor.compress(data, "gzip", 6);
 * });
 * await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 *
 * @module compression/service
 */

import { Context, Effect, Layer } from "effect";
import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";
import { compress as compressGzip, decompress as decompressGzip } from "./gzip";

export interface CompressionServiceShape {
  readonly compress: (
    data: Uint8Array,
    format: CompressionFormat,
    level?: number
  ) => Effect.Effect<Uint8Array, CompressionError>;

  readonly decompress: (
    data: Uint8Array,
    format: CompressionFormat
  ) => Effect.Effect<Uint8Array, CompressionError>;
}

const toCompressionError =
  (operation: "compress" | "decompress") =>
  (error: unknown): CompressionError =>
    error instanceof CompressionError
      ? error
      : CompressionError.fromSystemError("gzip", operation, error);

function createGzipService(): CompressionServiceShape {
  return {
    compress: (data, format, level) =>
      format === "none"
        ? Effect.succeed(data)
        : Effect.try({
            try: () => compressGzip(data, { level: level ?? 6 }),
            catch: toCompressionError("compress"),
          }),

    decompress: (data, format) =>
      format === "none"
        ? Effect.succeed(data)
        : Effect.try({
            try: () => decompressGzip(data),
            catch: toCompressionError("decompress"),
          }),
  };
}

export class CompressionService extends Context.Tag("@motif-reconcile/CompressionService")<
  CompressionService,
  CompressionServiceShape
>() {
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(
    CompressionService,
    createGzipService()
  );
}
