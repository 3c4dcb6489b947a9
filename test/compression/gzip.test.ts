/**
 * Tests for gzip compression and the compression service
 */

import { Effect, Either } from "effect";
import { gzipSync } from "fflate";
import { describe, expect, test } from "vitest";
import { CompressionService } from "../../src/compression";
import { compress, decompress } from "../../src/compression/gzip";
import { CompressionError } from "../../src/errors";

const LOG_TEXT = new TextEncoder().encode(
  "DEBUG RAW_G4: start=10 end=25 gscore=19 seq=gggagggagggaggg\n"
);

describe("gzip", () => {
  test("should decompress data written by fflate", () => {
    expect(new TextDecoder().decode(decompress(gzipSync(LOG_TEXT)))).toBe(
      "DEBUG RAW_G4: start=10 end=25 gscore=19 seq=gggagggagggaggg\n"
    );
  });

  test("should produce a gzip member", () => {
    const compressed = compress(LOG_TEXT, { level: 9 });
    expect([compressed[0], compressed[1]]).toEqual([0x1f, 0x8b]);
    expect(decompress(compressed)).toEqual(LOG_TEXT);
  });

  test("should reject empty input", () => {
    expect(() => decompress(new Uint8Array(0))).toThrow("Compressed data must not be empty");
  });

  test("should reject data without the gzip header", () => {
    expect(() => decompress(new Uint8Array([0x50, 0x4b, 0x03, 0x04]))).toThrow(
      /Invalid gzip magic bytes/
    );
  });

  test("should reject a truncated member", () => {
    const truncated = gzipSync(LOG_TEXT).slice(0, 12);
    expect(() => decompress(truncated)).toThrow(CompressionError);
  });
});

describe("CompressionService", () => {
  const run = <A>(effect: Effect.Effect<A, CompressionError, CompressionService>) =>
    Effect.runPromise(Effect.either(effect.pipe(Effect.provide(CompressionService.Live))));

  test("should round-trip through the live layer", async () => {
    const result = await run(
      Effect.gen(function* () {
        const service = yield* CompressionService;
        const packed = yield* service.compress(LOG_TEXT, "gzip");
        return yield* service.decompress(packed, "gzip");
      })
    );
    expect(Either.isRight(result) && result.right).toEqual(LOG_TEXT);
  });

  test("should pass data through for format none", async () => {
    const result = await run(
      Effect.gen(function* () {
        const service = yield* CompressionService;
        return yield* service.compress(LOG_TEXT, "none");
      })
    );
    expect(Either.isRight(result) && result.right).toBe(LOG_TEXT);
  });

  test("should fail with CompressionError on corrupt input", async () => {
    const result = await run(
      Effect.gen(function* () {
        const service = yield* CompressionService;
        return yield* service.decompress(new Uint8Array([1, 2, 3]), "gzip");
      })
    );
    expect(Either.isLeft(result) && result.left).toBeInstanceOf(CompressionError);
  });
});
