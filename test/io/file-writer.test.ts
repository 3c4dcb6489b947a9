/**
 * Tests for atomic file writing with compression support
 */

import { readdirSync, readFileSync } from "fs";
import { gunzipSync } from "fflate";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { readToString } from "../../src/io/file-reader";
import { writeBytes, writeString } from "../../src/io/file-writer";
import { createWorkspace, type TempWorkspace } from "../utils/fixtures";

describe("FileWriter", () => {
  let workspace: TempWorkspace;

  beforeEach(() => {
    workspace = createWorkspace();
  });

  afterEach(() => {
    workspace.cleanup();
  });

  test("should create parent directories and leave no temporary file", async () => {
    const target = workspace.path("out/nested/report.txt");
    await writeString(target, "report\n");

    expect(readFileSync(target, "utf8")).toBe("report\n");
    expect(readdirSync(workspace.path("out/nested"))).toEqual(["report.txt"]);
  });

  test("should replace previous content", async () => {
    const target = workspace.write("report.txt", "old content that is longer");
    await writeString(target, "new");
    expect(readFileSync(target, "utf8")).toBe("new");
  });

  test("should compress .gz targets", async () => {
    const target = workspace.path("chunk_summary.csv.gz");
    await writeString(target, "chunk_offset,count\n0,1\n");

    expect(new TextDecoder().decode(gunzipSync(readFileSync(target)))).toBe(
      "chunk_offset,count\n0,1\n"
    );
    expect(await readToString(target)).toBe("chunk_offset,count\n0,1\n");
  });

  test("should write .gz targets verbatim when autoCompress is off", async () => {
    const target = workspace.path("raw.gz");
    await writeBytes(target, new Uint8Array([1, 2, 3]), { autoCompress: false });
    expect([...readFileSync(target)]).toEqual([1, 2, 3]);
  });

  test("should fail when the parent is missing and creation is disabled", async () => {
    await expect(
      writeString(workspace.path("absent/report.txt"), "x", { createDirectories: false })
    ).rejects.toBeInstanceOf(FileError);
  });
});
