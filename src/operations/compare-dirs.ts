/**
 * Whole-output comparison of two runs
 *
 * Both runs write one CSV per reference record into their own output
 * directory; every CSV present on both sides is diffed as a multiset.
 */

import { join } from "path";
import { type } from "arktype";
import { ValidationError } from "../errors";
import { HitTableParser } from "../formats/dsv/parser";
import { listDirectory, requireDirectory } from "../io/file-reader";
import { hitKey, multisetDiff } from "./core/multiset";
import { formatListing } from "./report";
import type { CompareDirectoriesConfig, CompareDirectoriesResult, FileComparison } from "./types";
import { ExitCode, RUNNER_DEFAULTS } from "./types";

const CompareDirectoriesConfigSchema = type({
  wholeReferenceDir: "string>0",
  chunkedDir: "string>0",
  "caseSensitive?": "boolean",
});

const CSV_PATTERN = /\.csv(\.gz)?$/;

async function listTables(dir: string): Promise<string[]> {
  await requireDirectory(dir, "output directory");
  return (await listDirectory(dir)).filter((name) => CSV_PATTERN.test(name));
}

/**
 * Compare every hit table the two directories share
 *
 * Fails when a shared table differs or a table exists on one side only.
 *
 * @throws {ValidationError} When the configuration is malformed
 * @throws {MissingInputError} When a directory does not exist
 */
export async function compareDirectories(
  config: CompareDirectoriesConfig
): Promise<CompareDirectoriesResult> {
  const validation = CompareDirectoriesConfigSchema(config);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid directory comparison configuration: ${validation.summary}`);
  }

  const parser = new HitTableParser({
    caseSensitive: config.caseSensitive ?? RUNNER_DEFAULTS.caseSensitive,
  });
  const wholeReferenceFiles = await listTables(config.wholeReferenceDir);
  const chunkedFiles = await listTables(config.chunkedDir);
  const chunkedSet = new Set(chunkedFiles);
  const wholeReferenceSet = new Set(wholeReferenceFiles);

  const compared: FileComparison[] = [];
  for (const file of wholeReferenceFiles.filter((name) => chunkedSet.has(name))) {
    const wholeReferenceHits = await parser.parseFile(join(config.wholeReferenceDir, file));
    const chunkedHits = await parser.parseFile(join(config.chunkedDir, file));
    const diff = multisetDiff(wholeReferenceHits, chunkedHits, hitKey);
    compared.push({
      file,
      wholeReferenceCount: wholeReferenceHits.length,
      chunkedCount: chunkedHits.length,
      wholeReferenceOnly: diff.leftOnly.length,
      chunkedOnly: diff.rightOnly.length,
    });
  }

  const missingFromChunked = wholeReferenceFiles.filter((name) => !chunkedSet.has(name));
  const missingFromWholeReference = chunkedFiles.filter((name) => !wholeReferenceSet.has(name));
  const differing = compared.some((c) => c.wholeReferenceOnly > 0 || c.chunkedOnly > 0);

  return {
    compared,
    missingFromChunked,
    missingFromWholeReference,
    exitCode:
      differing || missingFromChunked.length > 0 || missingFromWholeReference.length > 0
        ? ExitCode.FAILURES
        : ExitCode.OK,
  };
}

/**
 * Console report of a directory comparison
 */
export function formatDirectoryReport(result: CompareDirectoriesResult): string[] {
  const lines = result.compared.map((c) => {
    const status = c.wholeReferenceOnly === 0 && c.chunkedOnly === 0 ? "identical" : "DIFFERENT";
    return (
      `${c.file}: ${status} (whole-reference=${c.wholeReferenceCount}, chunked=${c.chunkedCount}, ` +
      `whole-reference-only=${c.wholeReferenceOnly}, chunked-only=${c.chunkedOnly})`
    );
  });

  const differing = result.compared.filter((c) => c.wholeReferenceOnly > 0 || c.chunkedOnly > 0);
  const missing = (label: string, files: readonly string[]): string[] =>
    files.length === 0
      ? []
      : formatListing(`${label}: ${files.length}`, files, -1, (file) => `  ${file}`);

  return [
    ...lines,
    ...missing("Missing from chunked run", result.missingFromChunked),
    ...missing("Missing from whole-reference run", result.missingFromWholeReference),
    result.exitCode === ExitCode.OK
      ? `All ${result.compared.length} table(s) identical.`
      : `Differences found in ${differing.length} of ${result.compared.length} table(s).`,
  ];
}
