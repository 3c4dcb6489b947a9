/**
 * Table-vs-table comparison with reference validation
 *
 * Diffs two hit tables as multisets and validates every differing hit
 * against the reference, whether or not it makes the printed listing.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { HitTableParser } from "../formats/dsv/parser";
import { loadReferenceMap, requireReference } from "../formats/fasta";
import { hitKey, multisetDiff } from "./core/multiset";
import { formatCompareReport } from "./report";
import type { CompareConfig, CompareResult } from "./types";
import { ExitCode, RUNNER_DEFAULTS } from "./types";
import { validateHits } from "./validate";

const CompareConfigSchema = type({
  left: "string>0",
  right: "string>0",
  reference: "string>0",
  referenceName: "string>0",
  "reportLimit?": "number.integer",
  "caseSensitive?": "boolean",
});

/**
 * @throws {ValidationError} When the configuration is malformed
 */
export function validateCompareConfig(config: CompareConfig): void {
  const result = CompareConfigSchema(config);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid compare configuration: ${result.summary}`);
  }
}

/**
 * Compare two hit tables and validate the differences
 *
 * @throws {MissingInputError} When a table or the FASTA does not exist
 * @throws {ReferenceNotFoundError} When `referenceName` is not in the FASTA
 * @throws {MissingColumnError} When a table lacks a required column
 *
 * @example
 * ```typescript
 * const result = await compareHitTables({
 *   left: "output/mmap/chr2L.csv",
 *   right: "output/stream/chr2L.csv",
 *   reference: "dm6.fa",
 *   referenceName: "chr2L",
 * });
 * process.exitCode = result.exitCode;
 * ```
 */
export async function compareHitTables(config: CompareConfig): Promise<CompareResult> {
  validateCompareConfig(config);
  const caseSensitive = config.caseSensitive ?? RUNNER_DEFAULTS.caseSensitive;

  const parser = new HitTableParser({ caseSensitive });
  const leftHits = await parser.parseFile(config.left);
  const rightHits = await parser.parseFile(config.right);
  const reference = requireReference(
    await loadReferenceMap(config.reference),
    config.referenceName
  );

  const diff = multisetDiff(leftHits, rightHits, hitKey);
  const leftOnly = validateHits(diff.leftOnly, reference, { caseSensitive });
  const rightOnly = validateHits(diff.rightOnly, reference, { caseSensitive });
  const failures = leftOnly.failures + rightOnly.failures;

  return {
    leftPath: config.left,
    rightPath: config.right,
    leftCount: leftHits.length,
    rightCount: rightHits.length,
    leftOnly: leftOnly.results,
    rightOnly: rightOnly.results,
    failures,
    exitCode: failures > 0 ? ExitCode.FAILURES : ExitCode.OK,
  };
}

/**
 * Compare and format the console report
 */
export async function runCompare(
  config: CompareConfig
): Promise<{ result: CompareResult; lines: string[] }> {
  const result = await compareHitTables(config);
  const lines = formatCompareReport(result, config.reportLimit ?? RUNNER_DEFAULTS.reportLimit);
  return { result, lines };
}
