/**
 * @module formats/dsv/parser
 * @description Hit-table parser
 *
 * Turns the pipeline's CSV result tables into typed Hit records:
 * - header row located by name, column order free
 * - strict base-10 integers (no silent coercion)
 * - sequence trimmed and lower-cased unless case-sensitive
 * - blank lines skipped; a header-only table yields zero records
 */

import { type } from "arktype";
import { MissingColumnError, ParseError, ValidationError } from "../../errors";
import { readToString, requireInput } from "../../io/file-reader";
import type { Hit } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { DEFAULT_DELIMITER, REQUIRED_HIT_COLUMNS } from "./constants";
import { parseCSVRow } from "./state-machine";
import type { DSVRecord, HitRowOptions, HitTableParserOptions } from "./types";

const INTEGER_PATTERN = /^[+-]?\d+$/;

const HitTableParserOptionsSchema = type({
  "delimiter?": "string==1",
  "caseSensitive?": "boolean",
  "maxLineLength?": "number>0",
});

/**
 * Parse a base-10 integer field, rejecting anything that is not one
 *
 * @throws {ParseError} Naming the column and offending text
 */
export function parseStrictInt(text: string, column: string, lineNumber?: number): number {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new ParseError(`Column '${column}' is not an integer: "${text}"`, "DSV", lineNumber);
  }
  const value = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value)) {
    throw new ParseError(`Column '${column}' is out of range: "${text}"`, "DSV", lineNumber);
  }
  return value;
}

/**
 * Normalize a sequence field the way every comparison expects it
 */
export function normalizeSequence(sequence: string, caseSensitive = false): string {
  const trimmed = sequence.trim();
  return caseSensitive ? trimmed : trimmed.toLowerCase();
}

function requireColumn(row: DSVRecord, column: string, lineNumber?: number): string {
  const value = row[column];
  if (value === undefined) {
    throw new MissingColumnError(column, Object.keys(row), lineNumber);
  }
  return value;
}

/**
 * Build a Hit from one row keyed by column name
 *
 * @throws {MissingColumnError} When a required column is absent from the row
 * @throws {ParseError} When a numeric column is not a base-10 integer
 *
 * @example
 * ```typescript
 * parseHitRow({ start: "10", end: "13", length: "3", tetrads: "2", y1: "1",
 *   y2: "1", y3: "1", gscore: "19", sequence: " GGG " });
 * // { start: 10, end: 13, ..., score: 19, sequence: "ggg" }
 * ```
 */
export function parseHitRow(row: DSVRecord, options: HitRowOptions = {}): Hit {
  const { lineNumber } = options;
  const int = (column: string): number =>
    parseStrictInt(requireColumn(row, column, lineNumber), column, lineNumber);

  return {
    start: int("start"),
    end: int("end"),
    length: int("length"),
    tetrads: int("tetrads"),
    y1: int("y1"),
    y2: int("y2"),
    y3: int("y3"),
    score: int("gscore"),
    sequence: normalizeSequence(requireColumn(row, "sequence", lineNumber), options.caseSensitive),
  };
}

/**
 * HitTableParser - pipeline result table → Hit[]
 *
 * Missing header columns are fatal and thrown directly. Row-level problems
 * go through `onError` (default: throw ParseError); with a non-throwing
 * handler the offending row is skipped. A reported length that disagrees with
 * `end - start` is a warning only.
 *
 * @example
 * ```typescript
 * const parser = new HitTableParser({ caseSensitive: false });
 * const hits = await parser.parseFile("output/mmap/chr2L.csv");
 * ```
 */
export class HitTableParser extends AbstractParser<Hit, HitTableParserOptions> {
  protected getDefaultOptions(): Partial<HitTableParserOptions> {
    return {
      delimiter: DEFAULT_DELIMITER,
      caseSensitive: false,
    };
  }

  constructor(options: HitTableParserOptions = {}) {
    const { delimiter, caseSensitive, maxLineLength } = options;
    const validationResult = HitTableParserOptionsSchema({
      ...(delimiter !== undefined && { delimiter }),
      ...(caseSensitive !== undefined && { caseSensitive }),
      ...(maxLineLength !== undefined && { maxLineLength }),
    });
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid hit table options: ${validationResult.summary}`);
    }
    super(options);
  }

  protected getFormatName(): string {
    return "DSV";
  }

  /**
   * @throws {MissingInputError} When the file does not exist
   * @throws {MissingColumnError} When the header lacks a required column
   */
  async parseFile(filePath: string): Promise<Hit[]> {
    await requireInput(filePath, "hit table");
    return this.parseString(await readToString(filePath));
  }

  parseString(data: string): Hit[] {
    const lines = data.split(/\r?\n/);
    const delimiter = this.options.delimiter ?? DEFAULT_DELIMITER;
    const hits: Hit[] = [];
    let header: string[] | null = null;

    for (let i = 0; i < lines.length; i++) {
      const lineNumber = i + 1;
      const line = lines[i] ?? "";
      if (i % 4096 === 0) this.checkAborted("hit table parsing");
      if (line.trim() === "" || this.exceedsLineLength(line, lineNumber)) continue;

      if (header === null) {
        header = this.parseHeader(line, delimiter, lineNumber);
        continue;
      }

      const hit = this.parseRow(line, header, delimiter, lineNumber);
      if (hit !== undefined) {
        hits.push(hit);
      }
    }

    return hits;
  }

  private parseHeader(line: string, delimiter: string, lineNumber: number): string[] {
    const header = parseCSVRow(line, delimiter, lineNumber).map((name) =>
      name.trim().replace(/^\uFEFF/, "")
    );
    for (const column of REQUIRED_HIT_COLUMNS) {
      if (!header.includes(column)) {
        throw new MissingColumnError(column, header, lineNumber);
      }
    }
    return header;
  }

  private parseRow(
    line: string,
    header: readonly string[],
    delimiter: string,
    lineNumber: number
  ): Hit | undefined {
    try {
      const fields = parseCSVRow(line, delimiter, lineNumber);
      const row: Record<string, string> = {};
      header.forEach((column, index) => {
        const value = fields[index];
        if (value !== undefined) {
          row[column] = value;
        }
      });

      const hit = parseHitRow(row, {
        lineNumber,
        caseSensitive: this.options.caseSensitive ?? false,
      });
      if (hit.length !== hit.end - hit.start) {
        this.options.onWarning(
          `length ${hit.length} disagrees with end - start = ${hit.end - hit.start}`,
          lineNumber
        );
      }
      return hit;
    } catch (error) {
      this.options.onError(error instanceof Error ? error.message : String(error), lineNumber);
      return undefined;
    }
  }
}
