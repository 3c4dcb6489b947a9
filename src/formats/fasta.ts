/**
 * FASTA reference loader
 *
 * Handles the messiness of real-world FASTA files:
 * - Wrapped and unwrapped sequences
 * - Descriptions after the identifier
 * - Comments (`;`) and blank lines
 * - CRLF line endings and gzip compression
 *
 * Records are looked up by identifier, the first whitespace-delimited word
 * after `>`.
 */

import { type } from "arktype";
import { ParseError, ReferenceNotFoundError, ValidationError } from "../errors";
import { readToString, requireInput } from "../io/file-reader";
import type { ParserOptions, ReferenceMap } from "../types";
import { AbstractParser } from "./abstract-parser";

/**
 * One named sequence from a FASTA file
 */
export interface ReferenceRecord {
  readonly id: string;
  readonly description?: string;
  readonly sequence: string;
  readonly length: number;
  /** Line number of the header */
  readonly lineNumber: number;
}

export interface FastaParserOptions extends ParserOptions {}

const FastaParserOptionsSchema = type({
  "maxLineLength?": "number>0",
});

type FastaLine =
  | { isHeader: true; id: string; description: string | undefined }
  | { isHeader: false; sequenceData: string }
  | null;

/**
 * FASTA parser producing reference records
 *
 * @example
 * ```typescript
 * const parser = new FastaParser();
 * const records = parser.parseString(">chr2L\nACGT\nGGGA\n");
 * // [{ id: "chr2L", sequence: "ACGTGGGA", length: 8, lineNumber: 1 }]
 * ```
 */
export class FastaParser extends AbstractParser<ReferenceRecord, FastaParserOptions> {
  protected getDefaultOptions(): Partial<FastaParserOptions> {
    return {};
  }

  constructor(options: FastaParserOptions = {}) {
    const { maxLineLength } = options;
    const validationResult = FastaParserOptionsSchema(
      maxLineLength === undefined ? {} : { maxLineLength }
    );
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid FASTA parser options: ${validationResult.summary}`);
    }
    super(options);
  }

  protected getFormatName(): string {
    return "FASTA";
  }

  parseString(data: string): ReferenceRecord[] {
    return this.parseLines(data.split(/\r?\n/));
  }

  /**
   * @throws {MissingInputError} When the file does not exist
   * @throws {ParseError} When FASTA structure is invalid
   */
  async parseFile(filePath: string): Promise<ReferenceRecord[]> {
    await requireInput(filePath, "reference FASTA");
    return this.parseString(await readToString(filePath));
  }

  private parseLines(lines: string[]): ReferenceRecord[] {
    const records: ReferenceRecord[] = [];
    let current: { id: string; description: string | undefined; lineNumber: number } | null = null;
    let buffer: string[] = [];

    const flush = (): void => {
      if (current === null) return;
      const sequence = buffer.join("");
      records.push({
        id: current.id,
        ...(current.description !== undefined && { description: current.description }),
        sequence,
        length: sequence.length,
        lineNumber: current.lineNumber,
      });
    };

    for (let i = 0; i < lines.length; i++) {
      const lineNumber = i + 1;
      if (i % 4096 === 0) this.checkAborted("reference parsing");

      const processed = this.processLine(lines[i] ?? "", lineNumber);
      if (processed === null) continue;

      if (processed.isHeader) {
        flush();
        current = { id: processed.id, description: processed.description, lineNumber };
        buffer = [];
      } else if (current === null) {
        this.options.onError("Sequence data found before header", lineNumber);
      } else {
        buffer.push(processed.sequenceData);
      }
    }
    flush();

    return records;
  }

  private processLine(line: string, lineNumber: number): FastaLine {
    if (this.exceedsLineLength(line, lineNumber)) {
      return null;
    }

    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith(";")) {
      return null;
    }

    if (trimmed.startsWith(">")) {
      const header = trimmed.slice(1).trim();
      const [id = "", ...rest] = header.split(/\s+/);
      if (id === "") {
        this.options.onError("Empty sequence identifier in header", lineNumber);
        return null;
      }
      const description = rest.join(" ");
      return { isHeader: true, id, description: description === "" ? undefined : description };
    }

    return { isHeader: false, sequenceData: trimmed.replace(/\s+/g, "") };
  }
}

/**
 * Index reference records by identifier
 *
 * @throws {ParseError} When two records share an identifier
 */
export function toReferenceMap(records: readonly ReferenceRecord[]): ReferenceMap {
  const map = new Map<string, string>();
  for (const record of records) {
    if (map.has(record.id)) {
      throw new ParseError(`Duplicate reference name '${record.id}'`, "FASTA", record.lineNumber);
    }
    map.set(record.id, record.sequence);
  }
  return map;
}

/**
 * Load a FASTA file into a ReferenceMap
 */
export async function loadReferenceMap(
  filePath: string,
  options: FastaParserOptions = {}
): Promise<ReferenceMap> {
  const records = await new FastaParser(options).parseFile(filePath);
  return toReferenceMap(records);
}

/**
 * Look up one reference sequence by name
 *
 * @throws {ReferenceNotFoundError} Listing the available names
 */
export function requireReference(references: ReferenceMap, name: string): string {
  const sequence = references.get(name);
  if (sequence === undefined) {
    throw new ReferenceNotFoundError(name, [...references.keys()]);
  }
  return sequence;
}
