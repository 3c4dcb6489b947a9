/**
 * @module formats/dsv/writer
 * @description CSV/TSV writer for report artifacts
 *
 * RFC 4180 quoting: fields containing the delimiter, the quote character or
 * a line break are quoted, embedded quotes are doubled.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { writeString } from "../../io/file-writer";
import { DEFAULT_DELIMITER, DEFAULT_QUOTE } from "./constants";
import type { DSVCell, DSVWriterOptions } from "./types";

const DSVWriterOptionsSchema = type({
  "delimiter?": "string==1",
  "quote?": "string==1",
  "header?": "boolean",
  "lineEnding?": type.enumerated("\n", "\r\n"),
});

/**
 * DSVWriter - rows of cells → delimited text
 *
 * @example
 * ```typescript
 * const writer = new DSVWriter({ delimiter: "\t" });
 * writer.format(["chunk_offset", "count"], [[4096, 3]]);
 * // "chunk_offset\tcount\n4096\t3\n"
 * ```
 */
export class DSVWriter {
  private readonly delimiter: string;
  private readonly quote: string;
  private readonly header: boolean;
  private readonly lineEnding: string;

  constructor(options: DSVWriterOptions = {}) {
    const validation = DSVWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV writer options: ${validation.summary}`);
    }

    this.delimiter = options.delimiter ?? DEFAULT_DELIMITER;
    this.quote = options.quote ?? DEFAULT_QUOTE;
    this.header = options.header !== false;
    this.lineEnding = options.lineEnding ?? "\n";
  }

  /**
   * Format a single field with proper escaping
   */
  formatField(value: DSVCell): string {
    if (value === null || value === undefined) return "";

    const field = String(value);
    const needsQuoting =
      field.includes(this.delimiter) ||
      field.includes(this.quote) ||
      field.includes("\n") ||
      field.includes("\r");

    if (!needsQuoting) {
      return field;
    }
    return this.quote + field.split(this.quote).join(this.quote + this.quote) + this.quote;
  }

  formatRow(cells: readonly DSVCell[]): string {
    return cells.map((cell) => this.formatField(cell)).join(this.delimiter);
  }

  /**
   * Format a whole table; every line, the last included, ends with the line
   * terminator
   */
  format(columns: readonly string[], rows: Iterable<readonly DSVCell[]>): string {
    const lines: string[] = [];
    if (this.header) {
      lines.push(this.formatRow(columns));
    }
    for (const row of rows) {
      lines.push(this.formatRow(row));
    }
    return lines.map((line) => line + this.lineEnding).join("");
  }

  async writeFile(
    path: string,
    columns: readonly string[],
    rows: Iterable<readonly DSVCell[]>
  ): Promise<void> {
    await writeString(path, this.format(columns, rows));
  }
}
