/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Hit tables and reference FASTA files share the option contract
 * (`onError`, `onWarning`, `maxLineLength`, `signal`) while each format keeps
 * its own parsing logic.
 */

import { ParseError } from "../errors";
import type { ParserOptions } from "../types";

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces (Hit, ReferenceRecord)
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions & Required<ParserOptions>;

  constructor(options: TOptions) {
    const baseDefaults: Required<Omit<ParserOptions, "signal">> = {
      maxLineLength: 1_000_000_000,
      onError: (error: string, lineNumber?: number): void => {
        throw new ParseError(error, this.getFormatName(), lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    // Merge in order: base -> format-specific -> user options
    this.options = {
      signal: new AbortController().signal,
      ...baseDefaults,
      ...this.getDefaultOptions(),
      ...options,
    };
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Throw if the caller aborted; call this in parsing loops
   */
  protected checkAborted(context: string): void {
    if (this.options.signal.aborted) {
      throw new ParseError(`Operation aborted during ${this.getFormatName()} ${context}`, "ABORTED");
    }
  }

  /**
   * Report a line longer than `maxLineLength`; returns true when the line
   * must be skipped
   */
  protected exceedsLineLength(line: string, lineNumber: number): boolean {
    if (line.length <= this.options.maxLineLength) {
      return false;
    }
    this.options.onError(
      `Line too long (${line.length} > ${this.options.maxLineLength})`,
      lineNumber
    );
    return true;
  }

  /**
   * Parse records from an in-memory string
   */
  abstract parseString(data: string): T[];

  /**
   * Parse records from a file (gzip handled transparently)
   */
  abstract parseFile(filePath: string): Promise<T[]>;

  /**
   * Format name for error messages and logging (e.g. "FASTA", "DSV")
   */
  protected abstract getFormatName(): string;
}
