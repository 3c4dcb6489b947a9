/**
 * @module formats/dsv/types
 * @description Type definitions for hit-table parsing and report writing
 */

import type { ParserOptions } from "../../types";

/**
 * CSV parsing states for the RFC 4180 state machine
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * One data row keyed by header column name
 */
export type DSVRecord = Readonly<Record<string, string>>;

/**
 * Hit-table parser options
 */
export interface HitTableParserOptions extends ParserOptions {
  /** Field delimiter (default ",") */
  delimiter?: string;
  /** Keep sequence case as written (default false: lower-case) */
  caseSensitive?: boolean;
}

/**
 * Options accepted by parseHitRow
 */
export interface HitRowOptions {
  caseSensitive?: boolean;
  /** Line number for error messages */
  lineNumber?: number;
}

/**
 * DSV writer options
 */
export interface DSVWriterOptions {
  /** Field delimiter (default ",") */
  delimiter?: string;
  /** Quote character (default '"') */
  quote?: string;
  /** Emit the header row (default true) */
  header?: boolean;
  /** Line terminator (default "\n") */
  lineEnding?: string;
}

export type DSVCell = string | number | boolean | null | undefined;
