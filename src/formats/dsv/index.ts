/**
 * @module formats/dsv
 * @description Hit-table parsing and delimited report writing
 *
 * @example
 * ```typescript
 * import { HitTableParser } from './formats/dsv';
 *
 * const hits = await new HitTableParser().parseFile('output/stream/chr2L.csv');
 * ```
 */

export type {
  DSVCell,
  DSVRecord,
  DSVWriterOptions,
  HitRowOptions,
  HitTableParserOptions,
} from "./types";
export { CSVParseState } from "./types";
export { REQUIRED_HIT_COLUMNS, type HitColumn } from "./constants";
export { parseCSVRow } from "./state-machine";
export { HitTableParser, normalizeSequence, parseHitRow, parseStrictInt } from "./parser";
export { DSVWriter } from "./writer";
