/**
 * @module formats/dsv/constants
 */

export const DEFAULT_DELIMITER = ",";
export const DEFAULT_QUOTE = '"';
export const DEFAULT_ESCAPE = '"';

/**
 * Columns every pipeline hit table must carry; order in the file is free
 */
export const REQUIRED_HIT_COLUMNS = [
  "start",
  "end",
  "length",
  "tetrads",
  "y1",
  "y2",
  "y3",
  "gscore",
  "sequence",
] as const;

export type HitColumn = (typeof REQUIRED_HIT_COLUMNS)[number];
