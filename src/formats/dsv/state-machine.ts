/**
 * CSV State Machine Module
 *
 * RFC 4180 row splitting: quoted fields, doubled quotes, empty fields.
 * Hit tables never carry multi-line fields, so rows are single lines.
 */

import { DSVParseError } from "../../errors";
import { DEFAULT_DELIMITER, DEFAULT_ESCAPE, DEFAULT_QUOTE } from "./constants";
import { CSVParseState } from "./types";

/**
 * Parse one CSV row into fields
 *
 * @param line - CSV line to parse
 * @param delimiter - Field delimiter
 * @param lineNumber - For error messages
 * @throws {DSVParseError} On an unclosed quoted field
 */
export function parseCSVRow(
  line: string,
  delimiter: string = DEFAULT_DELIMITER,
  lineNumber?: number,
  quote: string = DEFAULT_QUOTE,
  escapeChar: string = DEFAULT_ESCAPE
): string[] {
  const fields: string[] = [];
  let currentField = "";
  let state = CSVParseState.FIELD_START;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);
    const nextChar = line.charAt(i + 1);

    switch (state) {
      case CSVParseState.FIELD_START:
        if (char === quote) {
          state = CSVParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          currentField = char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;

      case CSVParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTED_FIELD:
        if (char === quote) {
          if (escapeChar === quote && nextChar === quote) {
            // Escaped quote (doubled)
            currentField += quote;
            i++;
          } else {
            state = CSVParseState.QUOTE_IN_QUOTED;
          }
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          // Characters after a closing quote: lenient, keep them
          currentField += char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  if (state === CSVParseState.QUOTED_FIELD) {
    throw new DSVParseError("Unclosed quote in CSV field", lineNumber, fields.length + 1);
  } else if (state === CSVParseState.UNQUOTED_FIELD || state === CSVParseState.QUOTE_IN_QUOTED) {
    fields.push(currentField);
  } else if (line.endsWith(delimiter)) {
    // Trailing delimiter means empty final field
    fields.push("");
  }

  return fields;
}
