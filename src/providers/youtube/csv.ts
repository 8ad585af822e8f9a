/**
 * CSV members of the YouTube export (subscriptions, comments).
 */
import Papa from "papaparse";

import { logger, type Logger } from "../../core/logger.js";
import type { Row } from "../../core/types.js";

/**
 * Parse a CSV with a header row into rows of string cells.
 *
 * Fields beyond the header (papaparse's `__parsed_extra`) are dropped and
 * parse errors are logged.
 */
export function rowsFromCsv(text: string, log: Logger = logger): Row[] {
  const { data, errors } = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header: string) => header.trim(),
  });

  for (const error of errors) {
    log.warn({ code: error.code, row: error.row }, `CSV: ${error.message}`);
  }

  return data.map((record) => {
    const row: Row = {};
    for (const [column, value] of Object.entries(record)) {
      if (typeof value === "string") row[column] = value;
    }
    return row;
  });
}

/**
 * `Watch later.csv` holds a metadata block, a blank line, then the
 * playlist as CSV. Only the part after the first blank line is parsed.
 */
export function rowsFromPlaylistCsv(text: string, log: Logger = logger): Row[] {
  const normalized = text.replace(/\r\n/g, "\n");
  const split = normalized.indexOf("\n\n");
  return rowsFromCsv(split === -1 ? normalized : normalized.slice(split + 2), log);
}
