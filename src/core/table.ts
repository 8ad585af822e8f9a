/**
 * Table helpers shared by the platform extractors and the flow.
 */
import type { Cell, Row, Table, Translatable, VizSpec } from "./types.js";

export function makeTable(opts: {
  name: string;
  title: Translatable;
  rows: Row[];
  description?: Translatable;
  visualizations?: VizSpec[];
}): Table {
  const table: Table = {
    name: opts.name,
    title: opts.title,
    rows: opts.rows,
    visualizations: opts.visualizations ?? [],
  };
  if (opts.description) table.description = opts.description;
  return table;
}

/** Shown for review when a platform yields no tables at all. */
export function makeNoDataTable(platformName: string): Table {
  return makeTable({
    name: `${platformName}_no_data_found`,
    title: {
      en: "Nothing went wrong, but we couldn't find any data in your files",
      nl: "Er ging niks mis, maar we konden geen gegevens in jouw data vinden",
    },
    rows: [{ "No data found": "No data found" }],
  });
}

/** Replace null cells of `column` (missing keys included) with `value`. */
export function fillNull(rows: Row[], column: string, value: Cell): Row[] {
  return rows.map((row) =>
    row[column] == null ? { ...row, [column]: value } : row,
  );
}

/** Split rows into consecutive chunks of at most `size` rows. */
export function chunkRows(rows: Row[], size: number): Row[][] {
  if (size < 1) throw new RangeError(`chunk size must be positive, got ${size}`);
  const chunks: Row[][] = [];
  for (let start = 0; start < rows.length; start += size) {
    chunks.push(rows.slice(start, start + size));
  }
  return chunks;
}
