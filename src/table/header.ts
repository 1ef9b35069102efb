import { Option } from "effect";
import { cellText, containsToken } from "./cells.js";
import type { RawTable, Row } from "./types.js";

export const HEADER_SCAN_LIMIT = 5;

export const isHeaderCandidate = (row: Row): boolean =>
  row.some((cell) => containsToken(cell, "date")) &&
  row.some((cell) => containsToken(cell, ":"));

/**
 * Index of the first row among the first few data rows that looks like the
 * real header of an interval export: a "date" cell next to time-of-day cells.
 */
export const locateHeaderRow = (
  table: RawTable,
  limit: number = HEADER_SCAN_LIMIT
): Option.Option<number> => {
  const scanned = table.rows.slice(0, limit);
  const index = scanned.findIndex(isHeaderCandidate);

  return index === -1 ? Option.none() : Option.some(index);
};

export const promoteHeaderRow = (table: RawTable, index: number): RawTable => {
  const header = table.rows[index];

  if (header === undefined) {
    return table;
  }

  return {
    columns: header.map(cellText),
    rows: table.rows.slice(index + 1),
  };
};

export const resolveHeader = (table: RawTable): RawTable =>
  Option.match(locateHeaderRow(table), {
    onNone: () => table,
    onSome: (index) => promoteHeaderRow(table, index),
  });
