import { resolveHeader } from "../table/header.js";
import type { RawTable } from "../table/types.js";

export type TableShape = "tall" | "wide";

export type LayoutHint = "auto" | TableShape;

// Fewer time-of-day columns than this is treated as a partial wide table and
// routed to the tall normalizer, which rejects it.
export const WIDE_TIME_COLUMN_THRESHOLD = 20;

export const isTimeOfDayLabel = (label: string): boolean => label.includes(":");

export const countTimeOfDayColumns = (columns: readonly string[]): number =>
  columns.filter(isTimeOfDayLabel).length;

export const classifyShape = (columns: readonly string[]): TableShape => {
  const hasDate = columns.some((label) => label.toLowerCase().includes("date"));

  return hasDate && countTimeOfDayColumns(columns) >= WIDE_TIME_COLUMN_THRESHOLD
    ? "wide"
    : "tall";
};

export type ClassifiedTable = {
  readonly table: RawTable;
  readonly shape: TableShape;
};

/**
 * Promotes an embedded header if one is found and picks the normalizer.
 * Never fails; a forced layout skips the column vote.
 */
export const classifyTable = (
  input: RawTable,
  layout: LayoutHint = "auto"
): ClassifiedTable => {
  const table = resolveHeader(input);

  return {
    table,
    shape: layout === "auto" ? classifyShape(table.columns) : layout,
  };
};
