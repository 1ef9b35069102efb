export type Cell = string | number | boolean | Date | null | undefined;

export type Row = readonly Cell[];

/**
 * A decoded sheet as handed over by a reader. `columns` is whatever the reader
 * took as its header line; the semantic header may still sit in one of the
 * first rows. Rows are not guaranteed to be as wide as `columns`.
 */
export type RawTable = {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
};
