import { Context, type Effect } from "effect";
import type { TableReadError } from "../errors/table-read.error.js";
import type { RawTable } from "../table/types.js";

export class TableReader extends Context.Tag("TableReader")<
  TableReader,
  {
    readonly read: (path: string) => Effect.Effect<RawTable, TableReadError>;
  }>
(){}

export type ITableReader = Context.Tag.Service<typeof TableReader>;
