import { Data } from "effect";

export class TableReadError extends Data.TaggedError("TableReadError")<{
  readonly path: string;
  readonly message: string;
  readonly cause?: unknown;
}> {}
