import { Data } from "effect";

/**
 * The table is missing a column or axis the normalizer needs. Recoverable at
 * the call site: skip the file, keep the batch going.
 */
export class StructuralError extends Data.TaggedError("StructuralError")<{
  readonly message: string;
}> {}
