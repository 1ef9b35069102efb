import { Data } from "effect";

export class NoValidDataError extends Data.TaggedError("NoValidData") {
  public override readonly message = 'No valid readings left after parsing timestamps and values.';
}
