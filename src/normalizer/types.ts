import { Data } from "effect";
import type { DateTime } from "luxon";

export type Reading = {
  readonly timestamp: DateTime; // naive wall-clock
  readonly powerKw: number;
};

/** Non-fatal precision loss; reported next to the result, never as a failure. */
export class DataQualityWarning extends Data.TaggedClass("DataQualityWarning")<{
  readonly message: string;
}> {}

export type NormalizedReadings = {
  readonly readings: readonly Reading[];
  readonly intervalHours: number | null; // null when the layout carries no cadence
  readonly warnings: readonly DataQualityWarning[];
};
