import { Either } from "effect";
import { NoValidDataError } from "../errors/no-valid-data.error.js";
import type { Reading } from "../normalizer/types.js";
import { HOURS_PER_DAY, type HourlyPeak, type HourlyProfile } from "./types.js";

/** Max power per hour of day across every day in the input. */
export const aggregateHourlyMax = (
  readings: readonly Reading[]
): Either.Either<HourlyProfile, NoValidDataError> => {
  if (readings.length === 0) {
    return Either.left(new NoValidDataError());
  }

  const slots = new Array<number | undefined>(HOURS_PER_DAY).fill(undefined);

  for (const { timestamp, powerKw } of readings) {
    const current = slots[timestamp.hour];
    slots[timestamp.hour] = current === undefined ? powerKw : Math.max(current, powerKw);
  }

  return Either.right(slots);
};

export const definedHours = (profile: HourlyProfile): readonly HourlyPeak[] =>
  profile.flatMap((maxPowerKw, hour) => (maxPowerKw === undefined ? [] : [{ hour, maxPowerKw }]));
