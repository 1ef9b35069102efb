export const HOURS_PER_DAY = 24;

export const HOURS_OF_DAY: readonly number[] = Array.from({ length: HOURS_PER_DAY }, (_, hour) => hour);

/**
 * Exactly 24 slots, index = hour of day. `undefined` is a data gap and must
 * never be read as zero load.
 */
export type HourlyProfile = readonly (number | undefined)[];

export type HourlyPeak = {
  readonly hour: number;
  readonly maxPowerKw: number;
};
