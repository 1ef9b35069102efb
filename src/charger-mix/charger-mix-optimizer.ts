import type { ChargerMixAllocation, ChargerMixRow } from "./types.js";

// The fill is greedy, so it must never be presented as an optimum.
export const CHARGER_MIX_LABEL = "Approximate charger mix (greedy, largest rating first)";

export const sortRatingsDescending = (ratings: readonly number[]): readonly number[] =>
  [...new Set(ratings.filter((rating) => rating > 0))].sort((a, b) => b - a);

/**
 * Single largest-first pass. Ratings {5, 4} on 8 kW take one 5 and leave 3,
 * where two 4s would leave nothing.
 */
export const allocateGreedy = (
  excessKw: number,
  ratings: readonly number[]
): ChargerMixAllocation => {
  const sorted = sortRatingsDescending(ratings);

  if (excessKw < 0) {
    return {
      counts: sorted.map((ratingKw) => ({ ratingKw, count: 0 })),
      usedKw: 0,
      remainingKw: excessKw,
    };
  }

  let remaining = excessKw;

  const counts = sorted.map((ratingKw) => {
    let count = Math.floor(remaining / ratingKw);

    // The quotient can round up past what actually fits.
    while (count > 0 && count * ratingKw > remaining) {
      count -= 1;
    }

    remaining -= count * ratingKw;
    return { ratingKw, count };
  });

  return {
    counts,
    usedKw: excessKw - remaining,
    remainingKw: remaining,
  };
};

export const optimizeChargerMix = (
  hours: readonly { readonly hour: number; readonly excessKw: number }[],
  ratings: readonly number[]
): readonly ChargerMixRow[] =>
  hours.map(({ hour, excessKw }) => ({
    hour,
    excessKw,
    ...allocateGreedy(excessKw, ratings),
  }));
