export type RatingCount = {
  readonly ratingKw: number;
  readonly count: number;
};

export type ChargerMixAllocation = {
  readonly counts: readonly RatingCount[]; // largest rating first
  readonly usedKw: number;
  readonly remainingKw: number;
};

export type ChargerMixRow = ChargerMixAllocation & {
  readonly hour: number;
  readonly excessKw: number;
};
