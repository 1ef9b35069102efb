import type { AllocationStrategy } from "../analysis-config.js";

export type ChargerAllocation = {
  readonly level2Count: number;
  readonly level3Count: number;
  readonly committedLoadKw: number; // load the fixed strategy commits up front
};

export type EvaluationRow = ChargerAllocation & {
  readonly hour: number;
  readonly maxPowerKw: number;
  readonly capacityKw: number;
  readonly excessKw: number; // negative means the hour is already overloaded
  readonly customLoadKw: number;
  readonly totalLoadKw: number;
  readonly exceedsCapacity: boolean;
};

export type CapacityEvaluation = {
  readonly strategy: AllocationStrategy;
  readonly capacityKw: number;
  readonly customLoadActive: boolean;
  readonly customLoadKw: number;
  readonly rows: readonly EvaluationRow[];
  readonly overloadHours: readonly number[];
  readonly fitsWithinCapacity: boolean;
};
