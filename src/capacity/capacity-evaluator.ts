import type { AnalysisConfig, ChargerSpec } from "../analysis-config.js";
import { definedHours } from "../profile/hourly-aggregator.js";
import type { HourlyProfile } from "../profile/types.js";
import type { CapacityEvaluation, ChargerAllocation, EvaluationRow } from "./types.js";

export type CapacityParams = Pick<
  AnalysisConfig,
  "capacityKw" | "level2Kw" | "level3Kw" | "allocationStrategy" | "fixedCount" | "customChargers"
>;

/** Undefined hours stay undefined. */
export const computeExcess = (
  profile: HourlyProfile,
  capacityKw: number
): readonly (number | undefined)[] =>
  profile.map((maxPowerKw) => (maxPowerKw === undefined ? undefined : capacityKw - maxPowerKw));

export const activeChargers = (chargers: readonly ChargerSpec[]): readonly ChargerSpec[] =>
  chargers.filter((charger) => charger.quantity > 0);

export const customLoadKw = (chargers: readonly ChargerSpec[]): number =>
  activeChargers(chargers).reduce((sum, charger) => sum + charger.powerKw * charger.quantity, 0);

const unitsFitting = (headroomKw: number, unitKw: number): number =>
  Math.floor(Math.max(0, headroomKw) / unitKw);

/**
 * Level 2 / Level 3 counts for one hour of headroom. Under `auto` both counts
 * are computed against the full excess and are not jointly deployable.
 */
export const allocateChargers = (
  excessKw: number,
  params: Pick<CapacityParams, "level2Kw" | "level3Kw" | "allocationStrategy" | "fixedCount">
): ChargerAllocation => {
  const { level2Kw, level3Kw, fixedCount } = params;

  switch (params.allocationStrategy) {
    case "auto":
      return {
        level2Count: unitsFitting(excessKw, level2Kw),
        level3Count: unitsFitting(excessKw, level3Kw),
        committedLoadKw: 0,
      };
    case "fixed_l3": {
      const committedLoadKw = fixedCount * level3Kw;
      return {
        level3Count: fixedCount,
        level2Count: unitsFitting(excessKw - committedLoadKw, level2Kw),
        committedLoadKw,
      };
    }
    case "fixed_l2": {
      const committedLoadKw = fixedCount * level2Kw;
      return {
        level2Count: fixedCount,
        level3Count: unitsFitting(excessKw - committedLoadKw, level3Kw),
        committedLoadKw,
      };
    }
  }
};

export const evaluateCapacity = (
  profile: HourlyProfile,
  params: CapacityParams
): CapacityEvaluation => {
  const { capacityKw } = params;
  const customLoadActive = activeChargers(params.customChargers).length > 0;
  const customKw = customLoadKw(params.customChargers);

  const rows = definedHours(profile).map(({ hour, maxPowerKw }): EvaluationRow => {
    const excessKw = capacityKw - maxPowerKw;
    const allocation = allocateChargers(excessKw, params);
    const totalLoadKw = maxPowerKw + customKw + allocation.committedLoadKw;

    return {
      hour,
      maxPowerKw,
      capacityKw,
      excessKw,
      ...allocation,
      customLoadKw: customKw,
      totalLoadKw,
      exceedsCapacity: totalLoadKw > capacityKw,
    };
  });

  const overloadHours = rows.filter((row) => row.exceedsCapacity).map((row) => row.hour);

  return {
    strategy: params.allocationStrategy,
    capacityKw,
    customLoadActive,
    customLoadKw: customKw,
    rows,
    overloadHours,
    fitsWithinCapacity: overloadHours.length === 0,
  };
};
