import { Effect, type Either } from "effect";
import type { AnalysisConfig } from "./analysis-config.js";
import { evaluateCapacity } from "./capacity/capacity-evaluator.js";
import type { CapacityEvaluation } from "./capacity/types.js";
import { optimizeChargerMix } from "./charger-mix/charger-mix-optimizer.js";
import type { ChargerMixRow } from "./charger-mix/types.js";
import type { NoValidDataError } from "./errors/no-valid-data.error.js";
import type { StructuralError } from "./errors/structural.error.js";
import { classifyTable, type LayoutHint, type TableShape } from "./normalizer/shape-classifier.js";
import { normalizeTall } from "./normalizer/tall.normalizer.js";
import type { DataQualityWarning, NormalizedReadings } from "./normalizer/types.js";
import { normalizeWide } from "./normalizer/wide.normalizer.js";
import { aggregateHourlyMax } from "./profile/hourly-aggregator.js";
import type { HourlyProfile } from "./profile/types.js";
import type { RawTable } from "./table/types.js";

export type AnalysisResult = {
  readonly shape: TableShape;
  readonly intervalHours: number | null;
  readonly readingCount: number;
  readonly profile: HourlyProfile;
  readonly evaluation: CapacityEvaluation;
  readonly chargerMix: readonly ChargerMixRow[];
  readonly warnings: readonly DataQualityWarning[];
};

export type AnalysisError = StructuralError | NoValidDataError;

export const normalizeTable = (
  input: RawTable,
  layout: LayoutHint = "auto"
): { readonly shape: TableShape; readonly normalized: Either.Either<NormalizedReadings, StructuralError> } => {
  const { table, shape } = classifyTable(input, layout);

  return {
    shape,
    normalized: shape === "wide" ? normalizeWide(table) : normalizeTall(table),
  };
};

/**
 * Full run for one table: classify, normalize, aggregate, evaluate, mix.
 * Depends on nothing but its arguments.
 */
export const analyzeTable = (
  input: RawTable,
  config: AnalysisConfig
): Effect.Effect<AnalysisResult, AnalysisError> =>
  Effect.gen(function* () {
    const { shape, normalized } = normalizeTable(input, config.layout);
    const { readings, intervalHours, warnings } = yield* normalized;

    yield* Effect.logDebug("Table normalized", {
      shape,
      intervalHours,
      readings: readings.length,
    });

    const profile = yield* aggregateHourlyMax(readings);
    const evaluation = evaluateCapacity(profile, config);
    const chargerMix = config.candidateMixSizes.length > 0
      ? optimizeChargerMix(evaluation.rows, config.candidateMixSizes)
      : [];

    return {
      shape,
      intervalHours,
      readingCount: readings.length,
      profile,
      evaluation,
      chargerMix,
      warnings,
    };
  }).pipe(Effect.withSpan("analyzeTable"));
