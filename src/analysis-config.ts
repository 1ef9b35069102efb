import { Effect, Schema } from "effect";
import { InvalidAnalysisConfigError } from "./errors/invalid-analysis-config.error.js";

export const DEFAULT_LEVEL2_KW = 7.2;
export const DEFAULT_LEVEL3_KW = 50;

export const AllocationStrategySchema = Schema.Literal("auto", "fixed_l3", "fixed_l2");

export type AllocationStrategy = Schema.Schema.Type<typeof AllocationStrategySchema>;

export const LayoutHintSchema = Schema.Literal("auto", "tall", "wide");

const PositiveKw = Schema.Number.pipe(Schema.finite(), Schema.positive());
const Count = Schema.Number.pipe(Schema.int(), Schema.nonNegative());

export const ChargerSpecSchema = Schema.Struct({
  name: Schema.String,
  powerKw: PositiveKw,
  quantity: Count,
});

export type ChargerSpec = Schema.Schema.Type<typeof ChargerSpecSchema>;

export const AnalysisConfigSchema = Schema.Struct({
  capacityKw: Schema.Number.pipe(Schema.finite(), Schema.nonNegative()),
  level2Kw: Schema.optionalWith(PositiveKw, { default: () => DEFAULT_LEVEL2_KW }),
  level3Kw: Schema.optionalWith(PositiveKw, { default: () => DEFAULT_LEVEL3_KW }),
  allocationStrategy: Schema.optionalWith(AllocationStrategySchema, { default: () => "auto" as const }),
  // fixed_l3: Level 3 units committed; fixed_l2: Level 2 units committed; ignored by auto
  fixedCount: Schema.optionalWith(Count, { default: () => 0 }),
  candidateMixSizes: Schema.optionalWith(Schema.Array(PositiveKw), { default: () => [] }),
  customChargers: Schema.optionalWith(Schema.Array(ChargerSpecSchema), { default: () => [] }),
  layout: Schema.optionalWith(LayoutHintSchema, { default: () => "auto" as const }),
});

/** Everything one pipeline run depends on besides the table itself. */
export type AnalysisConfig = Schema.Schema.Type<typeof AnalysisConfigSchema>;

export type AnalysisConfigInput = Schema.Schema.Encoded<typeof AnalysisConfigSchema>;

export const decodeAnalysisConfig = (
  input: unknown
): Effect.Effect<AnalysisConfig, InvalidAnalysisConfigError> =>
  Schema.decodeUnknown(AnalysisConfigSchema)(input).pipe(
    Effect.mapError((error) => new InvalidAnalysisConfigError({ message: error.message }))
  );
