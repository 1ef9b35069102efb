import { Config as EffectConfig } from "effect";
import { DEFAULT_LEVEL2_KW, DEFAULT_LEVEL3_KW } from "./analysis-config.js";

export const AppConfig = {
  analysis: {
    capacityKw: EffectConfig.number("CAPACITY_KW").pipe(EffectConfig.withDefault(100)),
    level2Kw: EffectConfig.number("LEVEL2_KW").pipe(EffectConfig.withDefault(DEFAULT_LEVEL2_KW)),
    level3Kw: EffectConfig.number("LEVEL3_KW").pipe(EffectConfig.withDefault(DEFAULT_LEVEL3_KW)),
    allocationStrategy: EffectConfig.literal("auto", "fixed_l3", "fixed_l2")("ALLOCATION_STRATEGY").pipe(
      EffectConfig.withDefault("auto")
    ),
    fixedCount: EffectConfig.integer("FIXED_COUNT").pipe(EffectConfig.withDefault(0)),
    candidateMixSizes: EffectConfig.array(EffectConfig.number(), "MIX_SIZES").pipe(
      EffectConfig.withDefault([])
    ),
  },

  outputDir: EffectConfig.option(EffectConfig.string("OUTPUT_DIR")),
};
