import type { Effect } from "effect";
import type { DataQualityWarning } from "../normalizer/types.js";
import type { AnalysisResult } from "../pipeline.js";

export type IEventLogger = {
  onFileAnalyzed: (file: string, result: AnalysisResult) => Effect.Effect<void>;
  onFileSkipped: (file: string, reason: string) => Effect.Effect<void>;
  onDataQualityWarning: (file: string, warning: DataQualityWarning) => Effect.Effect<void>;
  onOverload: (file: string, hours: readonly number[]) => Effect.Effect<void>;
};
