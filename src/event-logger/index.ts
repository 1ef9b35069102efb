import type { IEventLogger } from "./types.js";
import type { DataQualityWarning } from "../normalizer/types.js";
import type { AnalysisResult } from "../pipeline.js";
import { Effect } from "effect";

export class EventLogger implements IEventLogger {

  public onFileAnalyzed(file: string, result: AnalysisResult) {
    return Effect.log(`Analyzed ${file} as ${result.shape} table`, {
      readings: result.readingCount,
      hoursWithData: result.evaluation.rows.length,
    });
  }

  public onFileSkipped(file: string, reason: string) {
    return Effect.logError(`Skipping ${file}: ${reason}`);
  }

  public onDataQualityWarning(file: string, warning: DataQualityWarning) {
    return Effect.logWarning(`${file}: ${warning.message}`);
  }

  public onOverload(file: string, hours: readonly number[]) {
    return Effect.logWarning(`${file}: load exceeds capacity at hour(s) ${hours.join(", ")}`);
  }
}
