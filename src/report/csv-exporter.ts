import { Effect } from "effect";
import { FileSystem, Path } from "@effect/platform";
import type { FileAnalysisOutcome } from "../batch-analyzer.js";
import { chargerMixRecords, evaluationRecords, toCsv } from "./records.js";

/**
 * Writes `<name>_analysis.csv` and, when a mix was requested,
 * `<name>_mix_approx.csv`. Returns the written paths; skipped files write nothing.
 */
export const exportOutcome = (outcome: FileAnalysisOutcome, outputDir: string) =>
  Effect.gen(function* () {
    const fileSystem = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    if (outcome.result === null) {
      return [];
    }

    yield* fileSystem.makeDirectory(outputDir, { recursive: true });

    const name = path.basename(outcome.file);
    const written: string[] = [];

    const analysisPath = path.join(outputDir, `${name}_analysis.csv`);
    yield* fileSystem.writeFileString(analysisPath, toCsv(evaluationRecords(outcome.result.evaluation)));
    written.push(analysisPath);

    if (outcome.result.chargerMix.length > 0) {
      const mixPath = path.join(outputDir, `${name}_mix_approx.csv`);
      yield* fileSystem.writeFileString(mixPath, toCsv(chargerMixRecords(outcome.result.chargerMix)));
      written.push(mixPath);
    }

    yield* Effect.logDebug(`Exported ${written.join(", ")}`);

    return written;
  });
