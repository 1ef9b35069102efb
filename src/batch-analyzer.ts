import { Effect } from "effect";
import type { AnalysisConfig } from "./analysis-config.js";
import type { ITableReader } from "./table-reader/types.js";
import type { TableReadError } from "./errors/table-read.error.js";
import type { IEventLogger } from "./event-logger/types.js";
import { EventLogger } from "./event-logger/index.js";
import { analyzeTable, type AnalysisError, type AnalysisResult } from "./pipeline.js";

export type FileAnalysisOutcome =
  | { readonly file: string; readonly result: AnalysisResult; readonly error: null }
  | { readonly file: string; readonly result: null; readonly error: string };

export class BatchAnalyzer {
  public constructor(
    private readonly tableReader: ITableReader,
    private readonly eventLogger: IEventLogger = new EventLogger(),
  ) { }

  /**
   * Files run one after another; a file that cannot be read or normalized is
   * reported in its outcome and the rest of the batch still runs.
   */
  public analyzeFiles(
    files: readonly string[],
    config: AnalysisConfig,
  ): Effect.Effect<readonly FileAnalysisOutcome[]> {
    return Effect.forEach(files, (file) => this.analyzeFile(file, config));
  }

  public analyzeFile(file: string, config: AnalysisConfig): Effect.Effect<FileAnalysisOutcome> {
    const deps = this;

    return Effect.gen(function* () {
      const table = yield* deps.tableReader.read(file);
      const result = yield* analyzeTable(table, config);

      for (const warning of result.warnings) {
        yield* deps.eventLogger.onDataQualityWarning(file, warning);
      }

      if (result.evaluation.overloadHours.length > 0) {
        yield* deps.eventLogger.onOverload(file, result.evaluation.overloadHours);
      }

      yield* deps.eventLogger.onFileAnalyzed(file, result);

      return { file, result, error: null } satisfies FileAnalysisOutcome;
    }).pipe(
      Effect.catchAll((err: TableReadError | AnalysisError) =>
        deps.eventLogger.onFileSkipped(file, err.message).pipe(
          Effect.as({ file, result: null, error: err.message } satisfies FileAnalysisOutcome)
        )
      ),
      Effect.withSpan("analyzeFile", { attributes: { file } }),
    );
  }
}
