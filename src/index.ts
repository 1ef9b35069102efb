export * from "./table/types.js";
export { cellText, toNumber, parseTimestamp, parseDate } from "./table/cells.js";
export { locateHeaderRow, promoteHeaderRow, resolveHeader } from "./table/header.js";
export * from "./normalizer/types.js";
export { classifyShape, classifyTable, type TableShape, type LayoutHint } from "./normalizer/shape-classifier.js";
export { normalizeTall } from "./normalizer/tall.normalizer.js";
export { normalizeWide, inferIntervalHours } from "./normalizer/wide.normalizer.js";
export * from "./profile/types.js";
export { aggregateHourlyMax, definedHours } from "./profile/hourly-aggregator.js";
export * from "./capacity/types.js";
export { evaluateCapacity, allocateChargers, computeExcess, customLoadKw } from "./capacity/capacity-evaluator.js";
export * from "./charger-mix/types.js";
export { allocateGreedy, optimizeChargerMix, CHARGER_MIX_LABEL } from "./charger-mix/charger-mix-optimizer.js";
export * from "./analysis-config.js";
export { analyzeTable, normalizeTable, type AnalysisResult, type AnalysisError } from "./pipeline.js";
export { BatchAnalyzer, type FileAnalysisOutcome } from "./batch-analyzer.js";
export { TableReader, type ITableReader } from "./table-reader/types.js";
export { FileTableReaderLayer } from "./table-reader/file-table-reader.js";
export { parseCsvTable } from "./table-reader/csv.reader.js";
export { parseWorkbook } from "./table-reader/xlsx.reader.js";
export { evaluationRecords, chargerMixRecords, toCsv, type RecordSet } from "./report/records.js";
export { exportOutcome } from "./report/csv-exporter.js";
export { StructuralError } from "./errors/structural.error.js";
export { NoValidDataError } from "./errors/no-valid-data.error.js";
export { TableReadError } from "./errors/table-read.error.js";
export { InvalidAnalysisConfigError } from "./errors/invalid-analysis-config.error.js";
