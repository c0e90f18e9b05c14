export { runComparison, compareDirectory, EXIT_OK, EXIT_FAILURE } from "./app.js";
export type { RunOptions, ComparisonRun } from "./app.js";
export { validateRunConfig, resolveLogLevel } from "./config.js";
export type { RunConfig, LogLevel } from "./config.js";
export { createLogger, LOG_LEVEL_ENV } from "./common/logger.js";
export type { Logger } from "./common/logger.js";
export { BenchCompareError, ResultsDirectoryNotFoundError, ResultFileError } from "./common/errors.js";
export { loadResultFamilies, loadResultFile, validateResultFile } from "./results/resultLoader.js";
export { selectLatest } from "./results/resultSelector.js";
export * from "./results/resultTypes.js";
export { compareResults, calculateSpeedup, rankBySpeedup } from "./compare/comparator.js";
export { categorize, CATEGORIES } from "./compare/categories.js";
export type * from "./compare/compareTypes.js";
export { formatTime, formatSpeedup, speedupTier } from "./report/format.js";
export type { SpeedupTier } from "./report/format.js";
export { renderMarkdownReport } from "./report/markdownReport.js";
export { buildJsonSummary, INFINITE_SPEEDUP_SENTINEL } from "./report/jsonSummary.js";
export type { JsonSummary } from "./report/jsonSummary.js";
export { writeReports } from "./report/reportWriter.js";
export type { WrittenReports } from "./report/reportWriter.js";
export { renderConsoleSummary } from "./report/consoleSummary.js";
