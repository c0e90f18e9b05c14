import { existsSync } from "node:fs";
import { BenchCompareError, describeCause, ResultsDirectoryNotFoundError } from "./common/errors.js";
import { createLogger, type Logger } from "./common/logger.js";
import { resolveLogLevel, validateRunConfig, type LogLevel, type RunConfig } from "./config.js";
import { compareResults } from "./compare/comparator.js";
import type { ComparisonOutcome } from "./compare/compareTypes.js";
import { loadResultFamilies } from "./results/resultLoader.js";
import { selectLatest } from "./results/resultSelector.js";
import { BASELINE_SOURCE, TARGET_SOURCE } from "./results/resultTypes.js";
import { renderConsoleSummary } from "./report/consoleSummary.js";
import { writeReports, type WrittenReports } from "./report/reportWriter.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export interface RunOptions {
  resultsDir: string;
  verbose?: boolean;
  logLevel?: LogLevel;
  /** Defaults to a pino logger on stderr at the resolved level. */
  logger?: Logger;
  /** Receives the console digest, one line per call. Defaults to `console.log`. */
  print?: (line: string) => void;
  /** Clock used for the report time stamp and file names. */
  now?: () => Date;
}

export interface ComparisonRun {
  outcome: ComparisonOutcome;
  written?: WrittenReports;
}

/**
 * Runs the whole pipeline against an existing results directory: load both
 * result families, pick the latest of each, compare, and write the reports.
 * Throws on unexpected failures; "nothing to compare" is returned as an outcome.
 */
export function compareDirectory(
  resultsDir: string,
  logger: Logger,
  now: () => Date = () => new Date(),
): ComparisonRun {
  if (!existsSync(resultsDir)) {
    throw new ResultsDirectoryNotFoundError(resultsDir);
  }

  const families = loadResultFamilies(resultsDir, logger);
  logger.debug(`Found ${families.rust.length} Rust result files`);
  logger.debug(`Found ${families.nodejs.length} Node.js result files`);

  const baseline = selectLatest(families[BASELINE_SOURCE]);
  const target = selectLatest(families[TARGET_SOURCE]);
  if (baseline) logger.debug({ file: baseline.filePath, timestamp: baseline.timestamp }, "Selected rust results");
  if (target) logger.debug({ file: target.filePath, timestamp: target.timestamp }, "Selected nodejs results");

  const outcome = compareResults(baseline, target, now());
  if (!outcome.ok) {
    return { outcome };
  }

  return { outcome, written: writeReports(resultsDir, outcome.report) };
}

/** CLI entry point. Returns the process exit code instead of exiting. */
export function runComparison(options: RunOptions): number {
  let config: RunConfig;
  try {
    config = validateRunConfig({
      resultsDir: options.resultsDir,
      verbose: options.verbose,
      logLevel: options.logLevel,
    });
  } catch (err) {
    (options.logger ?? createLogger()).error(`Invalid options: ${describeCause(err)}`);
    return EXIT_FAILURE;
  }
  const logger = options.logger ?? createLogger(resolveLogLevel(config));
  const print = options.print ?? ((line: string) => console.log(line));

  try {
    const run = compareDirectory(config.resultsDir, logger, options.now);
    if (!run.outcome.ok) {
      logger.error({ reason: run.outcome.reason }, `Cannot generate comparison: ${run.outcome.message}`);
      return EXIT_OK;
    }
    if (run.written) {
      for (const line of renderConsoleSummary(run.outcome.report, run.written)) {
        print(line);
      }
    }
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ResultsDirectoryNotFoundError) {
      logger.error({ directory: err.directory }, err.message);
    } else if (config.verbose) {
      logger.error({ err }, `Error generating comparison report: ${describeCause(err)}`);
    } else {
      logger.error(`Error generating comparison report: ${describeCause(err)}`);
    }
    return err instanceof BenchCompareError ? err.exitCode : EXIT_FAILURE;
  }
}
