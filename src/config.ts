import * as v from "valibot";
import { LOG_LEVEL_ENV } from "./common/logger.js";

const LogLevelSchema = v.picklist(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const RunConfigSchema = v.object({
  resultsDir: v.pipe(v.string(), v.nonEmpty("results directory must not be empty")),
  verbose: v.optional(v.boolean(), false),
  logLevel: v.optional(LogLevelSchema),
});

export type RunConfig = v.InferOutput<typeof RunConfigSchema>;
export type LogLevel = v.InferOutput<typeof LogLevelSchema>;

export function validateRunConfig(data: unknown): RunConfig {
  return v.parse(RunConfigSchema, data);
}

/**
 * Resolves the effective log level. An explicit level wins, then the
 * environment override, then `debug` under verbose mode.
 */
export function resolveLogLevel(
  config: RunConfig,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  if (config.logLevel) return config.logLevel;
  const fromEnv = env[LOG_LEVEL_ENV];
  if (fromEnv) {
    const parsed = v.safeParse(LogLevelSchema, fromEnv.toLowerCase());
    if (parsed.success) return parsed.output;
  }
  return config.verbose ? "debug" : "info";
}
