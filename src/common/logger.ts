import { destination, pino, type Level, type Logger } from "pino";

export type { Logger };

export const LOG_LEVEL_ENV = "BENCH_COMPARE_LOG_LEVEL";

/**
 * Logger for diagnostics. Writes to stderr so that stdout only carries the
 * comparison digest.
 */
export function createLogger(level: Level | "silent" = "info"): Logger {
  return pino(
    {
      name: "bench-compare",
      level,
      base: null,
    },
    destination(2),
  );
}
