import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { pino } from "pino";
import type { Logger } from "../../src/common/logger.js";
import type { ResultSet, SourceLabel } from "../../src/results/resultTypes.js";

export function createTempResultsDir(): string {
  return mkdtempSync(join(tmpdir(), "bench-compare-"));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function writeJson(dir: string, fileName: string, data: unknown): string {
  const path = join(dir, fileName);
  writeFileSync(path, JSON.stringify(data));
  return path;
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function resultSet(
  source: SourceLabel,
  timestamp: string,
  results: Record<string, number>,
): ResultSet {
  return { source, filePath: `${source}_benchmark_${timestamp}.json`, timestamp, results };
}
