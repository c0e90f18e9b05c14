import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import * as v from "valibot";
import { ResultFileError } from "../common/errors.js";
import type { Logger } from "../common/logger.js";
import {
  RESULT_FILE_EXTENSION,
  SOURCE_FILE_PREFIXES,
  SOURCE_LABELS,
  type ResultFamilies,
  type ResultSet,
  type SourceLabel,
} from "./resultTypes.js";

const ResultFileSchema = v.object({
  timestamp: v.optional(v.string(), ""),
  results: v.record(v.string(), v.number()),
});

export type ResultFile = v.InferOutput<typeof ResultFileSchema>;

export function validateResultFile(data: unknown): ResultFile {
  return v.parse(ResultFileSchema, data);
}

export function isResultFileFor(source: SourceLabel, fileName: string): boolean {
  const prefix = SOURCE_FILE_PREFIXES[source];
  return fileName.startsWith(prefix) && fileName.endsWith(RESULT_FILE_EXTENSION);
}

export function loadResultFile(source: SourceLabel, filePath: string): ResultSet {
  try {
    const content = readFileSync(filePath, "utf-8");
    const parsed = validateResultFile(JSON.parse(content));
    return {
      source,
      filePath,
      timestamp: parsed.timestamp,
      results: parsed.results,
    };
  } catch (err) {
    throw new ResultFileError(filePath, err);
  }
}

/**
 * Loads every `rust_benchmark_*.json` and `nodejs_benchmark_*.json` file in
 * `dir`. Files that fail to load are logged and skipped.
 */
export function loadResultFamilies(dir: string, logger: Logger): ResultFamilies {
  const fileNames = readdirSync(dir).sort();
  const families: ResultFamilies = { rust: [], nodejs: [] };

  for (const source of SOURCE_LABELS) {
    for (const fileName of fileNames.filter((f) => isResultFileFor(source, f))) {
      try {
        families[source].push(loadResultFile(source, join(dir, fileName)));
      } catch (err) {
        if (!(err instanceof ResultFileError)) throw err;
        logger.warn({ file: err.filePath, source }, err.message);
      }
    }
  }

  return families;
}
