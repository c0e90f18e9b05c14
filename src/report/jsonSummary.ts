import type { ComparisonReport, SpeedupRecord } from "../compare/compareTypes.js";

/** JSON has no Infinity, so infinite speedups are written as this string. */
export const INFINITE_SPEEDUP_SENTINEL = "Infinity";

export type SerializedSpeedup = number | typeof INFINITE_SPEEDUP_SENTINEL;

export interface JsonSummary {
  timestamp: string;
  rust_timestamp: string;
  nodejs_timestamp: string;
  summary: {
    average_speedup: number;
    max_speedup: number;
    min_speedup: number;
    benchmarks_compared: number;
  };
  detailed_results: Record<string, { rust_time: number; nodejs_time: number; speedup: SerializedSpeedup }>;
  categories: Record<string, { benchmarks: string[]; average_speedup: number | null }>;
  top_gains: Array<{ benchmark: string; speedup: SerializedSpeedup }>;
  areas_for_improvement: Array<{ benchmark: string; speedup: SerializedSpeedup }>;
}

export function serializeSpeedup(speedup: number): SerializedSpeedup {
  return speedup === Number.POSITIVE_INFINITY ? INFINITE_SPEEDUP_SENTINEL : speedup;
}

function rankedEntry(r: SpeedupRecord) {
  return { benchmark: r.name, speedup: serializeSpeedup(r.speedup) };
}

export function buildJsonSummary(report: ComparisonReport): JsonSummary {
  const { summary } = report;

  const detailed: JsonSummary["detailed_results"] = {};
  for (const r of report.records) {
    detailed[r.name] = {
      rust_time: r.baselineTime,
      nodejs_time: r.targetTime,
      speedup: serializeSpeedup(r.speedup),
    };
  }

  const categories: JsonSummary["categories"] = {};
  for (const c of report.categories) {
    categories[c.category] = { benchmarks: c.benchmarks, average_speedup: c.averageSpeedup };
  }

  return {
    timestamp: report.generatedAt.toISOString(),
    rust_timestamp: report.baselineTimestamp,
    nodejs_timestamp: report.targetTimestamp,
    summary: {
      average_speedup: summary.averageSpeedup ?? 0,
      max_speedup: summary.maxSpeedup ?? 0,
      min_speedup: summary.minSpeedup ?? 0,
      benchmarks_compared: summary.benchmarksCompared,
    },
    detailed_results: detailed,
    categories,
    top_gains: report.topGains.map(rankedEntry),
    areas_for_improvement: report.areasForImprovement.map(rankedEntry),
  };
}
