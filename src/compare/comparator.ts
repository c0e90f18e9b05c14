import type { ResultSet } from "../results/resultTypes.js";
import { categorize, finiteSpeedups, mean } from "./categories.js";
import type { ComparisonOutcome, SpeedupRecord, SpeedupSummary } from "./compareTypes.js";

export const TOP_GAINS_COUNT = 3;

export function calculateSpeedup(baselineTime: number, targetTime: number): number {
  if (baselineTime === 0) return Number.POSITIVE_INFINITY;
  return targetTime / baselineTime;
}

export function commonBenchmarks(baseline: ResultSet, target: ResultSet): string[] {
  return Object.keys(baseline.results)
    .filter((name) => Object.hasOwn(target.results, name))
    .sort();
}

export function summarize(records: readonly SpeedupRecord[]): SpeedupSummary {
  const speedups = finiteSpeedups(records);
  return {
    averageSpeedup: mean(speedups),
    maxSpeedup: speedups.length > 0 ? Math.max(...speedups) : null,
    minSpeedup: speedups.length > 0 ? Math.min(...speedups) : null,
    benchmarksCompared: records.length,
  };
}

/** Highest speedups first, ties broken by benchmark name. */
export function rankBySpeedup(records: readonly SpeedupRecord[]): SpeedupRecord[] {
  return [...records].sort((a, b) => {
    if (a.speedup !== b.speedup) return a.speedup > b.speedup ? -1 : 1;
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
  });
}

export function compareResults(
  baseline: ResultSet | undefined,
  target: ResultSet | undefined,
  now: Date = new Date(),
): ComparisonOutcome {
  if (!baseline) {
    return { ok: false, reason: "missing-baseline", message: "No rust benchmark results found" };
  }
  if (!target) {
    return { ok: false, reason: "missing-target", message: "No nodejs benchmark results found" };
  }

  const names = commonBenchmarks(baseline, target);
  if (names.length === 0) {
    return {
      ok: false,
      reason: "no-common-benchmarks",
      message: "No common benchmarks found between rust and nodejs results",
    };
  }

  const records: SpeedupRecord[] = names.map((name) => {
    const baselineTime = baseline.results[name];
    const targetTime = target.results[name];
    return { name, baselineTime, targetTime, speedup: calculateSpeedup(baselineTime, targetTime) };
  });

  const topGains = rankBySpeedup(records).slice(0, TOP_GAINS_COUNT);

  return {
    ok: true,
    report: {
      generatedAt: now,
      baselineTimestamp: baseline.timestamp,
      targetTimestamp: target.timestamp,
      summary: summarize(records),
      records,
      categories: categorize(records),
      topGains,
      // Only the top gains are inspected, so a slow benchmark outside them is never listed.
      areasForImprovement: topGains.filter((r) => r.speedup < 1.0),
    },
  };
}
