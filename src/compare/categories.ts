import type { CategoryStat, SpeedupRecord } from "./compareTypes.js";

export const CATEGORIES = ["index", "insert", "search", "scale", "batch"] as const;

export type Category = (typeof CATEGORIES)[number];

export function categoriesOf(benchmark: string): Category[] {
  return CATEGORIES.filter((category) => benchmark.includes(category));
}

export function finiteSpeedups(records: readonly SpeedupRecord[]): number[] {
  return records.map((r) => r.speedup).filter((s) => Number.isFinite(s));
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Groups records into the fixed categories by substring match. A benchmark
 * may land in several buckets; buckets without members are left out.
 */
export function categorize(records: readonly SpeedupRecord[]): CategoryStat[] {
  const stats: CategoryStat[] = [];
  for (const category of CATEGORIES) {
    const members = records.filter((r) => r.name.includes(category));
    if (members.length === 0) continue;
    stats.push({
      category,
      benchmarks: members.map((r) => r.name),
      averageSpeedup: mean(finiteSpeedups(members)),
    });
  }
  return stats;
}
