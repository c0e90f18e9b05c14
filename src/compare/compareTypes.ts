export interface SpeedupRecord {
  name: string;
  baselineTime: number;
  targetTime: number;
  /** targetTime / baselineTime; Infinity when the baseline took zero time. */
  speedup: number;
}

export interface SpeedupSummary {
  averageSpeedup: number | null;
  maxSpeedup: number | null;
  minSpeedup: number | null;
  benchmarksCompared: number;
}

export interface CategoryStat {
  category: string;
  benchmarks: string[];
  averageSpeedup: number | null;
}

export interface ComparisonReport {
  generatedAt: Date;
  baselineTimestamp: string;
  targetTimestamp: string;
  summary: SpeedupSummary;
  records: SpeedupRecord[];
  categories: CategoryStat[];
  topGains: SpeedupRecord[];
  areasForImprovement: SpeedupRecord[];
}

export type CannotCompareReason = "missing-baseline" | "missing-target" | "no-common-benchmarks";

export type ComparisonOutcome =
  | { ok: true; report: ComparisonReport }
  | { ok: false; reason: CannotCompareReason; message: string };
