export const SOURCE_LABELS = ["rust", "nodejs"] as const;

export type SourceLabel = (typeof SOURCE_LABELS)[number];

/** rust is the baseline (A), nodejs the comparison target (B). */
export const BASELINE_SOURCE: SourceLabel = "rust";
export const TARGET_SOURCE: SourceLabel = "nodejs";

export const SOURCE_FILE_PREFIXES: Record<SourceLabel, string> = {
  rust: "rust_benchmark_",
  nodejs: "nodejs_benchmark_",
};

export const RESULT_FILE_EXTENSION = ".json";

export interface ResultSet {
  readonly source: SourceLabel;
  readonly filePath: string;
  /** Compared lexicographically, never parsed as a date. */
  readonly timestamp: string;
  /** Benchmark name to elapsed seconds. */
  readonly results: Readonly<Record<string, number>>;
}

export type ResultFamilies = Record<SourceLabel, ResultSet[]>;
