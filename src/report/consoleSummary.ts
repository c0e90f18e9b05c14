import type { ComparisonReport } from "../compare/compareTypes.js";
import { formatSpeedup } from "./format.js";
import type { WrittenReports } from "./reportWriter.js";

export function renderConsoleSummary(report: ComparisonReport, written: WrittenReports): string[] {
  const { summary } = report;
  const lines = ["📊 Performance Comparison Summary", "=".repeat(40)];

  if (summary.averageSpeedup !== null && summary.maxSpeedup !== null) {
    lines.push(`Average Speedup: ${formatSpeedup(summary.averageSpeedup)}`);
    lines.push(`Best Speedup: ${formatSpeedup(summary.maxSpeedup)}`);
    lines.push(`Benchmarks: ${summary.benchmarksCompared}`);
  }

  lines.push("");
  lines.push(`📄 Full report saved to: ${written.markdownPath}`);
  lines.push(`📄 JSON data saved to: ${written.jsonPath}`);
  return lines;
}
