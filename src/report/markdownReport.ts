import type { ComparisonReport } from "../compare/compareTypes.js";
import { formatDateTime, formatSpeedup, formatTime, titleCase } from "./format.js";

export const IMPLEMENTATION_NOTES = [
  "Rust implementation uses optimized memory-mapped storage and HNSW indexing",
  "Node.js results are from vectra-enhanced library",
  "All benchmarks use identical test data and parameters",
  "Times are averaged across multiple iterations",
];

function orUnknown(timestamp: string): string {
  return timestamp === "" ? "Unknown" : timestamp;
}

export function renderMarkdownReport(report: ComparisonReport): string {
  const lines: string[] = [];
  const { summary } = report;

  lines.push("# Vectra Performance Comparison Report");
  lines.push("=".repeat(50));
  lines.push("");
  lines.push(`**Generated:** ${formatDateTime(report.generatedAt)}`);
  lines.push(`**Rust Results:** ${orUnknown(report.baselineTimestamp)}`);
  lines.push(`**Node.js Results:** ${orUnknown(report.targetTimestamp)}`);
  lines.push("");

  if (summary.averageSpeedup !== null && summary.maxSpeedup !== null && summary.minSpeedup !== null) {
    lines.push("## 📊 Summary");
    lines.push("");
    lines.push(`- **Average Speedup:** ${formatSpeedup(summary.averageSpeedup)}`);
    lines.push(`- **Best Speedup:** ${formatSpeedup(summary.maxSpeedup)}`);
    lines.push(`- **Worst Speedup:** ${formatSpeedup(summary.minSpeedup)}`);
    lines.push(`- **Benchmarks Compared:** ${summary.benchmarksCompared}`);
    lines.push("");
  }

  lines.push("## 🔍 Detailed Results");
  lines.push("");
  lines.push("| Benchmark | Rust | Node.js | Speedup |");
  lines.push("|-----------|------|---------|---------|");
  for (const r of report.records) {
    lines.push(
      `| ${r.name} | ${formatTime(r.baselineTime)} | ${formatTime(r.targetTime)} | ${formatSpeedup(r.speedup)} |`,
    );
  }
  lines.push("");

  lines.push("## 📈 Performance by Category");
  lines.push("");
  for (const c of report.categories) {
    if (c.averageSpeedup === null) continue;
    lines.push(`**${titleCase(c.category)} Operations:** ${formatSpeedup(c.averageSpeedup)} average`);
  }
  lines.push("");

  lines.push("## 💡 Key Insights");
  lines.push("");
  lines.push("**Top Performance Gains:**");
  for (const r of report.topGains) {
    if (!Number.isFinite(r.speedup)) continue;
    lines.push(`- ${r.name}: ${formatSpeedup(r.speedup)}`);
  }
  lines.push("");

  if (report.areasForImprovement.length > 0) {
    lines.push("**Areas for Improvement:**");
    for (const r of report.areasForImprovement) {
      lines.push(`- ${r.name}: ${formatSpeedup(r.speedup)}`);
    }
    lines.push("");
  }

  lines.push("## 🔧 Implementation Notes");
  lines.push("");
  for (const note of IMPLEMENTATION_NOTES) {
    lines.push(`- ${note}`);
  }
  lines.push("");

  return lines.join("\n");
}
