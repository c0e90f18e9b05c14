import { writeFileSync } from "node:fs";
import { join } from "node:path";
import type { ComparisonReport } from "../compare/compareTypes.js";
import { formatFileStamp } from "./format.js";
import { buildJsonSummary } from "./jsonSummary.js";
import { renderMarkdownReport } from "./markdownReport.js";

export const REPORT_FILE_PREFIX = "performance_comparison_";

export interface WrittenReports {
  markdownPath: string;
  jsonPath: string;
}

export function reportFileBase(dir: string, generatedAt: Date): string {
  return join(dir, `${REPORT_FILE_PREFIX}${formatFileStamp(generatedAt)}`);
}

/** Writes the Markdown report and JSON summary side by side, sharing one time stamp. */
export function writeReports(dir: string, report: ComparisonReport): WrittenReports {
  const base = reportFileBase(dir, report.generatedAt);
  const markdownPath = `${base}.md`;
  const jsonPath = `${base}.json`;

  writeFileSync(markdownPath, renderMarkdownReport(report));
  writeFileSync(jsonPath, JSON.stringify(buildJsonSummary(report), null, 2));

  return { markdownPath, jsonPath };
}
