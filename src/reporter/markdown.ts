import type { AnalysisDiagnostics, Report } from "../analyzers/types";
import * as fs from "fs";
import * as path from "path";

export const MARKDOWN_REPORT_NAME = "featuremap-report.md";

export type MarkdownContext = {
  archiveName: string;
  diagnostics: AnalysisDiagnostics;
};

export function renderMarkdownReport(report: Report, context: MarkdownContext): string {
  const { diagnostics } = context;
  const lines: string[] = [];
  const located = report.feature_analysis.filter((entry) => entry.implementation_location.length > 0).length;
  const total = report.feature_analysis.length;

  // Header
  lines.push("# Feature Map Report");
  lines.push("");
  lines.push(`**Requirements located: ${located} / ${total}**`);
  lines.push("");
  lines.push(`- Archive: \`${context.archiveName}\``);
  lines.push(`- Files: ${diagnostics.totalFiles} (${diagnostics.totalLines.toLocaleString("en-US")} lines)`);
  lines.push(`- Code units: ${diagnostics.totalUnits}`);
  lines.push(`- Duration: ${(diagnostics.durationMs / 1000).toFixed(1)}s`);
  lines.push("");
  lines.push(renderCoverageBar(located, total));
  lines.push("");

  lines.push("## Feature Analysis");
  lines.push("");
  for (const [index, entry] of report.feature_analysis.entries()) {
    lines.push(`### ${index + 1}. ${entry.feature_description}`);
    lines.push("");
    if (entry.implementation_location.length === 0) {
      lines.push("_No confident match._");
    } else {
      lines.push("| File | Function | Lines |");
      lines.push("|------|----------|-------|");
      for (const location of entry.implementation_location) {
        lines.push(`| \`${escapeCell(location.file)}\` | \`${escapeCell(location.function)}\` | ${location.lines} |`);
      }
    }
    lines.push("");
  }

  lines.push("## Execution Plan");
  lines.push("");
  lines.push(report.execution_plan_suggestion);
  lines.push("");

  if (report.functional_verification) {
    const { generated_test_code: code, execution_result: result } = report.functional_verification;
    lines.push("## Functional Verification");
    lines.push("");
    lines.push(`**Tests passed: ${result.tests_passed ? "yes" : "no"}**`);
    lines.push("");
    lines.push("```");
    lines.push(code.trimEnd());
    lines.push("```");
    lines.push("");
    lines.push(result.log);
    lines.push("");
  }

  const degradations = [
    ...diagnostics.unreadableFiles.map((file) => `- \`${file}\`: unreadable, skipped`),
    ...diagnostics.partiallyExtractedFiles.map((file) => `- \`${file.path}\`: partially extracted (${file.reason} at line ${file.line})`),
    ...diagnostics.truncatedEntries.map((entry) => `- \`${entry.path}\`: ${entry.size} bytes exceeds the ${entry.limit} byte cap, skipped`),
    ...diagnostics.skippedLinks.map((link) => `- \`${link}\`: symbolic link, skipped`),
  ];
  if (degradations.length > 0) {
    lines.push("## Skipped and Partial Files");
    lines.push("");
    lines.push(...degradations);
    lines.push("");
  }

  return lines.join("\n");
}

export function writeMarkdownReport(report: Report, context: MarkdownContext, outputDir: string): string {
  const filePath = path.join(outputDir, MARKDOWN_REPORT_NAME);
  fs.mkdirSync(outputDir, { recursive: true });
  fs.writeFileSync(filePath, renderMarkdownReport(report, context), "utf-8");
  return filePath;
}

function renderCoverageBar(located: number, total: number): string {
  const pct = total === 0 ? 0 : located / total;
  const filled = Math.round(pct * 20);
  const empty = 20 - filled;
  const bar = "█".repeat(filled) + "░".repeat(empty);
  return `\`${bar}\` ${(pct * 100).toFixed(0)}%`;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|");
}
