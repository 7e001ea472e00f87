import type { Report } from "../analyzers/types";
import * as fs from "fs";
import * as path from "path";

export const JSON_REPORT_NAME = "featuremap-report.json";

export function serializeReport(report: Report): string {
  return JSON.stringify(report, null, 2);
}

export function writeJsonReport(report: Report, outputDir: string): string {
  const filePath = path.join(outputDir, JSON_REPORT_NAME);
  fs.mkdirSync(outputDir, { recursive: true });
  fs.writeFileSync(filePath, serializeReport(report), "utf-8");
  return filePath;
}
