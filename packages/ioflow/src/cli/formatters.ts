import { toRecord, formatText, type ModuleReport } from "../report/index.js";
import type { OutputFormat } from "./options.js";

/**
 * Reports as a JSON array of module records
 */
export function formatJson(reports: readonly ModuleReport[]): string {
  return JSON.stringify(reports.map(toRecord), null, 2);
}

export function formatReports(
  reports: readonly ModuleReport[],
  format: OutputFormat,
): string {
  return format === "json" ? formatJson(reports) : formatText(reports);
}
