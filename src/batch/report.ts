/**
 * Batch reports: `_report.json` (pretty list) and `_report.csv` (one column
 * per key seen in any result, sorted). A report that cannot be written is
 * a warning, never a batch failure.
 */

import path from "path";
import { writeFileSync } from "fs";
import * as XLSX from "xlsx";
import { describeError } from "../shared/errors.js";
import type { StepLogger } from "../shared/logger.js";
import type { RenderResult } from "../shared/types.js";

export const JSON_REPORT = "_report.json";
export const CSV_REPORT = "_report.csv";

export function reportColumns(results: readonly RenderResult[]): string[] {
  const keys = new Set<string>();
  for (const result of results) {
    for (const key of Object.keys(result)) keys.add(key);
  }
  return [...keys].sort();
}

export function resultsToCsv(results: readonly RenderResult[]): string {
  const header = reportColumns(results);
  const records = results.map((r) => ({ ...r }));
  const sheet = XLSX.utils.json_to_sheet(records, { header });
  return XLSX.utils.sheet_to_csv(sheet);
}

export interface WrittenReports {
  json?: string;
  csv?: string;
}

export function writeReports(
  outDir: string,
  results: readonly RenderResult[],
  logger: StepLogger,
): WrittenReports {
  const written: WrittenReports = {};

  const jsonPath = path.join(outDir, JSON_REPORT);
  try {
    writeFileSync(jsonPath, JSON.stringify(results, null, 2), "utf-8");
    written.json = jsonPath;
    logger.info("REPORT", `Report saved to: ${jsonPath}`);
  } catch (err) {
    logger.warn("REPORT", `Could not write JSON report: ${describeError(err)}`);
  }

  const csvPath = path.join(outDir, CSV_REPORT);
  try {
    writeFileSync(csvPath, resultsToCsv(results), "utf-8");
    written.csv = csvPath;
    logger.info("REPORT", `Report saved to: ${csvPath}`);
  } catch (err) {
    logger.warn("REPORT", `Could not write CSV report: ${describeError(err)}`);
  }

  return written;
}
