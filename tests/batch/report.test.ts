import { describe, it, expect, beforeEach, afterEach } from "vitest";
import path from "path";
import os from "os";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { reportColumns, resultsToCsv, writeReports } from "../../src/batch/report.js";
import { createRecordingLogger } from "../../src/shared/logger.js";
import type { RenderResult } from "../../src/shared/types.js";

const results: RenderResult[] = [
  { row: 0, status: "OK", template: "a.docx", output: "out/0000.pdf", bytes: 10 },
  { row: 1, status: "SKIPPED" },
  { row: 2, status: "ERROR", template: "b.pptx", error: "boom, twice" },
];

describe("reportColumns", () => {
  it("is the sorted union of result keys", () => {
    expect(reportColumns(results)).toEqual(["bytes", "error", "output", "row", "status", "template"]);
    expect(reportColumns([{ row: 0, status: "SKIPPED" }])).toEqual(["row", "status"]);
  });
});

describe("resultsToCsv", () => {
  it("writes one line per result with empty cells for absent keys", () => {
    expect(resultsToCsv(results).split("\n")).toEqual([
      "bytes,error,output,row,status,template",
      "10,,out/0000.pdf,0,OK,a.docx",
      ",,,1,SKIPPED,",
      ',"boom, twice",,2,ERROR,b.pptx',
    ]);
  });
});

describe("writeReports", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), "report-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes both files and logs where", () => {
    const logger = createRecordingLogger();
    const written = writeReports(dir, results, logger);

    expect(written).toEqual({ json: path.join(dir, "_report.json"), csv: path.join(dir, "_report.csv") });
    expect(JSON.parse(readFileSync(path.join(dir, "_report.json"), "utf-8"))).toEqual(results);
    expect(logger.lines.map((l) => l.msg)).toEqual([
      `Report saved to: ${path.join(dir, "_report.json")}`,
      `Report saved to: ${path.join(dir, "_report.csv")}`,
    ]);
  });

  it("warns instead of failing when the directory is missing", () => {
    const logger = createRecordingLogger();
    const written = writeReports(path.join(dir, "absent"), results, logger);

    expect(written).toEqual({});
    expect(logger.lines.map((l) => l.level)).toEqual(["warn", "warn"]);
  });
});
