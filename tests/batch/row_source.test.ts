import { describe, it, expect, beforeEach, afterEach } from "vitest";
import path from "path";
import os from "os";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import * as XLSX from "xlsx";
import {
  parseCsvTable,
  parseSheetArg,
  parseWorkbookTable,
  readRowSource,
  selectRange,
  tableFromCells,
} from "../../src/batch/row_source.js";
import { ConfigurationError, ResolutionError } from "../../src/shared/errors.js";
import { evaluate } from "../../src/tokens/evaluator.js";

function workbook(sheets: Record<string, unknown[][]>, cellDates = false): Buffer {
  const wb = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(rows, { cellDates }), name);
  }
  return Buffer.from(XLSX.write(wb, { type: "buffer", bookType: "xlsx" }));
}

describe("parseCsvTable", () => {
  it("trims headers and values and fills missing cells", () => {
    const table = parseCsvTable("\uFEFFTEMPLATE, NAME ,CITY\na.docx,  Ana ,Vigo\n\nb.pptx,Bob\n");

    expect(table.columns).toEqual(["TEMPLATE", "NAME", "CITY"]);
    expect(table.rows.map(({ index, row }) => [index, Object.fromEntries(row)])).toEqual([
      [0, { TEMPLATE: "a.docx", NAME: "Ana", CITY: "Vigo" }],
      [1, { TEMPLATE: "b.pptx", NAME: "Bob", CITY: "" }],
    ]);
  });

  it("keeps quoted commas and line breaks", () => {
    const table = parseCsvTable('NAME,ADDRESS\nAna,"Rúa Nova, 3\n2º"\n');
    expect(table.rows[0].row.get("ADDRESS")).toBe("Rúa Nova, 3\n2º");
  });
});

describe("tableFromCells", () => {
  it("drops columns without a header", () => {
    const table = tableFromCells([["A", "", "B"], [1, 2, 3]]);
    expect(table.columns).toEqual(["A", "B"]);
    expect(Object.fromEntries(table.rows[0].row)).toEqual({ A: "1", B: "3" });
  });

  it("handles an empty grid", () => {
    expect(tableFromCells([])).toEqual({ columns: [], rows: [] });
  });
});

describe("parseWorkbookTable", () => {
  const buffer = workbook({
    First: [["TEMPLATE", "NAME"], ["a.docx", "Ana"]],
    Second: [["TEMPLATE", "CODE"], ["b.pptx", 42]],
  });

  it("reads the first sheet by default", () => {
    const table = parseWorkbookTable(buffer);
    expect(table.columns).toEqual(["TEMPLATE", "NAME"]);
    expect(Object.fromEntries(table.rows[0].row)).toEqual({ TEMPLATE: "a.docx", NAME: "Ana" });
  });

  it("selects a sheet by name or index and reads numbers as text", () => {
    for (const sheet of ["Second", 1]) {
      const table = parseWorkbookTable(buffer, sheet);
      expect(Object.fromEntries(table.rows[0].row)).toEqual({ TEMPLATE: "b.pptx", CODE: "42" });
    }
  });

  it("reads date cells as ISO dates that the dmy filter understands", () => {
    const dated = workbook({ Rows: [["TEMPLATE", "FECHA"], ["a.docx", new Date(2024, 2, 7)]] }, true);
    const { row } = parseWorkbookTable(dated).rows[0];

    expect(row.get("FECHA")).toBe("2024-03-07");
    expect(evaluate("FECHA|dmy", row)).toBe("07/03/2024");
  });

  it("lists the available sheets when the requested one is missing", () => {
    expect(() => parseWorkbookTable(buffer, "Nope")).toThrow('Sheet "Nope" not found. Available: First, Second');
    expect(() => parseWorkbookTable(buffer, 5)).toThrow(ConfigurationError);
  });
});

describe("readRowSource", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), "row-source-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("dispatches on the file extension", () => {
    writeFileSync(path.join(dir, "data.CSV"), "TEMPLATE\na.docx\n");
    writeFileSync(path.join(dir, "data.xlsx"), workbook({ Rows: [["TEMPLATE"], ["b.docx"]] }));

    expect(readRowSource(path.join(dir, "data.CSV")).rows[0].row.get("TEMPLATE")).toBe("a.docx");
    expect(readRowSource(path.join(dir, "data.xlsx")).rows[0].row.get("TEMPLATE")).toBe("b.docx");
  });

  it("rejects missing files and unknown types", () => {
    writeFileSync(path.join(dir, "data.json"), "[]");
    expect(() => readRowSource(path.join(dir, "nope.csv"))).toThrow(ResolutionError);
    expect(() => readRowSource(path.join(dir, "data.json"))).toThrow(
      "Unsupported data file type: .json. Use CSV or XLSX.",
    );
  });
});

describe("selectRange", () => {
  const table = parseCsvTable("N\na\nb\nc\nd\n");

  it("keeps the inclusive range by original index", () => {
    expect(selectRange(table, 1, 2).rows.map((r) => r.index)).toEqual([1, 2]);
    expect(selectRange(table, 2).rows.map((r) => r.index)).toEqual([2, 3]);
    expect(selectRange(table, undefined, 0).rows.map((r) => r.index)).toEqual([0]);
    expect(selectRange(table)).toBe(table);
  });
});

describe("parseSheetArg", () => {
  it("reads digits as an index", () => {
    expect(parseSheetArg("2")).toBe(2);
    expect(parseSheetArg("Datos")).toBe("Datos");
  });
});
