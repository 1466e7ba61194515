/**
 * Row Source: CSV (csv-parse) or XLSX/XLS (xlsx) into trimmed Rows.
 *
 * Every cell is read as a string; workbook date cells become YYYY-MM-DD. Header names and values are trimmed,
 * missing cells become "". Each row keeps its 0-based position in the
 * source so results and `{index}` refer to the original table even after
 * a range is selected.
 */

import path from "path";
import { readFileSync } from "fs";
import { parse } from "csv-parse/sync";
import * as XLSX from "xlsx";
import { z } from "zod";
import { ConfigurationError, ResolutionError } from "../shared/errors.js";
import { createRow, type Row } from "../shared/types.js";

export interface IndexedRow {
  /** 0-based position in the source table. */
  index: number;
  row: Row;
}

export interface RowTable {
  columns: string[];
  rows: IndexedRow[];
}

const CellGridSchema = z.array(z.array(z.unknown()));

function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return isoDate(value);
  return String(value);
}

/** Workbook dates come back at local midnight. */
function isoDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

/** First line is the header; blank lines are dropped. */
export function tableFromCells(cells: unknown[][]): RowTable {
  if (cells.length === 0) return { columns: [], rows: [] };
  const [header, ...body] = cells;
  const columns = header.map((h) => cellText(h).trim());

  const rows: IndexedRow[] = [];
  body.forEach((line, index) => {
    const entries = columns.map((column, i): [string, unknown] => [column, cellText(line[i])]);
    rows.push({ index, row: createRow(entries.filter(([column]) => column !== "")) });
  });
  return { columns: columns.filter((c) => c !== ""), rows };
}

export function parseCsvTable(text: string): RowTable {
  const parsed: unknown = parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return tableFromCells(CellGridSchema.parse(parsed));
}

function pickSheet(workbook: XLSX.WorkBook, sheet: string | number): XLSX.WorkSheet {
  const name = typeof sheet === "number" ? workbook.SheetNames[sheet] : sheet;
  const worksheet = name === undefined ? undefined : workbook.Sheets[name];
  if (!worksheet) {
    throw new ConfigurationError(
      `Sheet ${JSON.stringify(sheet)} not found. Available: ${workbook.SheetNames.join(", ") || "(none)"}`,
    );
  }
  return worksheet;
}

export function parseWorkbookTable(buffer: Buffer, sheet: string | number = 0): RowTable {
  const workbook = XLSX.read(buffer, { type: "buffer", cellDates: true });
  const worksheet = pickSheet(workbook, sheet);
  const cells = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    raw: true,
    defval: "",
    blankrows: false,
  });
  return tableFromCells(cells);
}

/** A sheet given on the command line as "2" means index 2. */
export function parseSheetArg(value: string): string | number {
  return /^\d+$/.test(value.trim()) ? Number(value.trim()) : value;
}

export function readRowSource(filePath: string, sheet: string | number = 0): RowTable {
  let buffer: Buffer;
  try {
    buffer = readFileSync(filePath);
  } catch {
    throw new ResolutionError(`Data file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".csv") return parseCsvTable(buffer.toString("utf-8"));
  if (ext === ".xlsx" || ext === ".xls") return parseWorkbookTable(buffer, sheet);
  throw new ConfigurationError(`Unsupported data file type: ${ext || "(none)"}. Use CSV or XLSX.`);
}

/** Keep rows whose original index lies in [from, to] (both inclusive, optional). */
export function selectRange(table: RowTable, from?: number, to?: number): RowTable {
  if (from === undefined && to === undefined) return table;
  const start = from ?? 0;
  const end = to ?? Number.POSITIVE_INFINITY;
  return {
    columns: table.columns,
    rows: table.rows.filter(({ index }) => index >= start && index <= end),
  };
}
