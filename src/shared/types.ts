/** A single data record: column name → value, both trimmed. */
export type Row = ReadonlyMap<string, string>;

/** Canonical (directly editable) document kinds. */
export type DocumentKind = "docx" | "pptx";

/** Per-row outcome */
export type RenderStatus = "OK" | "ERROR" | "SKIPPED" | "DRY-RUN";

/** One entry of the batch result log. Never mutated after creation. */
export interface RenderResult {
  readonly row: number;
  readonly status: RenderStatus;
  readonly template?: string;
  readonly output?: string;
  readonly bytes?: number;
  readonly error?: string;
}

/** Build a Row from raw cells: keys and values trimmed, nullish → "". */
export function createRow(entries: Iterable<readonly [string, unknown]>): Row {
  const row = new Map<string, string>();
  for (const [key, value] of entries) {
    row.set(String(key).trim(), value === null || value === undefined ? "" : String(value).trim());
  }
  return row;
}

/** Build a Row from a plain object (insertion order kept). */
export function rowFromRecord(record: Record<string, unknown>): Row {
  return createRow(Object.entries(record));
}
