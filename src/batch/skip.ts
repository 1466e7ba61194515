/** Row routing columns: SKIP (truthy skips the row) and OUTPUT (subfolder). */

import type { Row } from "../shared/types.js";
import { sanitizeFilename } from "./filename_pattern.js";

export const SKIP_COLUMN = "SKIP";
export const OUTPUT_COLUMN = "OUTPUT";

const TRUTHY = new Set(["1", "true", "sí", "si", "x", "y", "yes"]);

export function isSkipped(row: Row): boolean {
  return TRUTHY.has((row.get(SKIP_COLUMN) ?? "").trim().toLowerCase());
}

/** Sanitized OUTPUT subfolder, or null when the cell is blank. */
export function outputSubfolder(row: Row): string | null {
  const raw = (row.get(OUTPUT_COLUMN) ?? "").trim();
  if (!raw) return null;
  const folder = sanitizeFilename(raw);
  return folder === "" || folder === "." || folder === ".." ? null : folder;
}
