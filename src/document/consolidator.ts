/**
 * Run Consolidator
 *
 * Two-phase substitution over one structural unit's concatenated text:
 *  1. fast path:  literal `{{COLUMN}}` replacement from a prebuilt map
 *  2. expression: every remaining `{{...}}` through the token evaluator
 *
 * A unit whose text does not change is never touched. A changed unit
 * collapses to a single run styled like its first run.
 */

import { TOKEN_EXPRESSION_RE, evaluate, tokenFor } from "../tokens/evaluator.js";
import { walkDocument } from "./walker.js";
import { DEFAULT_WALK_OPTIONS, type CanonicalDocument, type WalkOptions } from "./canonical.js";
import type { StructuralUnit } from "./structural_unit.js";
import type { Row } from "../shared/types.js";

/** Bare token → already-stringified value, e.g. `{{NAME}}` → "Ana". */
export type FastMap = ReadonlyMap<string, string>;

/** Columns that drive the batch rather than feed templates. */
const RESERVED_COLUMNS = new Set(["TEMPLATE"]);

export function buildFastMap(row: Row): FastMap {
  const map = new Map<string, string>();
  for (const [column, value] of row) {
    if (RESERVED_COLUMNS.has(column.toUpperCase())) continue;
    map.set(tokenFor(column), value);
  }
  return map;
}

export function replaceTokens(text: string, row: Row, fastMap: FastMap): string {
  if (!text.includes("{{")) return text;

  let out = text;
  for (const [token, value] of fastMap) {
    if (out.includes(token)) out = out.split(token).join(value);
  }
  return out.replace(TOKEN_EXPRESSION_RE, (_match, inner: string) => evaluate(inner, row));
}

/** Returns true iff the unit's text changed (and was rewritten). */
export function substitute(unit: StructuralUnit, row: Row, fastMap: FastMap): boolean {
  const before = unit.text();
  const after = replaceTokens(before, row, fastMap);
  if (after === before) return false;

  const style = unit.runs()[0]?.style ?? {};
  unit.replaceRuns(after, style);
  return true;
}

/** Substitute every unit of a document; returns the number of units rewritten. */
export function substituteDocument(
  doc: CanonicalDocument,
  row: Row,
  fastMap: FastMap = buildFastMap(row),
  options: WalkOptions = DEFAULT_WALK_OPTIONS,
): number {
  let changed = 0;
  for (const unit of walkDocument(doc, options)) {
    if (substitute(unit, row, fastMap)) changed++;
  }
  return changed;
}
