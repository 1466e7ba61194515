/**
 * Token Evaluator
 *
 * Grammar:
 *   <expr> := <column> ( '|' <filter> )* [ '?:' <default> ]
 *
 * Examples:
 *   "Name|trim|upper"   "Amount|euros"   "Date|dmy"   "Field?:N/A"
 *
 * Parsing and evaluation are total: malformed input degrades to a bare
 * column reference, and a missing column evaluates to "" (or the default).
 */

import { applyFilters } from "./filters.js";
import type { Row } from "../shared/types.js";

export const TOKEN_PREFIX = "{{";
export const TOKEN_SUFFIX = "}}";

/** Any `{{ ... }}` occurrence; group 1 is the trimmed inner expression. */
export const TOKEN_EXPRESSION_RE = /\{\{\s*([^}]+?)\s*\}\}/g;

/**
 * Tokens considered during preflight discovery. Inner text is limited to
 * letters, digits, `_`, `-`, space, `:`, `|` and `?`.
 */
export const DISCOVERY_TOKEN_RE = /\{\{\s*([\p{L}\p{N}_\- :|?]+?)\s*\}\}/gu;

const DEFAULT_SEPARATOR = "?:";

export interface TokenExpression {
  baseName: string;
  filters: string[];
  /** Present only when the expression carries `?:`. */
  defaultValue?: string;
}

export function parseExpression(raw: string): TokenExpression {
  let main = raw;
  let defaultValue: string | undefined;

  const sep = raw.indexOf(DEFAULT_SEPARATOR);
  if (sep >= 0) {
    main = raw.slice(0, sep).trim();
    defaultValue = raw.slice(sep + DEFAULT_SEPARATOR.length).trim();
  }

  const pieces = main.split("|").map((p) => p.trim());
  const [baseName, ...filters] = pieces;

  return defaultValue === undefined
    ? { baseName, filters }
    : { baseName, filters, defaultValue };
}

export function evaluate(expression: string, row: Row): string {
  const { baseName, filters, defaultValue } = parseExpression(expression);
  const value = baseName ? row.get(baseName) ?? "" : "";

  if (defaultValue !== undefined && value.trim() === "") {
    return defaultValue;
  }
  return applyFilters(value, filters);
}

/** Column a token refers to, with filters and default stripped. */
export function tokenBaseName(expression: string): string {
  return parseExpression(expression).baseName;
}

/** Bare token form of a column, e.g. `{{NAME}}`. */
export function tokenFor(column: string): string {
  return `${TOKEN_PREFIX}${column}${TOKEN_SUFFIX}`;
}
