/**
 * Output filename patterns.
 *
 *   "{ID}_{NAME}.pdf"       column fields
 *   "{index:04d}.pdf"       0-based row index, zero-padded
 *   "{{literal}}"           doubled braces are literal braces
 *
 * Format specs: `[0][width]d` for integers, `[width]` to pad text.
 */

import { ConfigurationError } from "../shared/errors.js";

export type PatternContext = ReadonlyMap<string, string | number>;

const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*]/g;

/** Replace filesystem-unsafe characters with "_" and trim. */
export function sanitizeFilename(name: string): string {
  return name.replace(UNSAFE_FILENAME_CHARS, "_").trim();
}

function applySpec(value: string | number, spec: string, pattern: string): string {
  if (spec === "") return String(value);

  const m = /^(0?)(\d*)(d?)$/.exec(spec);
  if (!m) throw new ConfigurationError(`Unsupported format spec "${spec}" in pattern ${pattern}`);
  const [, zero, widthText, integer] = m;
  const width = widthText ? Number(widthText) : 0;

  if (integer) {
    const n = typeof value === "number" ? value : Number(value.trim());
    if (!Number.isInteger(n)) {
      throw new ConfigurationError(`Format spec "${spec}" needs an integer, got ${JSON.stringify(value)}`);
    }
    const digits = String(Math.abs(n));
    const sign = n < 0 ? "-" : "";
    return zero ? sign + digits.padStart(width - sign.length, "0") : (sign + digits).padStart(width);
  }
  if (zero) return String(value).padStart(width, "0");
  // Numbers align right, text aligns left.
  return typeof value === "number" ? String(value).padStart(width) : value.padEnd(width);
}

export function expandPattern(pattern: string, context: PatternContext): string {
  let out = "";
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === "{" && pattern[i + 1] === "{") {
      out += "{";
      i += 2;
    } else if (ch === "}" && pattern[i + 1] === "}") {
      out += "}";
      i += 2;
    } else if (ch === "{") {
      const close = pattern.indexOf("}", i);
      if (close < 0) throw new ConfigurationError(`Unclosed '{' in filename pattern: ${pattern}`);
      const field = pattern.slice(i + 1, close);
      const colon = field.indexOf(":");
      const name = (colon >= 0 ? field.slice(0, colon) : field).trim();
      const spec = colon >= 0 ? field.slice(colon + 1) : "";
      const value = context.get(name);
      if (value === undefined) {
        throw new ConfigurationError(
          `Filename pattern requires a missing column: '${name}'. Pattern: ${pattern} | Columns: ${[...context.keys()].join(", ")}`,
        );
      }
      out += applySpec(value, spec, pattern);
      i = close + 1;
    } else if (ch === "}") {
      throw new ConfigurationError(`Single '}' in filename pattern: ${pattern}`);
    } else {
      out += ch;
      i += 1;
    }
  }
  return out;
}

/** Expand, sanitize and ensure a ".pdf" suffix. */
export function outputFilename(pattern: string, context: PatternContext): string {
  const name = sanitizeFilename(expandPattern(pattern, context));
  return name.toLowerCase().endsWith(".pdf") ? name : `${name}.pdf`;
}
