/**
 * Token Filters: the fixed registry behind `{{Column|filter|...}}`.
 *
 * Every filter is a pure string → string function and never throws:
 * input it cannot interpret passes through unchanged.
 */

export type TokenFilter = (value: string) => string;

const NUMBER_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Spanish-style currency: "1234,5" → "1.234,50 €".
 * Dots in the input are thousand separators, the comma is the decimal mark.
 */
export function formatEuros(value: string): string {
  const normalized = value.replace(/\./g, "").replace(/,/g, ".").trim();
  if (!NUMBER_RE.test(normalized)) return value;
  const amount = Number(normalized);
  if (!Number.isFinite(amount)) return value;

  const fixed = Math.abs(amount).toFixed(2);
  const [intPart, fracPart] = fixed.split(".");
  const grouped = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, ".");
  const sign = amount < 0 && Number(fixed) !== 0 ? "-" : "";
  return `${sign}${grouped},${fracPart} €`;
}

const DATE_FORMATS: Array<{ re: RegExp; order: "ymd" | "dmy" }> = [
  { re: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: "ymd" },
  { re: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: "dmy" },
  { re: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: "dmy" },
  { re: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, order: "ymd" },
];

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

/** Normalize a date to DD/MM/YYYY; unknown shapes come back trimmed. */
export function formatDayMonthYear(value: string): string {
  const s = value.trim();
  if (!s) return "";
  for (const { re, order } of DATE_FORMATS) {
    const m = re.exec(s);
    if (!m) continue;
    const [year, month, day] =
      order === "ymd"
        ? [Number(m[1]), Number(m[2]), Number(m[3])]
        : [Number(m[3]), Number(m[2]), Number(m[1])];
    if (!isCalendarDate(year, month, day)) continue;
    return `${String(day).padStart(2, "0")}/${String(month).padStart(2, "0")}/${String(year).padStart(4, "0")}`;
  }
  return s;
}

export const FILTERS: Readonly<Record<string, TokenFilter>> = {
  trim: (s) => s.trim(),
  upper: (s) => s.toUpperCase(),
  lower: (s) => s.toLowerCase(),
  euros: formatEuros,
  dmy: formatDayMonthYear,
};

export function getFilter(name: string): TokenFilter | undefined {
  return Object.prototype.hasOwnProperty.call(FILTERS, name) ? FILTERS[name] : undefined;
}

/** Apply filters left to right, skipping names the registry does not know. */
export function applyFilters(value: string, names: readonly string[]): string {
  let out = value;
  for (const name of names) {
    const fn = getFilter(name);
    if (fn) out = fn(out);
  }
  return out;
}
