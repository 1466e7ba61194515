import { describe, it, expect } from "vitest";
import { applyFilters, formatDayMonthYear, formatEuros, getFilter } from "../../src/tokens/filters.js";

describe("formatEuros", () => {
  it("formats a comma-decimal amount with dot thousands", () => {
    expect(formatEuros("1234,5")).toBe("1.234,50 €");
  });

  it("treats dots as thousand separators", () => {
    expect(formatEuros("1.234.567,891")).toBe("1.234.567,89 €");
  });

  it("keeps small amounts ungrouped", () => {
    expect(formatEuros("7")).toBe("7,00 €");
    expect(formatEuros("999,999")).toBe("1.000,00 €");
  });

  it("formats negatives", () => {
    expect(formatEuros("-1500")).toBe("-1.500,00 €");
  });

  it("passes unparseable input through unchanged", () => {
    expect(formatEuros("n/a")).toBe("n/a");
    expect(formatEuros("")).toBe("");
  });
});

describe("formatDayMonthYear", () => {
  it.each([
    ["2024-03-07", "07/03/2024"],
    ["7/3/2024", "07/03/2024"],
    ["07-03-2024", "07/03/2024"],
    ["2024/3/7", "07/03/2024"],
  ])("parses %s", (input, expected) => {
    expect(formatDayMonthYear(input)).toBe(expected);
  });

  it("returns empty for blank input", () => {
    expect(formatDayMonthYear("   ")).toBe("");
  });

  it("rejects impossible calendar dates", () => {
    expect(formatDayMonthYear("2023-02-29")).toBe("2023-02-29");
    expect(formatDayMonthYear("31/04/2024")).toBe("31/04/2024");
  });

  it("accepts leap days", () => {
    expect(formatDayMonthYear("2024-02-29")).toBe("29/02/2024");
  });

  it("returns other text trimmed", () => {
    expect(formatDayMonthYear("  next week ")).toBe("next week");
  });
});

describe("filter registry", () => {
  it("applies filters left to right", () => {
    expect(applyFilters("  ana  ", ["trim", "upper"])).toBe("ANA");
  });

  it("skips unknown filter names", () => {
    expect(applyFilters("Ana", ["shout", "lower"])).toBe("ana");
  });

  it("does not resolve inherited object members as filters", () => {
    expect(getFilter("toString")).toBeUndefined();
    expect(applyFilters("x", ["constructor"])).toBe("x");
  });
});
