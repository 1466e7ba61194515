import { describe, it, expect } from "vitest";
import { evaluate, parseExpression, tokenBaseName, tokenFor } from "../../src/tokens/evaluator.js";
import { rowFromRecord } from "../../src/shared/types.js";

const row = rowFromRecord({ NAME: "Ana", AMOUNT: "1234,5", CITY: "  sevilla ", EMPTY: "" });

describe("parseExpression", () => {
  it("splits column, filters and default", () => {
    expect(parseExpression("NAME | trim|upper ?: none")).toEqual({
      baseName: "NAME",
      filters: ["trim", "upper"],
      defaultValue: "none",
    });
  });

  it("splits the default at the first separator only", () => {
    expect(parseExpression("A?:x?:y").defaultValue).toBe("x?:y");
  });

  it("degrades to a bare column reference", () => {
    expect(parseExpression("Plain Column")).toEqual({ baseName: "Plain Column", filters: [] });
  });
});

describe("evaluate", () => {
  it("returns the column value", () => {
    expect(evaluate("NAME", row)).toBe("Ana");
  });

  it("formats euros", () => {
    expect(evaluate("AMOUNT|euros", row)).toBe("1.234,50 €");
  });

  it("uses the default for a missing column", () => {
    expect(evaluate("MISSING?:N/A", row)).toBe("N/A");
  });

  it("uses the default for a blank value", () => {
    expect(evaluate("EMPTY?:none", row)).toBe("none");
  });

  it("does not filter the default", () => {
    expect(evaluate("MISSING|upper?:n/a", row)).toBe("n/a");
  });

  it("returns empty for a missing column without default", () => {
    expect(evaluate("MISSING|upper", row)).toBe("");
  });

  it("ignores unknown filters", () => {
    expect(evaluate("NAME|sparkle", row)).toBe("Ana");
  });

  it("returns empty for an empty column name", () => {
    expect(evaluate("|upper", row)).toBe("");
    expect(evaluate("?:fallback", row)).toBe("fallback");
  });

  it("applies filters to present values", () => {
    // createRow trims values, so the row already holds "sevilla"
    expect(evaluate("CITY|upper", row)).toBe("SEVILLA");
  });
});

describe("token helpers", () => {
  it("reduces expressions to base names", () => {
    expect(tokenBaseName("B|upper")).toBe("B");
    expect(tokenBaseName("C ?: x")).toBe("C");
  });

  it("builds the bare token form", () => {
    expect(tokenFor("NAME")).toBe("{{NAME}}");
  });
});
