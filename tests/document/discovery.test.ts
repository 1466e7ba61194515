import { describe, it, expect } from "vitest";
import { loadCanonicalDocument } from "../../src/document/canonical.js";
import { baseTokenNames, discoverTokens } from "../../src/document/discovery.js";
import { ap, ar, buildDocx, buildPptx, partText, sectPr, sp, wp, wr } from "../helpers/ooxml.js";

describe("discoverTokens", () => {
  it("collects trimmed raw expressions from every unit", () => {
    const doc = loadCanonicalDocument(
      buildDocx({
        body:
          wp(wr("{{A}} and {{ A }}")) +
          wp(wr("{{B|upper}}")) +
          wp(wr("{{C ?: none}}")) +
          sectPr({ headers: ["rIdH"] }),
        parts: [{ id: "rIdH", kind: "header", xml: wp(wr("{{D}}")) }],
      }),
      "docx",
    );

    expect([...discoverTokens(doc)].sort()).toEqual(["A", "B|upper", "C ?: none", "D"]);
  });

  it("finds tokens split across runs", () => {
    const doc = loadCanonicalDocument(buildDocx({ body: wp(wr("{{NA", "<w:b/>"), wr("ME}}")) }), "docx");
    expect([...discoverTokens(doc)]).toEqual(["NAME"]);
  });

  it("does not pick up defaults containing characters outside the token alphabet", () => {
    const doc = loadCanonicalDocument(buildDocx({ body: wp(wr("{{X?:N/A}} {{Y?:none}}")) }), "docx");
    expect([...discoverTokens(doc)]).toEqual(["Y?:none"]);
  });

  it("leaves the document unchanged", () => {
    const buffer = buildDocx({ body: wp(wr("{{NA"), wr("ME}}")) });
    const doc = loadCanonicalDocument(buffer, "docx");

    discoverTokens(doc);

    expect(partText(doc.toBuffer(), "word/document.xml")).toBe(partText(buffer, "word/document.xml"));
  });

  it("honours the walk options", () => {
    const doc = loadCanonicalDocument(
      buildPptx({
        master: sp(ap(ar("{{FOOTER}}"))),
        slides: [{ shapes: sp(ap(ar("{{TITLE}}"))), notes: ap(ar("{{NOTE}}")) }],
      }),
      "pptx",
    );

    expect([...discoverTokens(doc)]).toEqual(["FOOTER", "TITLE", "NOTE"]);
    expect([...discoverTokens(doc, { scanMasters: false, scanHeadersFooters: true })]).toEqual([
      "TITLE",
      "NOTE",
    ]);
  });
});

describe("baseTokenNames", () => {
  it("strips filters and defaults", () => {
    expect([...baseTokenNames(["A", "B|upper", "C ?: none", "A|trim"])]).toEqual(["A", "B", "C"]);
  });
});
