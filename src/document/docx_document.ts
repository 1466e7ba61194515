/**
 * DOCX adapter: WordprocessingML paragraphs and `w:r` runs.
 *
 * Visiting order: body paragraphs, body tables (row-major, cell paragraphs
 * before nested tables), then per section its header parts and footer parts.
 */

import { NS, attr, childPath, descendants, elementChildren, firstChild } from "./xml.js";
import type { OoxmlPackage } from "./package.js";
import type { CanonicalDocument, DocumentRegion, RegionRole, WalkOptions } from "./canonical.js";
import type { RunDialect, RunStyle } from "./structural_unit.js";

const W = NS.w;
const OFF_VALUES = new Set(["0", "false", "off"]);

function onOff(el: Element | null): boolean | undefined {
  if (!el) return undefined;
  const val = attr(el, W, "val");
  return val === null ? true : !OFF_VALUES.has(val.toLowerCase());
}

function setVal(el: Element, value: string): Element {
  el.setAttributeNS(W, "w:val", value);
  return el;
}

export const WORD_RUNS: RunDialect = {
  ns: W,

  runText(run) {
    let text = "";
    for (const child of elementChildren(run, W)) {
      switch (child.localName) {
        case "t":
          text += child.textContent ?? "";
          break;
        case "tab":
          text += "\t";
          break;
        case "br":
        case "cr":
          text += "\n";
          break;
      }
    }
    return text;
  },

  readStyle(run) {
    const rPr = firstChild(run, W, "rPr");
    if (!rPr) return {};
    const style: RunStyle = {};

    const sz = firstChild(rPr, W, "sz");
    const szVal = sz ? Number(attr(sz, W, "val")) : NaN;
    if (Number.isFinite(szVal) && szVal > 0) style.size = szVal / 2;

    const bold = onOff(firstChild(rPr, W, "b"));
    if (bold !== undefined) style.bold = bold;
    const italic = onOff(firstChild(rPr, W, "i"));
    if (italic !== undefined) style.italic = italic;

    const fonts = firstChild(rPr, W, "rFonts");
    const font = fonts ? attr(fonts, W, "ascii") ?? attr(fonts, W, "hAnsi") : null;
    if (font) style.fontName = font;

    const u = firstChild(rPr, W, "u");
    if (u) style.underline = attr(u, W, "val") ?? "single";

    const color = firstChild(rPr, W, "color");
    const colorVal = color ? attr(color, W, "val") : null;
    if (colorVal) style.color = colorVal;

    return style;
  },

  createRun(owner, text, style) {
    const run = owner.createElementNS(W, "w:r");
    const props: Element[] = [];

    // CT_RPr child order: rFonts, b, i, color, sz, u
    if (style.fontName !== undefined) {
      const fonts = owner.createElementNS(W, "w:rFonts");
      fonts.setAttributeNS(W, "w:ascii", style.fontName);
      fonts.setAttributeNS(W, "w:hAnsi", style.fontName);
      props.push(fonts);
    }
    if (style.bold !== undefined) {
      props.push(setVal(owner.createElementNS(W, "w:b"), style.bold ? "1" : "0"));
    }
    if (style.italic !== undefined) {
      props.push(setVal(owner.createElementNS(W, "w:i"), style.italic ? "1" : "0"));
    }
    if (style.color !== undefined) {
      props.push(setVal(owner.createElementNS(W, "w:color"), style.color));
    }
    if (style.size !== undefined) {
      props.push(setVal(owner.createElementNS(W, "w:sz"), String(Math.round(style.size * 2))));
    }
    if (style.underline !== undefined) {
      props.push(setVal(owner.createElementNS(W, "w:u"), style.underline));
    }
    if (props.length > 0) {
      const rPr = owner.createElementNS(W, "w:rPr");
      for (const p of props) rPr.appendChild(p);
      run.appendChild(rPr);
    }

    const pieces = text.split(/(\t|\n)/).filter((piece, i) => piece !== "" || i === 0);
    for (const piece of pieces) {
      if (piece === "\t") {
        run.appendChild(owner.createElementNS(W, "w:tab"));
      } else if (piece === "\n") {
        run.appendChild(owner.createElementNS(W, "w:br"));
      } else {
        const t = owner.createElementNS(W, "w:t");
        t.setAttributeNS(NS.xml, "xml:space", "preserve");
        t.appendChild(owner.createTextNode(piece));
        run.appendChild(t);
      }
    }
    return run;
  },

  appendAnchor() {
    return null;
  },
};

const MAIN_PART = "word/document.xml";

export class WordDocument implements CanonicalDocument {
  readonly kind = "docx";
  readonly dialect = WORD_RUNS;

  constructor(private readonly pkg: OoxmlPackage) {}

  *regions(options: WalkOptions): Generator<DocumentRegion> {
    const mainName = this.pkg.mainPartName(MAIN_PART);
    const main = this.pkg.part(mainName);
    if (!main) throw new Error(`DOCX package has no main document part (${mainName})`);

    const body = childPath(main.documentElement, W, "body");
    if (body) yield containerRegion(mainName, "body", body);

    if (!options.scanHeadersFooters) return;
    for (const { partName, role } of this.headerFooterParts(mainName, main)) {
      const part = this.pkg.part(partName);
      if (part) yield containerRegion(partName, role, part.documentElement);
    }
  }

  /** Header then footer parts of every section, first reference wins. */
  private headerFooterParts(
    mainName: string,
    main: Document,
  ): Array<{ partName: string; role: RegionRole }> {
    const seen = new Set<string>();
    const out: Array<{ partName: string; role: RegionRole }> = [];
    for (const sectPr of descendants(main, W, "sectPr")) {
      for (const role of ["header", "footer"] as const) {
        for (const ref of elementChildren(sectPr, W, `${role}Reference`)) {
          const id = attr(ref, NS.r, "id");
          const target = id ? this.pkg.relationshipTarget(mainName, id) : null;
          if (!target || seen.has(target)) continue;
          seen.add(target);
          out.push({ partName: target, role });
        }
      }
    }
    return out;
  }

  markDirty(partName: string): void {
    this.pkg.markDirty(partName);
  }

  toBuffer(): Buffer {
    return this.pkg.toBuffer();
  }
}

function containerRegion(partName: string, role: RegionRole, container: Element): DocumentRegion {
  return { partName, role, paragraphs: () => containerParagraphs(container) };
}

/** Paragraphs of a block container (body, cell, header), then its tables. */
function* containerParagraphs(container: Element): Generator<Element> {
  yield* elementChildren(container, W, "p");
  for (const table of elementChildren(container, W, "tbl")) {
    yield* tableParagraphs(table);
  }
}

function* tableParagraphs(table: Element): Generator<Element> {
  for (const row of elementChildren(table, W, "tr")) {
    for (const cell of elementChildren(row, W, "tc")) {
      yield* containerParagraphs(cell);
    }
  }
}
