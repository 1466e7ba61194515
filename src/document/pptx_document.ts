/**
 * PPTX adapter: DrawingML text bodies and `a:r` runs.
 *
 * Visiting order: slide masters and their layouts (optional), then per
 * slide its shape tree followed by the speaker-notes body placeholder.
 * Within a shape tree: text frames, table cells row-major, and group
 * shapes recursively, in z-order.
 */

import { NS, attr, childPath, elementChildren, firstChild } from "./xml.js";
import type { OoxmlPackage } from "./package.js";
import type { CanonicalDocument, DocumentRegion, RegionRole, WalkOptions } from "./canonical.js";
import type { RunDialect, RunStyle } from "./structural_unit.js";

const A = NS.a;
const P = NS.p;

const NOTES_SLIDE_REL =
  "http://schemas.openxmlformats.org/officeDocument/2006/relationships/notesSlide";

function flag(value: string | null): boolean | undefined {
  if (value === null) return undefined;
  return value === "1" || value.toLowerCase() === "true";
}

export const DRAWING_RUNS: RunDialect = {
  ns: A,

  runText(run) {
    return elementChildren(run, A, "t")
      .map((t) => t.textContent ?? "")
      .join("");
  },

  readStyle(run) {
    const rPr = firstChild(run, A, "rPr");
    if (!rPr) return {};
    const style: RunStyle = {};

    const sz = Number(attr(rPr, null, "sz"));
    if (Number.isFinite(sz) && sz > 0) style.size = sz / 100;

    const bold = flag(attr(rPr, null, "b"));
    if (bold !== undefined) style.bold = bold;
    const italic = flag(attr(rPr, null, "i"));
    if (italic !== undefined) style.italic = italic;

    const underline = attr(rPr, null, "u");
    if (underline !== null) style.underline = underline;

    const latin = firstChild(rPr, A, "latin");
    const typeface = latin ? attr(latin, null, "typeface") : null;
    if (typeface) style.fontName = typeface;

    const rgb = childPath(rPr, A, "solidFill", "srgbClr");
    const color = rgb ? attr(rgb, null, "val") : null;
    if (color) style.color = color;

    return style;
  },

  createRun(owner, text, style) {
    const run = owner.createElementNS(A, "a:r");
    const rPr = owner.createElementNS(A, "a:rPr");
    let hasProps = false;

    if (style.size !== undefined) {
      rPr.setAttribute("sz", String(Math.round(style.size * 100)));
      hasProps = true;
    }
    if (style.bold !== undefined) {
      rPr.setAttribute("b", style.bold ? "1" : "0");
      hasProps = true;
    }
    if (style.italic !== undefined) {
      rPr.setAttribute("i", style.italic ? "1" : "0");
      hasProps = true;
    }
    if (style.underline !== undefined) {
      rPr.setAttribute("u", style.underline);
      hasProps = true;
    }
    // CT_TextCharacterProperties child order: fill before latin
    if (style.color !== undefined) {
      const fill = owner.createElementNS(A, "a:solidFill");
      const rgb = owner.createElementNS(A, "a:srgbClr");
      rgb.setAttribute("val", style.color);
      fill.appendChild(rgb);
      rPr.appendChild(fill);
      hasProps = true;
    }
    if (style.fontName !== undefined) {
      const latin = owner.createElementNS(A, "a:latin");
      latin.setAttribute("typeface", style.fontName);
      rPr.appendChild(latin);
      hasProps = true;
    }
    if (hasProps) run.appendChild(rPr);

    const t = owner.createElementNS(A, "a:t");
    t.appendChild(owner.createTextNode(text));
    run.appendChild(t);
    return run;
  },

  appendAnchor(paragraph) {
    return firstChild(paragraph, A, "endParaRPr");
  },
};

const MAIN_PART = "ppt/presentation.xml";

export class SlideDeck implements CanonicalDocument {
  readonly kind = "pptx";
  readonly dialect = DRAWING_RUNS;

  constructor(private readonly pkg: OoxmlPackage) {}

  *regions(options: WalkOptions): Generator<DocumentRegion> {
    const mainName = this.pkg.mainPartName(MAIN_PART);
    const presentation = this.pkg.part(mainName);
    if (!presentation) throw new Error(`PPTX package has no presentation part (${mainName})`);
    const root = presentation.documentElement;

    if (options.scanMasters) {
      for (const masterName of this.listedParts(mainName, root, "sldMasterIdLst", "sldMasterId")) {
        const master = this.shapeTreeRegion(masterName, "master");
        if (master) yield master;
        const masterPart = this.pkg.part(masterName);
        if (!masterPart) continue;
        const layouts = this.listedParts(masterName, masterPart.documentElement, "sldLayoutIdLst", "sldLayoutId");
        for (const layoutName of layouts) {
          const layout = this.shapeTreeRegion(layoutName, "layout");
          if (layout) yield layout;
        }
      }
    }

    for (const slideName of this.listedParts(mainName, root, "sldIdLst", "sldId")) {
      const slide = this.shapeTreeRegion(slideName, "slide");
      if (slide) yield slide;

      const notesName = this.pkg
        .relationships(slideName)
        .find((r) => r.type === NOTES_SLIDE_REL)?.target;
      const notes = notesName ? this.notesRegion(notesName) : null;
      if (notes) yield notes;
    }
  }

  /** Parts referenced by an id list such as p:sldIdLst/p:sldId[@r:id]. */
  private listedParts(ownerName: string, owner: Element, listName: string, itemName: string): string[] {
    const list = firstChild(owner, P, listName);
    if (!list) return [];
    const out: string[] = [];
    for (const item of elementChildren(list, P, itemName)) {
      const id = attr(item, NS.r, "id");
      const target = id ? this.pkg.relationshipTarget(ownerName, id) : null;
      if (target && this.pkg.has(target)) out.push(target);
    }
    return out;
  }

  private shapeTreeRegion(partName: string, role: RegionRole): DocumentRegion | null {
    const part = this.pkg.part(partName);
    const tree = part ? childPath(part.documentElement, P, "cSld", "spTree") : null;
    if (!tree) return null;
    return { partName, role, paragraphs: () => shapeTreeParagraphs(tree) };
  }

  private notesRegion(partName: string): DocumentRegion | null {
    const part = this.pkg.part(partName);
    const tree = part ? childPath(part.documentElement, P, "cSld", "spTree") : null;
    if (!tree) return null;
    const body = elementChildren(tree, P, "sp").find(isBodyPlaceholder);
    const txBody = body ? firstChild(body, P, "txBody") : null;
    if (!txBody) return null;
    return { partName, role: "notes", paragraphs: () => textBodyParagraphs(txBody) };
  }

  markDirty(partName: string): void {
    this.pkg.markDirty(partName);
  }

  toBuffer(): Buffer {
    return this.pkg.toBuffer();
  }
}

function isBodyPlaceholder(shape: Element): boolean {
  const ph = childPath(shape, P, "nvSpPr", "nvPr", "ph");
  return ph !== null && attr(ph, null, "type") === "body";
}

function* textBodyParagraphs(txBody: Element): Generator<Element> {
  yield* elementChildren(txBody, A, "p");
}

function* shapeTreeParagraphs(tree: Element): Generator<Element> {
  for (const shape of elementChildren(tree, P)) {
    switch (shape.localName) {
      case "sp": {
        const txBody = firstChild(shape, P, "txBody");
        if (txBody) yield* textBodyParagraphs(txBody);
        break;
      }
      case "graphicFrame": {
        const table = childPath(shape, A, "graphic", "graphicData", "tbl");
        if (table) yield* tableParagraphs(table);
        break;
      }
      case "grpSp":
        yield* shapeTreeParagraphs(shape);
        break;
    }
  }
}

function* tableParagraphs(table: Element): Generator<Element> {
  for (const row of elementChildren(table, A, "tr")) {
    for (const cell of elementChildren(row, A, "tc")) {
      const txBody = firstChild(cell, A, "txBody");
      if (txBody) yield* textBodyParagraphs(txBody);
    }
  }
}
