/**
 * Structural Units: paragraph-like nodes made of styled runs.
 *
 * One implementation (OoxmlParagraph) serves both WordprocessingML and
 * DrawingML paragraphs; everything format-specific about runs lives in
 * a RunDialect.
 */

import { elementChildren } from "./xml.js";

export interface RunStyle {
  /** Points. */
  size?: number;
  bold?: boolean;
  italic?: boolean;
  fontName?: string;
  /** Dialect underline token, e.g. "single" (Word) or "sng" (DrawingML). */
  underline?: string;
  /** RGB hex, e.g. "FF0000". */
  color?: string;
}

export interface TextRun {
  readonly text: string;
  readonly style: RunStyle;
}

export interface StructuralUnit {
  /** Package part the unit lives in, e.g. "word/header1.xml". */
  readonly partName: string;
  runs(): TextRun[];
  /** Concatenated run text. */
  text(): string;
  /** Replace every run with a single run carrying `text` and `style`. */
  replaceRuns(text: string, style: RunStyle): void;
}

export interface RunDialect {
  readonly ns: string;
  runText(run: Element): string;
  readStyle(run: Element): RunStyle;
  createRun(owner: Document, text: string, style: RunStyle): Element;
  /** Where a run goes when the paragraph has none; null appends. */
  appendAnchor(paragraph: Element): Element | null;
}

export class OoxmlParagraph implements StructuralUnit {
  constructor(
    readonly element: Element,
    private readonly dialect: RunDialect,
    readonly partName: string,
    private readonly onMutate: () => void,
  ) {}

  private runElements(): Element[] {
    return elementChildren(this.element, this.dialect.ns, "r");
  }

  runs(): TextRun[] {
    return this.runElements().map((run) => ({
      text: this.dialect.runText(run),
      style: this.dialect.readStyle(run),
    }));
  }

  text(): string {
    return this.runElements()
      .map((run) => this.dialect.runText(run))
      .join("");
  }

  replaceRuns(text: string, style: RunStyle): void {
    // Snapshot first: removing from the live child list while walking it skips nodes.
    const snapshot = this.runElements();
    const owner = this.element.ownerDocument;
    const replacement = this.dialect.createRun(owner, text, style);
    const anchor = snapshot.length > 0 ? snapshot[0] : this.dialect.appendAnchor(this.element);
    this.element.insertBefore(replacement, anchor);
    for (const old of snapshot) {
      if (old.parentNode === this.element) this.element.removeChild(old);
    }
    this.onMutate();
  }
}

