/**
 * Minimal OOXML package builders for sample templates and test fixtures.
 *
 * Callers write the interesting XML (paragraphs, shapes) by hand; the
 * builders add the package plumbing: content types, relationships,
 * presentation/master/layout/notes parts.
 */

import PizZip from "pizzip";

export const W_NS = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";
export const A_NS = "http://schemas.openxmlformats.org/drawingml/2006/main";
export const P_NS = "http://schemas.openxmlformats.org/presentationml/2006/main";
export const R_NS = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";

const REL_BASE = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";
const PKG_RELS = "http://schemas.openxmlformats.org/package/2006/relationships";
const CT_NS = "http://schemas.openxmlformats.org/package/2006/content-types";
const XML_DECL = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

function escapeText(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

interface Rel {
  id: string;
  type: string;
  target: string;
}

function relsXml(rels: Rel[]): string {
  const body = rels
    .map((r) => `<Relationship Id="${r.id}" Type="${REL_BASE}/${r.type}" Target="${r.target}"/>`)
    .join("");
  return `${XML_DECL}<Relationships xmlns="${PKG_RELS}">${body}</Relationships>`;
}

function contentTypes(overrides: Array<[string, string]>): string {
  const body = overrides
    .map(([part, type]) => `<Override PartName="/${part}" ContentType="${type}"/>`)
    .join("");
  return (
    `${XML_DECL}<Types xmlns="${CT_NS}">` +
    `<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>` +
    `<Default Extension="xml" ContentType="application/xml"/>` +
    `${body}</Types>`
  );
}

// ── WordprocessingML ─────────────────────────────────────────────────

/** `<w:r>` with optional raw `<w:rPr>` content. */
export function wr(text: string, rPr = ""): string {
  const props = rPr ? `<w:rPr>${rPr}</w:rPr>` : "";
  return `<w:r>${props}<w:t xml:space="preserve">${escapeText(text)}</w:t></w:r>`;
}

export function wp(...runs: string[]): string {
  return `<w:p>${runs.join("")}</w:p>`;
}

export function wtbl(rows: string[][]): string {
  const tr = rows.map((cells) => `<w:tr>${cells.map((c) => `<w:tc>${c}</w:tc>`).join("")}</w:tr>`);
  return `<w:tbl>${tr.join("")}</w:tbl>`;
}

export interface DocxHeaderFooter {
  id: string;
  kind: "header" | "footer";
  /** Inner XML of w:hdr / w:ftr. */
  xml: string;
}

export interface DocxSpec {
  /** Inner XML of w:body. */
  body: string;
  parts?: DocxHeaderFooter[];
}

const W_ROOT_ATTRS = `xmlns:w="${W_NS}" xmlns:r="${R_NS}"`;

export function buildDocx(spec: DocxSpec): Buffer {
  const zip = new PizZip();
  const parts = spec.parts ?? [];

  const overrides: Array<[string, string]> = [
    ["word/document.xml", "application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"],
  ];
  const rels: Rel[] = [];
  parts.forEach((part, i) => {
    const name = `${part.kind}${i + 1}.xml`;
    const root = part.kind === "header" ? "w:hdr" : "w:ftr";
    zip.file(`word/${name}`, `${XML_DECL}<${root} ${W_ROOT_ATTRS}>${part.xml}</${root}>`);
    rels.push({ id: part.id, type: part.kind, target: name });
    overrides.push([
      `word/${name}`,
      `application/vnd.openxmlformats-officedocument.wordprocessingml.${part.kind}+xml`,
    ]);
  });

  zip.file("[Content_Types].xml", contentTypes(overrides));
  zip.file("_rels/.rels", relsXml([{ id: "rId1", type: "officeDocument", target: "word/document.xml" }]));
  zip.file(
    "word/document.xml",
    `${XML_DECL}<w:document ${W_ROOT_ATTRS}><w:body>${spec.body}</w:body></w:document>`,
  );
  zip.file("word/_rels/document.xml.rels", relsXml(rels));
  return Buffer.from(zip.generate({ type: "nodebuffer" }));
}

/** `<w:sectPr>` referencing header/footer relationship ids. */
export function sectPr(refs: { headers?: string[]; footers?: string[] }): string {
  const h = (refs.headers ?? []).map((id) => `<w:headerReference w:type="default" r:id="${id}"/>`);
  const f = (refs.footers ?? []).map((id) => `<w:footerReference w:type="default" r:id="${id}"/>`);
  return `<w:sectPr>${h.join("")}${f.join("")}</w:sectPr>`;
}

// ── PresentationML / DrawingML ───────────────────────────────────────

/** `<a:r>` with optional raw `<a:rPr ...>` attributes and children. */
export function ar(text: string, rPrAttrs = "", rPrChildren = ""): string {
  const props = rPrAttrs || rPrChildren ? `<a:rPr${rPrAttrs ? ` ${rPrAttrs}` : ""}>${rPrChildren}</a:rPr>` : "";
  return `<a:r>${props}<a:t>${escapeText(text)}</a:t></a:r>`;
}

export function ap(...runs: string[]): string {
  return `<a:p>${runs.join("")}</a:p>`;
}

let shapeId = 10;

export function sp(...paragraphs: string[]): string {
  const id = shapeId++;
  return (
    `<p:sp><p:nvSpPr><p:cNvPr id="${id}" name="Text ${id}"/><p:cNvSpPr/><p:nvPr/></p:nvSpPr>` +
    `<p:spPr/><p:txBody><a:bodyPr/><a:lstStyle/>${paragraphs.join("")}</p:txBody></p:sp>`
  );
}

export function grpSp(...shapes: string[]): string {
  const id = shapeId++;
  return (
    `<p:grpSp><p:nvGrpSpPr><p:cNvPr id="${id}" name="Group ${id}"/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr>` +
    `<p:grpSpPr/>${shapes.join("")}</p:grpSp>`
  );
}

/** Table graphic frame; each cell holds one paragraph. */
export function tableFrame(rows: string[][]): string {
  const id = shapeId++;
  const tr = rows
    .map(
      (cells) =>
        `<a:tr h="370840">${cells
          .map((p) => `<a:tc><a:txBody><a:bodyPr/><a:lstStyle/>${p}</a:txBody><a:tcPr/></a:tc>`)
          .join("")}</a:tr>`,
    )
    .join("");
  return (
    `<p:graphicFrame><p:nvGraphicFramePr><p:cNvPr id="${id}" name="Table ${id}"/><p:cNvGraphicFramePr/><p:nvPr/></p:nvGraphicFramePr>` +
    `<p:xfrm><a:off x="0" y="0"/><a:ext cx="0" cy="0"/></p:xfrm>` +
    `<a:graphic><a:graphicData uri="http://schemas.openxmlformats.org/drawingml/2006/table"><a:tbl><a:tblGrid/>${tr}</a:tbl></a:graphicData></a:graphic>` +
    `</p:graphicFrame>`
  );
}

const P_ROOT_ATTRS = `xmlns:a="${A_NS}" xmlns:r="${R_NS}" xmlns:p="${P_NS}"`;

function shapeTreePart(root: string, shapes: string): string {
  return (
    `${XML_DECL}<p:${root} ${P_ROOT_ATTRS}><p:cSld><p:spTree>` +
    `<p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr><p:grpSpPr/>` +
    `${shapes}</p:spTree></p:cSld></p:${root}>`
  );
}

function notesPart(paragraphs: string): string {
  const bodyPlaceholder =
    `<p:sp><p:nvSpPr><p:cNvPr id="3" name="Notes Placeholder"/><p:cNvSpPr/>` +
    `<p:nvPr><p:ph type="body" idx="1"/></p:nvPr></p:nvSpPr><p:spPr/>` +
    `<p:txBody><a:bodyPr/><a:lstStyle/>${paragraphs}</p:txBody></p:sp>`;
  return shapeTreePart("notes", bodyPlaceholder);
}

export interface SlideSpec {
  /** Shapes inside p:spTree. */
  shapes: string;
  /** Paragraphs of the notes body placeholder. */
  notes?: string;
}

export interface PptxSpec {
  master?: string;
  layout?: string;
  slides: SlideSpec[];
}

const PML = "application/vnd.openxmlformats-officedocument.presentationml";

export function buildPptx(spec: PptxSpec): Buffer {
  const zip = new PizZip();
  const overrides: Array<[string, string]> = [
    ["ppt/presentation.xml", `${PML}.presentation.main+xml`],
    ["ppt/slideMasters/slideMaster1.xml", `${PML}.slideMaster+xml`],
    ["ppt/slideLayouts/slideLayout1.xml", `${PML}.slideLayout+xml`],
  ];

  zip.file("_rels/.rels", relsXml([{ id: "rId1", type: "officeDocument", target: "ppt/presentation.xml" }]));

  const presRels: Rel[] = [{ id: "rId1", type: "slideMaster", target: "slideMasters/slideMaster1.xml" }];
  const sldIds: string[] = [];
  spec.slides.forEach((slide, i) => {
    const n = i + 1;
    const rId = `rId${n + 1}`;
    presRels.push({ id: rId, type: "slide", target: `slides/slide${n}.xml` });
    sldIds.push(`<p:sldId id="${255 + n}" r:id="${rId}"/>`);

    const slideRels: Rel[] = [{ id: "rId1", type: "slideLayout", target: "../slideLayouts/slideLayout1.xml" }];
    if (slide.notes !== undefined) {
      slideRels.push({ id: "rId2", type: "notesSlide", target: `../notesSlides/notesSlide${n}.xml` });
      zip.file(`ppt/notesSlides/notesSlide${n}.xml`, notesPart(slide.notes));
      overrides.push([`ppt/notesSlides/notesSlide${n}.xml`, `${PML}.notesSlide+xml`]);
    }
    zip.file(`ppt/slides/slide${n}.xml`, shapeTreePart("sld", slide.shapes));
    zip.file(`ppt/slides/_rels/slide${n}.xml.rels`, relsXml(slideRels));
    overrides.push([`ppt/slides/slide${n}.xml`, `${PML}.slide+xml`]);
  });

  zip.file(
    "ppt/presentation.xml",
    `${XML_DECL}<p:presentation ${P_ROOT_ATTRS}>` +
      `<p:sldMasterIdLst><p:sldMasterId id="2147483648" r:id="rId1"/></p:sldMasterIdLst>` +
      `<p:sldIdLst>${sldIds.join("")}</p:sldIdLst>` +
      `<p:sldSz cx="9144000" cy="6858000"/><p:notesSz cx="6858000" cy="9144000"/>` +
      `</p:presentation>`,
  );
  zip.file("ppt/_rels/presentation.xml.rels", relsXml(presRels));

  zip.file(
    "ppt/slideMasters/slideMaster1.xml",
    shapeTreePart("sldMaster", spec.master ?? "").replace(
      "</p:cSld>",
      `</p:cSld><p:sldLayoutIdLst><p:sldLayoutId id="2147483649" r:id="rId1"/></p:sldLayoutIdLst>`,
    ),
  );
  zip.file(
    "ppt/slideMasters/_rels/slideMaster1.xml.rels",
    relsXml([{ id: "rId1", type: "slideLayout", target: "../slideLayouts/slideLayout1.xml" }]),
  );
  zip.file("ppt/slideLayouts/slideLayout1.xml", shapeTreePart("sldLayout", spec.layout ?? ""));
  zip.file(
    "ppt/slideLayouts/_rels/slideLayout1.xml.rels",
    relsXml([{ id: "rId1", type: "slideMaster", target: "../slideMasters/slideMaster1.xml" }]),
  );

  zip.file("[Content_Types].xml", contentTypes(overrides));
  return Buffer.from(zip.generate({ type: "nodebuffer" }));
}

/** Read one part of a package back as text. */
export function partText(buffer: Buffer, partName: string): string {
  const entry = new PizZip(buffer).file(partName);
  if (!entry) throw new Error(`missing part ${partName}`);
  return entry.asText();
}
