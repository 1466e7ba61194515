/**
 * Canonical Documents: the two editable container kinds (DOCX, PPTX).
 *
 * An adapter only knows where paragraphs live in its package and how its
 * runs are encoded; walking, substitution and discovery are written once
 * against this interface (see walker.ts).
 */

import { readFileSync } from "fs";
import path from "path";
import { OoxmlPackage } from "./package.js";
import { WordDocument } from "./docx_document.js";
import { SlideDeck } from "./pptx_document.js";
import { UnsupportedFormatError } from "../shared/errors.js";
import type { RunDialect } from "./structural_unit.js";
import type { DocumentKind } from "../shared/types.js";

export interface WalkOptions {
  /** PPTX: visit slide masters and their layouts first. */
  scanMasters: boolean;
  /** DOCX: visit section headers and footers after the body. */
  scanHeadersFooters: boolean;
}

export const DEFAULT_WALK_OPTIONS: WalkOptions = {
  scanMasters: true,
  scanHeadersFooters: true,
};

export type RegionRole =
  | "master"
  | "layout"
  | "body"
  | "header"
  | "footer"
  | "slide"
  | "notes";

/** A run of paragraphs from one package part, in visiting order. */
export interface DocumentRegion {
  readonly partName: string;
  readonly role: RegionRole;
  paragraphs(): Generator<Element>;
}

export interface CanonicalDocument {
  readonly kind: DocumentKind;
  readonly dialect: RunDialect;
  regions(options: WalkOptions): Generator<DocumentRegion>;
  markDirty(partName: string): void;
  toBuffer(): Buffer;
}

export function documentKindOf(filePath: string): DocumentKind | null {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".docx") return "docx";
  if (ext === ".pptx") return "pptx";
  return null;
}

export function loadCanonicalDocument(buffer: Buffer, kind: DocumentKind): CanonicalDocument {
  const pkg = OoxmlPackage.fromBuffer(buffer);
  return kind === "docx" ? new WordDocument(pkg) : new SlideDeck(pkg);
}

export function openCanonicalDocument(filePath: string): CanonicalDocument {
  const kind = documentKindOf(filePath);
  if (!kind) throw new UnsupportedFormatError(path.extname(filePath).toLowerCase());
  return loadCanonicalDocument(readFileSync(filePath), kind);
}
