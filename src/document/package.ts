/**
 * OOXML Package: zip container access for DOCX/PPTX.
 *
 * Parts are parsed lazily and cached; only parts marked dirty are
 * re-serialized when the package is written back.
 */

import path from "path";
import PizZip from "pizzip";
import { NS, attr, descendants, parseXml, serializeXml } from "./xml.js";

export interface Relationship {
  id: string;
  type: string;
  /** Part name inside the package (no leading slash). */
  target: string;
}

const OFFICE_DOCUMENT_REL =
  "http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument";

export class OoxmlPackage {
  private parts = new Map<string, Document>();
  private dirty = new Set<string>();

  private constructor(private readonly zip: PizZip) {}

  static fromBuffer(buffer: Buffer): OoxmlPackage {
    return new OoxmlPackage(new PizZip(buffer));
  }

  has(partName: string): boolean {
    return this.zip.file(partName) !== null;
  }

  /** Parsed part, or null if the package does not contain it. */
  part(partName: string): Document | null {
    const cached = this.parts.get(partName);
    if (cached) return cached;
    const entry = this.zip.file(partName);
    if (!entry) return null;
    const doc = parseXml(entry.asText(), partName);
    this.parts.set(partName, doc);
    return doc;
  }

  markDirty(partName: string): void {
    this.dirty.add(partName);
  }

  /** Relationships declared by a part (external targets excluded). */
  relationships(partName: string): Relationship[] {
    const dir = path.posix.dirname(partName);
    const relsName = path.posix.join(dir, "_rels", `${path.posix.basename(partName)}.rels`);
    const rels = this.part(relsName);
    if (!rels) return [];

    const out: Relationship[] = [];
    for (const el of descendants(rels, NS.rel, "Relationship")) {
      if (attr(el, null, "TargetMode") === "External") continue;
      const id = attr(el, null, "Id");
      const type = attr(el, null, "Type");
      const target = attr(el, null, "Target");
      if (!id || !type || !target) continue;
      out.push({ id, type, target: resolveTarget(dir, target) });
    }
    return out;
  }

  relationshipTarget(partName: string, id: string): string | null {
    return this.relationships(partName).find((r) => r.id === id)?.target ?? null;
  }

  /** Main document part from the package root relationships. */
  mainPartName(fallback: string): string {
    const rootRels = this.relationships("");
    return rootRels.find((r) => r.type === OFFICE_DOCUMENT_REL)?.target ?? fallback;
  }

  toBuffer(): Buffer {
    for (const name of this.dirty) {
      const doc = this.parts.get(name);
      if (doc) this.zip.file(name, serializeXml(doc));
    }
    this.dirty.clear();
    return Buffer.from(
      this.zip.generate({ type: "nodebuffer", compression: "DEFLATE" }),
    );
  }
}

function resolveTarget(baseDir: string, target: string): string {
  if (target.startsWith("/")) return target.slice(1);
  const joined = path.posix.normalize(path.posix.join(baseDir, target));
  return joined.replace(/^(\.\/)+/, "");
}
