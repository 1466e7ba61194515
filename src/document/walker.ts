/**
 * Document Walker
 *
 * Lazily enumerates every text-bearing structural unit of a canonical
 * document, region by region, in the adapter's visiting order. The
 * traversal is a generator: finite, single-pass and not restartable.
 */

import { OoxmlParagraph, type StructuralUnit } from "./structural_unit.js";
import { DEFAULT_WALK_OPTIONS, type CanonicalDocument, type RegionRole, type WalkOptions } from "./canonical.js";

export interface WalkedUnit {
  unit: StructuralUnit;
  role: RegionRole;
}

export function* walkRegions(
  doc: CanonicalDocument,
  options: WalkOptions = DEFAULT_WALK_OPTIONS,
): Generator<WalkedUnit> {
  for (const region of doc.regions(options)) {
    const onMutate = () => doc.markDirty(region.partName);
    for (const paragraph of region.paragraphs()) {
      yield {
        unit: new OoxmlParagraph(paragraph, doc.dialect, region.partName, onMutate),
        role: region.role,
      };
    }
  }
}

export function* walkDocument(
  doc: CanonicalDocument,
  options: WalkOptions = DEFAULT_WALK_OPTIONS,
): Generator<StructuralUnit> {
  for (const { unit } of walkRegions(doc, options)) yield unit;
}
