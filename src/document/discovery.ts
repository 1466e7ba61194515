/**
 * Token Discovery: read-only walk used by preflight.
 */

import { DISCOVERY_TOKEN_RE, tokenBaseName } from "../tokens/evaluator.js";
import { walkDocument } from "./walker.js";
import { DEFAULT_WALK_OPTIONS, type CanonicalDocument, type WalkOptions } from "./canonical.js";

/** Raw inner token expressions, trimmed, e.g. "NAME|upper". */
export function discoverTokens(
  doc: CanonicalDocument,
  options: WalkOptions = DEFAULT_WALK_OPTIONS,
): Set<string> {
  const found = new Set<string>();
  for (const unit of walkDocument(doc, options)) {
    const text = unit.text();
    if (!text.includes("{{")) continue;
    for (const match of text.matchAll(DISCOVERY_TOKEN_RE)) {
      found.add(match[1].trim());
    }
  }
  return found;
}

/** Column names referenced by a set of raw expressions. */
export function baseTokenNames(tokens: Iterable<string>): Set<string> {
  const names = new Set<string>();
  for (const token of tokens) {
    const name = tokenBaseName(token);
    if (name) names.add(name);
  }
  return names;
}
