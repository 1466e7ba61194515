/**
 * Thin DOM helpers over @xmldom/xmldom for OOXML parts.
 */

import { DOMParser, XMLSerializer } from "@xmldom/xmldom";

export const NS = {
  w: "http://schemas.openxmlformats.org/wordprocessingml/2006/main",
  a: "http://schemas.openxmlformats.org/drawingml/2006/main",
  p: "http://schemas.openxmlformats.org/presentationml/2006/main",
  r: "http://schemas.openxmlformats.org/officeDocument/2006/relationships",
  rel: "http://schemas.openxmlformats.org/package/2006/relationships",
  xml: "http://www.w3.org/XML/1998/namespace",
} as const;

export function parseXml(xml: string, partName: string): Document {
  const doc = new DOMParser().parseFromString(xml, "text/xml");
  if (!doc || !doc.documentElement) {
    throw new Error(`Malformed XML part: ${partName}`);
  }
  return doc;
}

export function serializeXml(doc: Document): string {
  return new XMLSerializer().serializeToString(doc);
}

export function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === 1;
}

/** Direct element children, optionally filtered by namespace + local name. */
export function elementChildren(parent: Element, ns?: string, localName?: string): Element[] {
  const out: Element[] = [];
  const nodes = parent.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes.item(i);
    if (!isElement(node)) continue;
    if (ns !== undefined && node.namespaceURI !== ns) continue;
    if (localName !== undefined && node.localName !== localName) continue;
    out.push(node);
  }
  return out;
}

export function firstChild(parent: Element, ns: string, localName: string): Element | null {
  const nodes = parent.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes.item(i);
    if (isElement(node) && node.namespaceURI === ns && node.localName === localName) {
      return node;
    }
  }
  return null;
}

/** Walk a chain of direct children: path(el, NS.p, "cSld", "spTree"). */
export function childPath(parent: Element, ns: string, ...names: string[]): Element | null {
  let current: Element | null = parent;
  for (const name of names) {
    if (!current) return null;
    current = firstChild(current, ns, name);
  }
  return current;
}

/** Attribute value, or null when the attribute is absent. */
export function attr(el: Element, ns: string | null, name: string): string | null {
  const node = ns === null ? el.getAttributeNode(name) : el.getAttributeNodeNS(ns, name);
  return node ? node.value : null;
}

/** All descendants in document order. */
export function descendants(root: Element | Document, ns: string, localName: string): Element[] {
  const list = root.getElementsByTagNameNS(ns, localName);
  const out: Element[] = [];
  for (let i = 0; i < list.length; i++) {
    const el = list.item(i);
    if (el) out.push(el);
  }
  return out;
}
