/**
 * Engine-neutral XML tree.
 *
 * Both parsing engines (fast-xml-parser and node-html-parser) are normalised
 * into this ordered element/text representation, so schema detection and
 * extraction never depend on which engine produced the tree.
 *
 * Tag and attribute lookups are namespace-prefix agnostic and
 * case-insensitive: `tei:TEI`, `TEI` and `tei` all have the local name `tei`.
 */

export interface XmlElement {
  readonly kind: "element";
  /** Tag name exactly as written in the source, prefix included. */
  readonly name: string;
  readonly attrs: Readonly<Record<string, string>>;
  readonly children: XmlNode[];
  parent: XmlElement | null;
}

export interface XmlText {
  readonly kind: "text";
  readonly text: string;
  parent: XmlElement | null;
}

export type XmlNode = XmlElement | XmlText;

/** Name of the synthetic element that wraps every top-level node of a document. */
export const DOCUMENT_NODE_NAME = "#document";

// ─── Construction ────────────────────────────────────────────────────

export function createElement(
  name: string,
  attrs: Record<string, string> = {},
  children: XmlNode[] = []
): XmlElement {
  const el: XmlElement = { kind: "element", name, attrs, children: [], parent: null };
  for (const child of children) appendChild(el, child);
  return el;
}

export function createText(text: string): XmlText {
  return { kind: "text", text, parent: null };
}

export function appendChild(parent: XmlElement, child: XmlNode): void {
  child.parent = parent;
  parent.children.push(child);
}

/** Deep copy of a subtree. The copy's root is detached from any parent. */
export function cloneTree(el: XmlElement): XmlElement {
  const copy = createElement(el.name, { ...el.attrs });
  for (const child of el.children) {
    appendChild(copy, child.kind === "text" ? createText(child.text) : cloneTree(child));
  }
  return copy;
}

/** Detach an element from its parent. No-op for a root. */
export function removeElement(el: XmlElement): void {
  const parent = el.parent;
  if (!parent) return;
  const index = parent.children.indexOf(el);
  if (index >= 0) parent.children.splice(index, 1);
  el.parent = null;
}

// ─── Names & attributes ──────────────────────────────────────────────

/** Lower-cased tag name with any namespace prefix dropped. */
export function localName(name: string): string {
  const colon = name.lastIndexOf(":");
  return (colon >= 0 ? name.slice(colon + 1) : name).toLowerCase();
}

/** Namespace prefix of a tag name, or "" when unprefixed. */
export function prefixOf(name: string): string {
  const colon = name.lastIndexOf(":");
  return colon >= 0 ? name.slice(0, colon) : "";
}

export function isElement(node: XmlNode | null | undefined): node is XmlElement {
  return node?.kind === "element";
}

/** True when the element's local name is one of `names` (compared lower-cased). */
export function hasName(el: XmlElement, ...names: string[]): boolean {
  const local = localName(el.name);
  return names.some((n) => n.toLowerCase() === local);
}

/**
 * Read an attribute. The exact key wins; otherwise keys are compared
 * case-insensitively (`xml:id` matches `XML:ID`).
 */
export function getAttr(el: XmlElement, attrName: string): string | undefined {
  const direct = el.attrs[attrName];
  if (direct !== undefined) return direct;
  const wanted = attrName.toLowerCase();
  for (const [key, value] of Object.entries(el.attrs)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

/** First attribute present among `attrNames`, in the order given. */
export function getFirstAttr(el: XmlElement, attrNames: readonly string[]): string | undefined {
  for (const attrName of attrNames) {
    const value = getAttr(el, attrName);
    if (value !== undefined) return value;
  }
  return undefined;
}

/** Case-insensitive attribute equality, trimming the attribute value. */
export function attrEquals(el: XmlElement, attrName: string, expected: string): boolean {
  const value = getAttr(el, attrName);
  return value !== undefined && value.trim().toLowerCase() === expected.toLowerCase();
}

// ─── Navigation ──────────────────────────────────────────────────────

export type ElementPredicate = (el: XmlElement) => boolean;

/** Predicate matching any of the given local names. */
export function byName(...names: string[]): ElementPredicate {
  const wanted = new Set(names.map((n) => n.toLowerCase()));
  return (el) => wanted.has(localName(el.name));
}

export function elementChildren(el: XmlElement): XmlElement[] {
  return el.children.filter(isElement);
}

/** First direct child element with one of the given local names. */
export function findChild(el: XmlElement, ...names: string[]): XmlElement | undefined {
  const match = byName(...names);
  return elementChildren(el).find(match);
}

export function findChildren(el: XmlElement, ...names: string[]): XmlElement[] {
  const match = byName(...names);
  return elementChildren(el).filter(match);
}

/** All descendants (excluding `root` itself) matching `predicate`, in document order. */
export function findAll(root: XmlElement, predicate: ElementPredicate): XmlElement[] {
  const results: XmlElement[] = [];
  const stack: XmlElement[] = elementChildren(root).reverse();
  while (stack.length > 0) {
    const el = stack.pop();
    if (!el) break;
    if (predicate(el)) results.push(el);
    const kids = elementChildren(el);
    for (let i = kids.length - 1; i >= 0; i--) {
      const kid = kids[i];
      if (kid) stack.push(kid);
    }
  }
  return results;
}

/** First descendant (excluding `root`) matching `predicate`, in document order. */
export function findFirst(root: XmlElement, predicate: ElementPredicate): XmlElement | undefined {
  const stack: XmlElement[] = elementChildren(root).reverse();
  while (stack.length > 0) {
    const el = stack.pop();
    if (!el) break;
    if (predicate(el)) return el;
    const kids = elementChildren(el);
    for (let i = kids.length - 1; i >= 0; i--) {
      const kid = kids[i];
      if (kid) stack.push(kid);
    }
  }
  return undefined;
}

export function hasDescendant(root: XmlElement, predicate: ElementPredicate): boolean {
  return findFirst(root, predicate) !== undefined;
}

/** The first element child of the synthetic document node, i.e. the root element. */
export function documentElement(doc: XmlElement): XmlElement | undefined {
  if (doc.name !== DOCUMENT_NODE_NAME) return doc;
  return elementChildren(doc)[0];
}

// ─── Text ────────────────────────────────────────────────────────────

/** Collapse runs of whitespace to single spaces and trim. */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Human-readable text of a node: every text fragment is trimmed, empty
 * fragments are dropped, and the rest are joined by a single space.
 * `ref <ref>(A, 2023)</ref>.` therefore reads `ref (A, 2023) .`.
 */
export function textOf(node: XmlNode): string {
  if (node.kind === "text") return normalizeWhitespace(node.text);
  const parts: string[] = [];
  collectText(node, parts);
  return normalizeWhitespace(parts.join(" "));
}

function collectText(el: XmlElement, parts: string[]): void {
  for (const child of el.children) {
    if (child.kind === "text") {
      const trimmed = child.text.trim();
      if (trimmed) parts.push(trimmed);
    } else {
      collectText(child, parts);
    }
  }
}
