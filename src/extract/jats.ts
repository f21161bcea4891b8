/**
 * JATS (Journal Article Tag Suite) extraction rules.
 *
 * - Bibliography: `ref-list > ref`, keyed by `<label>` (trailing "." dropped)
 *   or the `id` attribute; text from `mixed-citation` / `element-citation`.
 * - Clean text: `<body>` plus a distinct `<article-text>`, nested ref-lists removed.
 * - Pointers: `xref[ref-type=bibr]@rid`, then `ref[type=bibr]@target` for
 *   targets no xref captured.
 */

import type { ContextualPointer } from "../types.js";
import {
  type XmlElement,
  attrEquals,
  byName,
  findAll,
  findChild,
  findFirst,
  getAttr,
  hasName,
  normalizeWhitespace,
  textOf,
} from "../xml/tree.js";
import { type PointerSource, collectPointers, stripHash, textWithout } from "./context.js";
import {
  type BibliographyResult,
  type ExtractOptions,
  type ExtractorStrategy,
  emptyBibliography,
} from "./types.js";

/** `ref` elements belonging to any ref-list, without duplicates from nested lists. */
function referenceEntries(root: XmlElement): XmlElement[] {
  const seen = new Set<XmlElement>();
  const refs: XmlElement[] = [];
  for (const refList of findAll(root, byName("ref-list"))) {
    for (const ref of findAll(refList, byName("ref"))) {
      if (seen.has(ref)) continue;
      seen.add(ref);
      refs.push(ref);
    }
  }
  return refs;
}

/** Citation text of a JATS `ref`, searching inside `citation-alternatives` too. */
function citationText(ref: XmlElement): string {
  const citation = findFirst(ref, byName("mixed-citation")) ?? findFirst(ref, byName("element-citation"));
  return citation ? textOf(citation) : "";
}

function referenceKey(ref: XmlElement): string | undefined {
  const label = findChild(ref, "label");
  const labelText = label ? textOf(label).replace(/\.+$/, "").trim() : "";
  if (labelText) return labelText;
  const id = getAttr(ref, "id")?.trim();
  return id || undefined;
}

export function parseJatsBibliography(root: XmlElement): BibliographyResult {
  const result = emptyBibliography();
  for (const ref of referenceEntries(root)) {
    const key = referenceKey(ref);
    const text = normalizeWhitespace(citationText(ref));
    if (!key || !text || result.entries.has(key)) continue;
    result.entries.set(key, text);
    const id = getAttr(ref, "id")?.trim();
    if (id && id !== key) result.aliases.set(id, key);
  }
  if (result.entries.size > 0) result.format = "jats";
  return result;
}

export function extractJatsCleanText(root: XmlElement): string {
  const body = findFirst(root, byName("body"));
  const articleText = findFirst(root, byName("article-text"));
  const scopes: XmlElement[] = [];
  if (body) scopes.push(body);
  // article-text may wrap the body; only add it when it is a separate block.
  if (articleText && articleText !== body && !(body && isAncestor(articleText, body))) {
    scopes.push(articleText);
  }
  return scopes
    .map((scope) => textWithout(scope, byName("ref-list")))
    .filter(Boolean)
    .join(" ");
}

function isAncestor(candidate: XmlElement, el: XmlElement): boolean {
  for (let current = el.parent; current; current = current.parent) {
    if (current === candidate) return true;
  }
  return false;
}

/** Whitespace-separated ids of a pointer attribute (`rid="r1 r2"`). */
export function splitTargets(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(/\s+/)
    .map(stripHash)
    .filter((id) => id.length > 0);
}

export const XREF_BIBR_SOURCE: PointerSource = {
  match: (el) => hasName(el, "xref") && attrEquals(el, "ref-type", "bibr"),
  targets: (el) => splitTargets(getAttr(el, "rid")),
};

export const REF_BIBR_SOURCE: PointerSource = {
  match: (el) => hasName(el, "ref") && attrEquals(el, "type", "bibr"),
  targets: (el) => splitTargets(getAttr(el, "target")),
};

export function extractJatsPointers(root: XmlElement, options: ExtractOptions): ContextualPointer[] {
  return collectPointers(
    root,
    [XREF_BIBR_SOURCE, { ...REF_BIBR_SOURCE, onlyNewTargets: true }],
    options.contextDepth
  );
}

export const jatsExtractor: ExtractorStrategy = {
  schema: "jats",
  parseBibliography: parseJatsBibliography,
  extractCleanText: extractJatsCleanText,
  extractPointers: extractJatsPointers,
};
