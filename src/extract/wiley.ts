/**
 * Wiley extraction rules.
 *
 * Wiley files mix native idioms (`bib[xml:id]`, `link[href]`,
 * `component[type=references]`) with JATS-style ones (`ref-list`, `xref`),
 * so every artifact merges both without letting a later pass overwrite an
 * earlier one.
 */

import type { ContextualPointer } from "../types.js";
import {
  type ElementPredicate,
  type XmlElement,
  attrEquals,
  byName,
  findAll,
  findChildren,
  findFirst,
  getAttr,
  getFirstAttr,
  hasName,
  textOf,
} from "../xml/tree.js";
import { type PointerSource, collectPointers, textWithout } from "./context.js";
import { REF_BIBR_SOURCE, XREF_BIBR_SOURCE, splitTargets } from "./jats.js";
import {
  type BibliographyResult,
  type ExtractOptions,
  type ExtractorStrategy,
  emptyBibliography,
} from "./types.js";

/** Text of a nested `citation`, looking inside `citation-alternatives` as well. */
function wileyCitationText(entry: XmlElement): string {
  const direct = findChildren(entry, "citation")[0];
  if (direct) return textOf(direct);
  for (const alternatives of findChildren(entry, "citation-alternatives")) {
    const citation = findChildren(alternatives, "citation")[0];
    if (citation) return textOf(citation);
  }
  const nested = findFirst(entry, byName("citation"));
  return nested ? textOf(nested) : "";
}

export function parseWileyBibliography(root: XmlElement): BibliographyResult {
  const result = emptyBibliography();

  for (const bib of findAll(root, byName("bib"))) {
    const id = getAttr(bib, "xml:id")?.trim();
    if (!id || result.entries.has(id)) continue;
    const text = wileyCitationText(bib);
    if (text) result.entries.set(id, text);
  }

  for (const refList of findAll(root, byName("ref-list"))) {
    for (const ref of findAll(refList, byName("ref"))) {
      const id = getAttr(ref, "id")?.trim();
      if (!id || result.entries.has(id)) continue;
      const text = wileyCitationText(ref);
      if (text) result.entries.set(id, text);
    }
  }

  if (result.entries.size > 0) result.format = "wiley";
  return result;
}

const WILEY_BACK_MATTER: ElementPredicate = (el) =>
  hasName(el, "ref-list", "references", "bibliography") ||
  (hasName(el, "component") && attrEquals(el, "type", "references"));

/** Whole document (or its `<body>`) minus reference sections, including nested `bibliography` blocks. */
export function extractWileyCleanText(root: XmlElement): string {
  const scope = findFirst(root, byName("body")) ?? root;
  return textWithout(scope, WILEY_BACK_MATTER);
}

const LINK_HREF_SOURCE: PointerSource = {
  match: (el) =>
    hasName(el, "link") && getFirstAttr(el, ["href", "xlink:href"])?.trim().startsWith("#") === true,
  targets: (el) => splitTargets(getFirstAttr(el, ["href", "xlink:href"])),
};

const GENERIC_REF_SOURCE: PointerSource = {
  match: (el) => hasName(el, "ref") && getAttr(el, "target")?.trim().startsWith("#") === true,
  targets: (el) => splitTargets(getAttr(el, "target")),
  onlyNewTargets: true,
};

export function extractWileyPointers(root: XmlElement, options: ExtractOptions): ContextualPointer[] {
  return collectPointers(
    root,
    [XREF_BIBR_SOURCE, REF_BIBR_SOURCE, LINK_HREF_SOURCE, GENERIC_REF_SOURCE],
    options.contextDepth
  );
}

export const wileyExtractor: ExtractorStrategy = {
  schema: "wiley",
  parseBibliography: parseWileyBibliography,
  extractCleanText: extractWileyCleanText,
  extractPointers: extractWileyPointers,
};
