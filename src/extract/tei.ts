/**
 * TEI extraction rules (GROBID-style output).
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
  textOf,
} from "../xml/tree.js";
import { type PointerSource, collectPointers, textWithout } from "./context.js";
import { splitTargets } from "./jats.js";
import {
  type BibliographyResult,
  type ExtractOptions,
  type ExtractorStrategy,
  emptyBibliography,
} from "./types.js";

/** `listBibl > biblStruct`, keyed by `xml:id`, text from `note[type=raw_reference]`. */
export function parseTeiBibliography(root: XmlElement): BibliographyResult {
  const result = emptyBibliography();
  for (const listBibl of findAll(root, byName("listbibl"))) {
    for (const bibl of findAll(listBibl, byName("biblstruct"))) {
      const id = getAttr(bibl, "xml:id")?.trim();
      if (!id || result.entries.has(id)) continue;
      const note = findFirst(
        bibl,
        (el) => hasName(el, "note") && attrEquals(el, "type", "raw_reference")
      );
      const text = note ? textOf(note) : "";
      if (text) result.entries.set(id, text);
    }
  }
  if (result.entries.size > 0) result.format = "tei";
  return result;
}

/** The `<text>` element's `<body>` (or the whole `<text>`) without `listBibl`. */
export function extractTeiCleanText(root: XmlElement): string {
  const text = findFirst(root, byName("text"));
  if (!text) return "";
  const scope = findChild(text, "body") ?? text;
  return textWithout(scope, byName("listbibl"));
}

/** A `#id` reference; TEI pointers to other documents are ignored. */
function localTarget(el: XmlElement): string[] {
  const target = getAttr(el, "target");
  if (!target) return [];
  if (!target.trim().startsWith("#") && !attrEquals(el, "type", "bibr")) return [];
  return splitTargets(target);
}

const TEI_REF_SOURCE: PointerSource = {
  match: (el) => hasName(el, "ref") && getAttr(el, "target") !== undefined,
  targets: localTarget,
};

const TEI_PTR_SOURCE: PointerSource = {
  match: (el) => hasName(el, "ptr") && getAttr(el, "target") !== undefined,
  targets: localTarget,
  onlyNewTargets: true,
};

export function extractTeiPointers(root: XmlElement, options: ExtractOptions): ContextualPointer[] {
  return collectPointers(root, [TEI_REF_SOURCE, TEI_PTR_SOURCE], options.contextDepth);
}

export const teiExtractor: ExtractorStrategy = {
  schema: "tei",
  parseBibliography: parseTeiBibliography,
  extractCleanText: extractTeiCleanText,
  extractPointers: extractTeiPointers,
};
