/**
 * Schema family detection.
 *
 * Checks run in a fixed order and the first positive one wins:
 * DOCTYPE markers, then root/component namespaces, then structural
 * fingerprints. Ties are never scored; the order is the tie-breaker.
 */

import type { SchemaTag } from "../types.js";
import type { ParsedDocument } from "../xml/parse.js";
import {
  type XmlElement,
  attrEquals,
  byName,
  documentElement,
  findAll,
  findChild,
  getAttr,
  hasDescendant,
  hasName,
  localName,
  prefixOf,
  textOf,
} from "../xml/tree.js";

export const TEI_NAMESPACE = "http://www.tei-c.org/ns/1.0";
export const WILEY_NAMESPACE = "http://www.wiley.com/namespaces/wiley";

const JATS_DOCTYPE_MARKERS = [/JATS/i, /-\/\/NLM\/\/DTD/i, /archivearticle/i, /journalpublishing/i];
const BIOC_DOCTYPE_MARKERS = [/BioC/i];

/** Which family of checks produced the tag. */
export type DetectionSignal =
  | "doctype"
  | "namespace"
  | "bioc-structure"
  | "wiley-structure"
  | "jats-structure"
  | "tei-structure"
  | "wiley-bib-id"
  | "ref-list-shape"
  | "none";

export interface DetectionResult {
  schema: SchemaTag;
  signal: DetectionSignal;
}

/** Namespace URI bound to an element's own prefix (or the default namespace). */
function namespaceOf(el: XmlElement): string | undefined {
  const prefix = prefixOf(el.name);
  return getAttr(el, prefix ? `xmlns:${prefix}` : "xmlns");
}

function detectByDoctype(doctype: string | null): SchemaTag | undefined {
  if (!doctype) return undefined;
  if (JATS_DOCTYPE_MARKERS.some((marker) => marker.test(doctype))) return "jats";
  if (BIOC_DOCTYPE_MARKERS.some((marker) => marker.test(doctype))) return "bioc";
  return undefined;
}

function detectByNamespace(root: XmlElement): SchemaTag | undefined {
  const rootElement = documentElement(root);
  if (!rootElement) return undefined;
  const rootNamespace = namespaceOf(rootElement);

  if (localName(rootElement.name) === "tei" && rootNamespace === TEI_NAMESPACE) return "tei";
  if (rootNamespace === WILEY_NAMESPACE) return "wiley";

  const wileyComponent = hasDescendant(
    root,
    (el) => hasName(el, "component") && namespaceOf(el) === WILEY_NAMESPACE
  );
  return wileyComponent ? "wiley" : undefined;
}

/** Text of the direct `infon` child of `el` whose `key` attribute equals `key`. */
export function infonValue(el: XmlElement, key: string): string | undefined {
  for (const child of el.children) {
    if (child.kind !== "element" || !hasName(child, "infon")) continue;
    if (attrEquals(child, "key", key)) return textOf(child);
  }
  return undefined;
}

/** A BioC passage whose section_type infon marks it as a reference entry. */
export function isBiocReferencePassage(passage: XmlElement): boolean {
  return infonValue(passage, "section_type")?.toUpperCase() === "REF";
}

function hasBiocStructure(root: XmlElement): boolean {
  const hasReferencePassage = hasDescendant(
    root,
    (el) => hasName(el, "passage") && isBiocReferencePassage(el)
  );
  if (!hasReferencePassage) return false;
  return !hasDescendant(root, byName("article-meta", "journal-meta", "doi_batch_id"));
}

function hasWileyStructure(root: XmlElement): boolean {
  return hasDescendant(
    root,
    (el) =>
      (hasName(el, "component") && attrEquals(el, "type", "references")) ||
      hasName(el, "doi_batch_id")
  );
}

function hasJatsStructure(root: XmlElement): boolean {
  if (!hasDescendant(root, byName("ref-list"))) return false;
  const hasFrontMeta =
    hasDescendant(root, byName("front")) &&
    hasDescendant(root, byName("article-meta")) &&
    hasDescendant(root, byName("journal-meta"));
  if (hasFrontMeta) return true;
  const rootElement = documentElement(root);
  return (
    rootElement !== undefined &&
    hasName(rootElement, "article") &&
    getAttr(rootElement, "article-type") !== undefined
  );
}

function hasTeiStructure(root: XmlElement): boolean {
  return hasDescendant(root, byName("listbibl")) && hasDescendant(root, byName("teiheader"));
}

function hasWileyBibIds(root: XmlElement): boolean {
  const bibWithId = hasDescendant(
    root,
    (el) => hasName(el, "bib") && getAttr(el, "xml:id") !== undefined
  );
  if (!bibWithId) return false;
  const strongTeiOrJats = hasDescendant(
    root,
    byName("teiheader", "listbibl", "article-meta", "journal-meta")
  );
  return !strongTeiOrJats;
}

/**
 * A ref-list whose entries hold a bare `citation` (rather than JATS's
 * `mixed-citation`/`element-citation`) is Wiley's JATS-like dialect.
 */
function classifyRefListShape(root: XmlElement): SchemaTag | undefined {
  const refLists = findAll(root, byName("ref-list"));
  if (refLists.length === 0) return undefined;
  for (const refList of refLists) {
    for (const ref of findAll(refList, byName("ref"))) {
      const jatsCitation = hasDescendant(ref, byName("mixed-citation", "element-citation"));
      const wileyCitation =
        findChild(ref, "citation") !== undefined ||
        findChild(ref, "citation-alternatives")?.children.some(
          (c) => c.kind === "element" && hasName(c, "citation")
        ) === true;
      if (wileyCitation && !jatsCitation) return "wiley";
    }
  }
  return "jats";
}

/** Detect the schema family and report which check decided it. */
export function detectSchemaWithSignal(doc: ParsedDocument): DetectionResult {
  const byDoctype = detectByDoctype(doc.doctype);
  if (byDoctype) return { schema: byDoctype, signal: "doctype" };

  const byNamespace = detectByNamespace(doc.root);
  if (byNamespace) return { schema: byNamespace, signal: "namespace" };

  const root = doc.root;
  if (hasBiocStructure(root)) return { schema: "bioc", signal: "bioc-structure" };
  if (hasWileyStructure(root)) return { schema: "wiley", signal: "wiley-structure" };
  if (hasJatsStructure(root)) return { schema: "jats", signal: "jats-structure" };
  if (hasTeiStructure(root)) return { schema: "tei", signal: "tei-structure" };
  if (hasWileyBibIds(root)) return { schema: "wiley", signal: "wiley-bib-id" };

  const shape = classifyRefListShape(root);
  if (shape) return { schema: shape, signal: "ref-list-shape" };

  return { schema: "unknown", signal: "none" };
}

/** Detect the schema family of a parsed document. Pure and total. */
export function detectSchema(doc: ParsedDocument): SchemaTag {
  return detectSchemaWithSignal(doc).schema;
}
