/**
 * BioC extraction rules.
 *
 * BioC stores everything as `passage` elements described by `infon`
 * key/value pairs. Reference entries are passages whose `section_type` infon
 * is REF; their text is reassembled from the structured infons.
 *
 * Reference keys are sequence numbers ("1", "2", ...) in passage order, as the
 * format has no natural key. When a passage carries a symbolic id infon, that
 * id is registered as an alias of the sequence number.
 */

import { infonValue, isBiocReferencePassage } from "../schema/detector.js";
import type { ContextualPointer } from "../types.js";
import {
  type XmlElement,
  byName,
  findAll,
  findChild,
  hasName,
  normalizeWhitespace,
  textOf,
} from "../xml/tree.js";
import { type PointerSource, attachContext, collectPointers } from "./context.js";
import {
  type BibliographyResult,
  type ExtractOptions,
  type ExtractorStrategy,
  emptyBibliography,
} from "./types.js";

const SECTION_HEADER_PATTERN = /^(references?|bibliography|literature cited|works cited|reference list)$/i;
const SYMBOLIC_ID_KEYS = ["id", "bib_id", "referenced_bib_id", "ref_id"];
const POINTER_TARGET_KEYS = ["referenced_bib_id", "target_id", "rid", "ref_id", "bib_id", "refid", "target"];
const CITATION_TYPES = new Set(["citation", "cite", "bibr", "ref", "reference", "bib_ref", "xref"]);

/** All direct infons of a passage, in order. */
function passageInfons(passage: XmlElement): Array<{ key: string; value: string }> {
  const infons: Array<{ key: string; value: string }> = [];
  for (const child of passage.children) {
    if (child.kind !== "element" || !hasName(child, "infon")) continue;
    const key = child.attrs.key;
    if (key) infons.push({ key, value: textOf(child) });
  }
  return infons;
}

/** `surname:Smith;given-names:John` → `Smith John`. */
function formatBiocName(value: string): string {
  const fields = new Map<string, string>();
  for (const pair of value.split(";")) {
    const colon = pair.indexOf(":");
    if (colon < 0) continue;
    fields.set(pair.slice(0, colon).trim(), pair.slice(colon + 1).trim());
  }
  if (fields.size === 0) return value.trim();
  return [fields.get("surname"), fields.get("given-names")].filter(Boolean).join(" ");
}

function passageText(passage: XmlElement): string {
  const text = findChild(passage, "text");
  return text ? textOf(text) : "";
}

function withoutTrailingPeriod(part: string): string {
  return part.replace(/\.+$/, "").trim();
}

/** Year, volume, issue and pages as `2020;12(3):45-67`. */
function formatYearVolumePages(get: (key: string) => string | undefined): string | undefined {
  const year = get("year");
  const volume = get("volume");
  const issue = get("issue");
  const fpage = get("fpage");
  const lpage = get("lpage");

  let volumePart = volume ?? "";
  if (issue) volumePart += `(${issue})`;
  let result = [year, volumePart].filter(Boolean).join(";");
  if (fpage) result += `${result ? ":" : ""}${fpage}${lpage ? `-${lpage}` : ""}`;
  return result || undefined;
}

/**
 * Reassemble a reference string from a REF passage.
 * Returns "" for section headers ("References") and empty passages.
 */
export function assembleBiocReference(passage: XmlElement): string {
  const infons = passageInfons(passage);
  const get = (key: string): string | undefined =>
    infons.find((i) => i.key === key && i.value)?.value;

  const authors = infons
    .filter((i) => i.key.startsWith("name_") && i.value)
    .map((i) => formatBiocName(i.value))
    .filter(Boolean)
    .join(", ");
  const title = get("title") ?? get("article-title");
  const source = get("source");
  const yearVolumePages = formatYearVolumePages(get);
  const doi = get("pub-id_doi");
  const freeText = passageText(passage);

  const hasStructuredData = Boolean(authors || title || source || yearVolumePages || doi);
  if (!hasStructuredData && (!freeText || SECTION_HEADER_PATTERN.test(withoutTrailingPeriod(freeText)))) {
    return "";
  }

  const parts: string[] = [];
  if (authors) parts.push(authors);
  if (title) parts.push(title);
  if (freeText && freeText !== title) parts.push(freeText);
  if (source) parts.push(source);
  if (yearVolumePages) parts.push(yearVolumePages);
  if (doi) parts.push(`doi:${doi}`);

  const cleaned = parts.map(withoutTrailingPeriod).filter(Boolean);
  return cleaned.length > 0 ? normalizeWhitespace(`${cleaned.join(". ")}.`) : "";
}

export function parseBiocBibliography(root: XmlElement): BibliographyResult {
  const result = emptyBibliography();
  let sequence = 0;
  for (const passage of findAll(root, byName("passage"))) {
    if (!isBiocReferencePassage(passage)) continue;
    const text = assembleBiocReference(passage);
    if (!text) continue;
    sequence++;
    const key = String(sequence);
    result.entries.set(key, text);
    for (const idKey of SYMBOLIC_ID_KEYS) {
      const symbolic = infonValue(passage, idKey);
      if (symbolic && !result.aliases.has(symbolic)) {
        result.aliases.set(symbolic, key);
        break;
      }
    }
  }
  if (result.entries.size > 0) result.format = "bioc";
  return result;
}

/** Text of every non-reference passage, in order. */
export function extractBiocCleanText(root: XmlElement): string {
  return findAll(root, byName("passage"))
    .filter((passage) => !isBiocReferencePassage(passage))
    .map(passageText)
    .filter(Boolean)
    .join(" ");
}

function isCitationAnnotation(el: XmlElement): boolean {
  if (!hasName(el, "annotation")) return false;
  const type = infonValue(el, "type")?.toLowerCase();
  return type !== undefined && (CITATION_TYPES.has(type) || type.includes("cit"));
}

function annotationTargets(el: XmlElement): string[] {
  for (const key of POINTER_TARGET_KEYS) {
    const value = infonValue(el, key);
    if (value) {
      return value
        .split(/[\s,;]+/)
        .map((id) => id.replace(/^#/, ""))
        .filter(Boolean);
    }
  }
  return [];
}

export function extractBiocPointers(root: XmlElement, options: ExtractOptions): ContextualPointer[] {
  const annotations: PointerSource = {
    match: isCitationAnnotation,
    targets: annotationTargets,
    display: (el) => {
      const text = findChild(el, "text");
      return text ? textOf(text) : "";
    },
    context: (el) => {
      const passage = el.parent;
      const text = passage && hasName(passage, "passage") ? passageText(passage) : "";
      return text || attachContext(el, options.contextDepth);
    },
  };
  return collectPointers(root, [annotations], options.contextDepth);
}

export const biocExtractor: ExtractorStrategy = {
  schema: "bioc",
  parseBibliography: parseBiocBibliography,
  extractCleanText: extractBiocCleanText,
  extractPointers: extractBiocPointers,
};
