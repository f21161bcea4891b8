/**
 * Extraction for documents whose schema could not be detected.
 */

import type { LoggerMethods } from "../logger.js";
import { silentLogger } from "../logger.js";
import { errorMessage } from "../errors.js";
import { isBiocReferencePassage } from "../schema/detector.js";
import type { ContextualPointer } from "../types.js";
import { type ElementPredicate, type XmlElement, attrEquals, byName, getAttr, hasName } from "../xml/tree.js";
import { biocExtractor } from "./bioc.js";
import { collectPointers, textWithout } from "./context.js";
import { REF_BIBR_SOURCE, XREF_BIBR_SOURCE, jatsExtractor } from "./jats.js";
import { teiExtractor } from "./tei.js";
import {
  type BibliographyResult,
  type ExtractOptions,
  type ExtractorStrategy,
  emptyBibliography,
} from "./types.js";
import { wileyExtractor } from "./wiley.js";

/** Bibliography rule sets tried, in order, when the schema is unknown. */
export const BIBLIOGRAPHY_STRATEGY_ORDER: readonly ExtractorStrategy[] = [
  jatsExtractor,
  teiExtractor,
  wileyExtractor,
  biocExtractor,
];

/**
 * Run each strategy's bibliography rules until one finds entries.
 * A strategy that throws is logged and skipped.
 */
export function runBibliographyStrategies(
  root: XmlElement,
  logger: LoggerMethods = silentLogger
): BibliographyResult {
  for (const strategy of BIBLIOGRAPHY_STRATEGY_ORDER) {
    try {
      const result = strategy.parseBibliography(root);
      if (result.entries.size > 0) return result;
    } catch (err) {
      logger.warn(`[extract] ${strategy.schema} bibliography rules failed: ${errorMessage(err)}`);
    }
  }
  return emptyBibliography();
}

const BACK_MATTER_TAGS = byName(
  "ref-list",
  "listbibl",
  "references",
  "bibliography",
  "back",
  "notes",
  "fn-group",
  "footnote-group"
);

/**
 * Everything any of the bibliography rule sets reads entries from, plus BioC
 * infons, which are metadata rather than running text.
 */
const BACK_MATTER: ElementPredicate = (el) =>
  BACK_MATTER_TAGS(el) ||
  hasName(el, "infon") ||
  (hasName(el, "component") && attrEquals(el, "type", "references")) ||
  (hasName(el, "bib") && getAttr(el, "xml:id") !== undefined) ||
  (hasName(el, "passage") && isBiocReferencePassage(el));

export function extractFallbackCleanText(root: XmlElement): string {
  return textWithout(root, BACK_MATTER);
}

export function extractFallbackPointers(root: XmlElement, options: ExtractOptions): ContextualPointer[] {
  return collectPointers(root, [REF_BIBR_SOURCE, XREF_BIBR_SOURCE], options.contextDepth);
}

export const fallbackExtractor: ExtractorStrategy = {
  schema: "unknown",
  parseBibliography: (root) => runBibliographyStrategies(root),
  extractCleanText: extractFallbackCleanText,
  extractPointers: extractFallbackPointers,
};
