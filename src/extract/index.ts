import type { SchemaTag } from "../types.js";
import { biocExtractor } from "./bioc.js";
import { fallbackExtractor } from "./fallback.js";
import { jatsExtractor } from "./jats.js";
import { teiExtractor } from "./tei.js";
import type { ExtractorStrategy } from "./types.js";
import { wileyExtractor } from "./wiley.js";

export { BIBLIOGRAPHY_STRATEGY_ORDER, runBibliographyStrategies } from "./fallback.js";
export { DEFAULT_CONTEXT_DEPTH, attachContext } from "./context.js";
export type { BibliographyResult, ExtractOptions, ExtractorStrategy } from "./types.js";

const EXTRACTORS: Record<SchemaTag, ExtractorStrategy> = {
  jats: jatsExtractor,
  tei: teiExtractor,
  wiley: wileyExtractor,
  bioc: biocExtractor,
  unknown: fallbackExtractor,
};

/** The extraction rules for a detected schema; `unknown` gets the generic fallback. */
export function createExtractor(schema: SchemaTag): ExtractorStrategy {
  return EXTRACTORS[schema];
}
