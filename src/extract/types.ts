import type { ContextualPointer, KnownSchema, SchemaTag } from "../types.js";
import type { XmlElement } from "../xml/tree.js";

export interface ExtractOptions {
  /** Ancestor levels searched for a pointer's block-level context. */
  contextDepth: number;
}

export interface BibliographyResult {
  /** Citation key → reference text. */
  entries: Map<string, string>;
  /**
   * Element id → citation key, for entries keyed by something other than
   * the id pointers use (JATS `label` keys, BioC sequence numbers).
   */
  aliases: Map<string, string>;
  /** Rule set that produced `entries`, or null when nothing was found. */
  format: KnownSchema | null;
}

/**
 * Extraction capabilities every schema variant provides.
 * Implementations read the tree and never mutate it; node removal happens on
 * a clone.
 */
export interface ExtractorStrategy {
  readonly schema: SchemaTag;
  parseBibliography(root: XmlElement): BibliographyResult;
  extractCleanText(root: XmlElement): string;
  extractPointers(root: XmlElement, options: ExtractOptions): ContextualPointer[];
}

export function emptyBibliography(): BibliographyResult {
  return { entries: new Map(), aliases: new Map(), format: null };
}
