/**
 * Shared record types for citation extraction.
 * Defines the artifacts produced per document and the records joined from them.
 */

/**
 * Schema family an article XML document follows.
 * `unknown` routes the document to the generic fallback extractor.
 */
export type SchemaTag = "jats" | "tei" | "wiley" | "bioc" | "unknown";

/** Schema families with dedicated extraction rules. */
export type KnownSchema = Exclude<SchemaTag, "unknown">;

/**
 * Citation key → whitespace-normalised reference text.
 * Keys are unique within a document; insertion order follows the bibliography.
 */
export type BibliographyMap = ReadonlyMap<string, string>;

/**
 * One in-text citation marker together with the surrounding block text.
 */
export interface ContextualPointer {
  /** Bibliography key this marker points at (lookup only). */
  targetId: string;
  /** Display text of the marker, or `[targetId]` when the tag is empty. */
  inTextCitation: string;
  /** Text of the nearest block-level ancestor. */
  contextText: string;
  /** Tag name of the marker as written in the source (e.g. "xref"). */
  citationTagName: string;
  citationTagAttributes: Readonly<Record<string, string>>;
}

/**
 * A pointer joined to its bibliography entry.
 * `bibliographyEntryText` is never empty.
 */
export interface ResolvedCitation {
  contextSentence: string;
  inTextCitation: string;
  bibliographyEntryText: string;
  targetIdFromBib: string;
}

/** A character span within a larger text. `end` is exclusive. */
export interface Span {
  start: number;
  end: number;
  text: string;
}

/** Citation class predicted for a dataset mention. */
export type EntityType = "primary" | "secondary";

/** Entity span reconstructed from token-level predictions. */
export interface DecodedEntity {
  text: string;
  type: EntityType;
  /** Start character offset (inclusive). */
  start: number;
  /** End character offset (exclusive). */
  end: number;
}
