/**
 * Joins a document's citation pointers to its bibliography.
 */

import { type ExtractionConfig, resolveConfig } from "../config.js";
import { type LoggerMethods, silentLogger } from "../logger.js";
import type { BibliographyMap, ContextualPointer, ResolvedCitation, Span } from "../types.js";
import { findDois, isCandidateSentence } from "./candidate-filter.js";
import type { SentenceSegmenter } from "./sentence-segmenter.js";

/** The parts of a parsed document the resolver reads. DocumentParser satisfies it. */
export interface ReferenceSource {
  readonly path: string | null;
  getBibliographyMap(): BibliographyMap;
  getFullText(): string;
  getPointerMap(): readonly ContextualPointer[];
  getBibliographyAliases?(): ReadonlyMap<string, string>;
}

export type CitationMethod = "direct_doi" | "pointer_resolution";

/** A dataset identifier found in a candidate sentence. */
export interface CandidateCitation {
  context: string;
  id: string;
  method: CitationMethod;
}

export interface ResolverDiagnostics {
  resolved: number;
  duplicates: number;
  missingTargets: number;
}

export interface ReferenceResolverOptions {
  logger?: LoggerMethods;
  config?: Partial<ExtractionConfig>;
}

export class ReferenceResolver {
  private readonly logger: LoggerMethods;
  private readonly config: ExtractionConfig;
  private sentences: Span[] | null = null;
  private lastDiagnostics: ResolverDiagnostics = { resolved: 0, duplicates: 0, missingTargets: 0 };

  constructor(
    private readonly source: ReferenceSource,
    private readonly segmenter: SentenceSegmenter,
    options: ReferenceResolverOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.config = resolveConfig(options.config);
  }

  /** Counts from the most recent {@link resolveReferences} call. */
  get diagnostics(): ResolverDiagnostics {
    return { ...this.lastDiagnostics };
  }

  /**
   * Bibliography key for a pointer target. Aliases name the element ids
   * pointers carry, so they win over a key that merely looks the same
   * (BioC sequence numbers, JATS labels).
   */
  private lookupKey(targetId: string): string | undefined {
    const bibliography = this.source.getBibliographyMap();
    const alias = this.source.getBibliographyAliases?.().get(targetId);
    if (alias !== undefined) return bibliography.has(alias) ? alias : undefined;
    return bibliography.has(targetId) ? targetId : undefined;
  }

  /**
   * One record per distinct (target, marker, context, entry) tuple, in
   * pointer order. Pointers whose target has no entry are skipped.
   */
  resolveReferences(): ResolvedCitation[] {
    const bibliography = this.source.getBibliographyMap();
    const resolved: ResolvedCitation[] = [];
    const seen = new Set<string>();
    const diagnostics: ResolverDiagnostics = { resolved: 0, duplicates: 0, missingTargets: 0 };

    for (const pointer of this.source.getPointerMap()) {
      const key = this.lookupKey(pointer.targetId);
      const entry = key === undefined ? undefined : bibliography.get(key);
      if (key === undefined || !entry) {
        diagnostics.missingTargets++;
        this.logger.debug(
          `[resolve] ${this.source.path ?? "<string>"}: no bibliography entry for "${pointer.targetId}"`
        );
        continue;
      }

      const citation: ResolvedCitation = {
        contextSentence: pointer.contextText,
        inTextCitation: pointer.inTextCitation,
        bibliographyEntryText: entry,
        targetIdFromBib: key,
      };
      const tupleKey = JSON.stringify([
        citation.targetIdFromBib,
        citation.inTextCitation,
        citation.contextSentence,
        citation.bibliographyEntryText,
      ]);
      if (seen.has(tupleKey)) {
        diagnostics.duplicates++;
        continue;
      }
      seen.add(tupleKey);
      resolved.push(citation);
    }

    diagnostics.resolved = resolved.length;
    this.lastDiagnostics = diagnostics;
    return resolved;
  }

  /** Sentences of the clean text, segmented once. */
  getSentences(): readonly Span[] {
    if (this.sentences === null) {
      this.sentences = this.segmenter.segment(this.source.getFullText());
    }
    return this.sentences;
  }

  findCandidateSentences(): Span[] {
    return this.getSentences().filter((s) => isCandidateSentence(s.text, this.config.candidateKeywords));
  }

  /** DOIs written directly in candidate sentences. */
  findDirectDois(): CandidateCitation[] {
    const found: CandidateCitation[] = [];
    for (const sentence of this.findCandidateSentences()) {
      for (const id of findDois(sentence.text)) {
        found.push({ context: sentence.text, id, method: "direct_doi" });
      }
    }
    return found;
  }

  /**
   * DOIs reached through pointers: a candidate sentence containing a
   * pointer's marker yields the DOI of the entry that pointer targets.
   */
  resolvePointersInSentences(): CandidateCitation[] {
    const bibliography = this.source.getBibliographyMap();
    const pointers = this.source.getPointerMap().filter((p) => p.inTextCitation.length > 0);
    const found: CandidateCitation[] = [];
    const seen = new Set<string>();

    for (const sentence of this.findCandidateSentences()) {
      for (const pointer of pointers) {
        if (!sentence.text.includes(pointer.inTextCitation)) continue;
        const key = this.lookupKey(pointer.targetId);
        const entry = key === undefined ? undefined : bibliography.get(key);
        const doi = entry ? findDois(entry)[0] : undefined;
        if (!doi) continue;
        const dedupeKey = `${sentence.start}\u0000${doi}`;
        if (seen.has(dedupeKey)) continue;
        seen.add(dedupeKey);
        found.push({ context: sentence.text, id: doi, method: "pointer_resolution" });
      }
    }
    return found;
  }
}
