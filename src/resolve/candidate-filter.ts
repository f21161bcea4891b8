/**
 * Cheap sentence pre-filter for resolution, plus dataset identifier patterns.
 */

import { DEFAULT_CANDIDATE_KEYWORDS } from "../config.js";

/** `10.` + registrant code + `/` + suffix. */
export const DOI_PATTERN = /10\.\d{4,9}\/[-._;()/:A-Z0-9]+/i;

/** Bracketed numeric (`[12]`, `[1, 2]`, `[3-5]`) and parenthetical author-year shapes. */
export const CITATION_SHAPE_PATTERNS: readonly RegExp[] = [
  /\[\s*\d+(?:\s*[,;–-]\s*\d+)*\s*\]/,
  /[[(]\s?[\w\s,.-]+(?:et al|\d{4})[.,]?\s?[\])]/i,
];

/** Repository accession identifiers. */
export const ACCESSION_PATTERNS: readonly RegExp[] = [
  /\b(?:GSE|SRP|EMPIAR|PDB|E-GEOD|IPR|PF|CVCL|SAMN|PRJNA|ERR|SRR|CHEMBL|NM_|NP_)\w+/i,
  /\b(?:PXD|E-PROT)-\d+/i,
  // CATH domains
  /\b\d{1,2}\.\d{2}\.\d{2}\.\d{1,3}\b/,
  // UniProt
  /\bQ\d{4,5}[A-Z]\d?/,
  /\brs\d+\b/,
  /\bpdb\s\w+/i,
  /\b(?:pubmed|pmc|pmid)\s+\d+/i,
];

function globalCopy(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`);
}

/** Every DOI in `text`, in order of appearance. */
export function findDois(text: string): string[] {
  return Array.from(text.matchAll(globalCopy(DOI_PATTERN)), (m) => m[0]);
}

/** Accession ids in order of appearance, without duplicates. */
export function findAccessionIds(text: string): string[] {
  const found: Array<{ id: string; index: number }> = [];
  const seen = new Set<string>();
  for (const pattern of ACCESSION_PATTERNS) {
    for (const match of text.matchAll(globalCopy(pattern))) {
      if (seen.has(match[0])) continue;
      seen.add(match[0]);
      found.push({ id: match[0], index: match.index ?? 0 });
    }
  }
  return found.sort((a, b) => a.index - b.index).map((f) => f.id);
}

/**
 * A sentence is worth resolving when it mentions a data keyword, a DOI,
 * an accession id or a citation marker.
 */
export function isCandidateSentence(
  sentence: string,
  keywords: readonly string[] = DEFAULT_CANDIDATE_KEYWORDS
): boolean {
  const lower = sentence.toLowerCase();
  if (keywords.some((keyword) => lower.includes(keyword))) return true;
  if (DOI_PATTERN.test(sentence)) return true;
  if (ACCESSION_PATTERNS.some((pattern) => pattern.test(sentence))) return true;
  return CITATION_SHAPE_PATTERNS.some((pattern) => pattern.test(sentence));
}
