/**
 * Sentence segmentation.
 *
 * The resolver only needs `{ start, end, text }` spans in document order, so
 * any tokenizer can stand behind {@link SentenceSegmenter}. The default
 * splits on terminal punctuation followed by an upper-case letter or digit.
 */

import type { Span } from "../types.js";

export interface SentenceSegmenter {
  /** Non-overlapping spans, sorted by `start`. */
  segment(text: string): Span[];
}

const BOUNDARY_PATTERN = /[.!?]["')\]]*\s+(?=["'([]?[A-Z0-9])/g;

/** Words that end in a period without ending the sentence. */
const ABBREVIATIONS = new Set([
  "al",
  "e.g",
  "i.e",
  "cf",
  "vs",
  "fig",
  "figs",
  "eq",
  "eqs",
  "ref",
  "refs",
  "no",
  "vol",
  "pp",
  "ca",
  "approx",
  "resp",
  "dr",
  "st",
]);

function endsWithAbbreviation(before: string): boolean {
  const word = /([^\s(["']+)$/.exec(before)?.[1];
  if (!word) return false;
  // Initials such as "J." in author lists.
  if (/^[A-Z]$/.test(word)) return true;
  return ABBREVIATIONS.has(word.toLowerCase());
}

export class RegexSentenceSegmenter implements SentenceSegmenter {
  constructor(private readonly minLength = 5) {}

  segment(text: string): Span[] {
    const spans: Span[] = [];
    let start = 0;
    for (const match of text.matchAll(BOUNDARY_PATTERN)) {
      const index = match.index ?? 0;
      if (endsWithAbbreviation(text.slice(start, index))) continue;
      this.push(spans, text, start, index + match[0].trimEnd().length);
      start = index + match[0].length;
    }
    this.push(spans, text, start, text.length);
    return spans;
  }

  private push(spans: Span[], text: string, from: number, to: number): void {
    const raw = text.slice(from, to);
    const leading = raw.length - raw.trimStart().length;
    const sentence = raw.trim();
    if (sentence.length < this.minLength) return;
    const start = from + leading;
    spans.push({ start, end: start + sentence.length, text: sentence });
  }
}
