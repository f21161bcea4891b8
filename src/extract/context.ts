/**
 * Helpers shared by every extractor: pointer context attachment, pointer
 * collection in document order, and clean-text extraction on a copied tree.
 */

import type { ContextualPointer } from "../types.js";
import {
  DOCUMENT_NODE_NAME,
  type ElementPredicate,
  type XmlElement,
  cloneTree,
  findAll,
  localName,
  removeElement,
  textOf,
} from "../xml/tree.js";

/** Tags whose text is a sensible context for a citation marker. */
const BLOCK_TAGS = new Set([
  "p",
  "para",
  "div",
  "ab",
  "list-item",
  "li",
  "item",
  "sec",
  "section",
  "body",
  "abstract",
  "caption",
  "title",
  "head",
  "td",
  "th",
  "fn",
  "note",
  "passage",
]);

export const DEFAULT_CONTEXT_DEPTH = 5;

/**
 * Text of the nearest block-level ancestor within `maxDepth` levels.
 * Falls back to the immediate parent's text, then to the tag's own text.
 */
export function attachContext(tag: XmlElement, maxDepth = DEFAULT_CONTEXT_DEPTH): string {
  let current = tag.parent;
  for (let depth = 0; current && depth < maxDepth; depth++) {
    if (current.name === DOCUMENT_NODE_NAME) break;
    if (BLOCK_TAGS.has(localName(current.name))) return textOf(current);
    current = current.parent;
  }
  const parent = tag.parent;
  if (parent && parent.name !== DOCUMENT_NODE_NAME) return textOf(parent);
  return textOf(tag);
}

/** Strip the leading `#` of a same-document reference. */
export function stripHash(target: string): string {
  return target.trim().replace(/^#/, "");
}

/**
 * One pointer idiom: which tags it covers and how to read their targets.
 */
export interface PointerSource {
  match: ElementPredicate;
  /** Target ids of a matching tag; empty when the tag carries none. */
  targets: (el: XmlElement) => string[];
  /** Only keep targets no earlier source has captured. */
  onlyNewTargets?: boolean;
  /** Overrides {@link attachContext}. */
  context?: (el: XmlElement) => string;
  /** Overrides the tag's own text as display string. */
  display?: (el: XmlElement) => string;
}

interface PointerMatch {
  el: XmlElement;
  targetId: string;
  source: number;
}

/** Build a pointer record for one tag/target pair. Empty tags display as `[target]`. */
export function buildPointer(
  el: XmlElement,
  targetId: string,
  contextText: string,
  display?: string
): ContextualPointer {
  const text = display ?? textOf(el);
  return {
    targetId,
    inTextCitation: text || `[${targetId}]`,
    contextText,
    citationTagName: el.name,
    citationTagAttributes: { ...el.attrs },
  };
}

/**
 * Collect pointers from several idioms at once.
 *
 * Sources are applied in priority order (a tag belongs to the first source
 * that matches it), but the result is in document order.
 */
export function collectPointers(
  root: XmlElement,
  sources: readonly PointerSource[],
  contextDepth: number
): ContextualPointer[] {
  const matches: PointerMatch[] = [];
  const everyMatch: ElementPredicate = (el) => sources.some((s) => s.match(el));
  for (const el of findAll(root, everyMatch)) {
    const source = sources.findIndex((s) => s.match(el));
    const sourceDef = sources[source];
    if (!sourceDef) continue;
    for (const targetId of sourceDef.targets(el)) {
      if (targetId) matches.push({ el, targetId, source });
    }
  }

  const captured = new Set<string>();
  const accepted = new Set<PointerMatch>();
  sources.forEach((sourceDef, index) => {
    const newlyCaptured: string[] = [];
    for (const m of matches) {
      if (m.source !== index) continue;
      if (sourceDef.onlyNewTargets && captured.has(m.targetId)) continue;
      accepted.add(m);
      newlyCaptured.push(m.targetId);
    }
    for (const targetId of newlyCaptured) captured.add(targetId);
  });

  const pointers: ContextualPointer[] = [];
  for (const m of matches) {
    if (!accepted.has(m)) continue;
    const sourceDef = sources[m.source];
    if (!sourceDef) continue;
    const context = sourceDef.context ? sourceDef.context(m.el) : attachContext(m.el, contextDepth);
    const display = sourceDef.display ? sourceDef.display(m.el) : undefined;
    pointers.push(buildPointer(m.el, m.targetId, context, display));
  }
  return pointers;
}

/**
 * Text of `scope` with every element matching `exclude` removed.
 * Works on a deep copy; the shared tree is left intact.
 */
export function textWithout(scope: XmlElement, exclude: ElementPredicate): string {
  const copy = cloneTree(scope);
  for (const el of findAll(copy, exclude)) removeElement(el);
  return textOf(copy);
}
