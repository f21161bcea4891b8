/**
 * Two-engine XML parsing.
 *
 * The strict engine is fast-xml-parser: the source is validated first and
 * then parsed with `preserveOrder: true` to keep interleaved text and
 * elements in document order. When validation fails or yields no element,
 * node-html-parser re-reads the same source; it tolerates unbalanced tags,
 * bare ampersands and other damage common in harvested article XML.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { HTMLElement, type Node as HtmlNode, TextNode, parse as parseHtml } from "node-html-parser";
import {
  DOCUMENT_NODE_NAME,
  type XmlElement,
  appendChild,
  createElement,
  createText,
  elementChildren,
} from "./tree.js";

export type ParseEngine = "strict" | "lenient";

/** A parsed input file. Created once and never mutated afterwards. */
export interface ParsedDocument {
  /** Synthetic `#document` node wrapping the top-level nodes. */
  readonly root: XmlElement;
  /** Raw `<!DOCTYPE ...>` declaration, when the source carries one. */
  readonly doctype: string | null;
  readonly engine: ParseEngine;
  readonly path: string | null;
}

export interface ParseXmlOptions {
  path?: string;
  /** Retry with the HTML-tolerant engine when strict parsing fails. Default: true. */
  useLenientFallback?: boolean;
}

export type ParseOutcome =
  | { ok: true; document: ParsedDocument; strictError?: string }
  | { ok: false; error: string };

const strictParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  trimValues: false,
  preserveOrder: true,
  parseTagValue: false,
  parseAttributeValue: false,
  processEntities: true,
  htmlEntities: true,
});

const DOCTYPE_PATTERN = /<!DOCTYPE\s[^[>]*(?:\[[\s\S]*?\]\s*)?>/i;
const PROLOGUE_PATTERN = /<\?[\s\S]*?\?>|<!DOCTYPE\s[^[>]*(?:\[[\s\S]*?\]\s*)?>/gi;

/** Extract the DOCTYPE declaration text from raw source. */
export function extractDoctype(xml: string): string | null {
  const match = DOCTYPE_PATTERN.exec(xml);
  return match ? match[0] : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ─── Strict engine ───────────────────────────────────────────────────

function readOrderedAttrs(value: unknown): Record<string, string> {
  const attrs: Record<string, string> = {};
  if (!isRecord(value)) return attrs;
  for (const [key, raw] of Object.entries(value)) {
    if (key.startsWith("@_")) attrs[key.slice(2)] = String(raw);
  }
  return attrs;
}

/** Get the tag name of an ordered node (the first key that isn't ":@" or "#text"). */
function orderedTagName(node: Record<string, unknown>): string | undefined {
  for (const key of Object.keys(node)) {
    if (key !== ":@" && key !== "#text") return key;
  }
  return undefined;
}

function appendOrdered(nodes: unknown, parent: XmlElement): void {
  if (!Array.isArray(nodes)) return;
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    if ("#text" in node) {
      const text = node["#text"];
      if (text != null) appendChild(parent, createText(String(text)));
      continue;
    }
    const tag = orderedTagName(node);
    // Processing instructions (`?xml`) and declarations carry no content.
    if (!tag || tag.startsWith("?") || tag.startsWith("!")) continue;
    const el = createElement(tag, readOrderedAttrs(node[":@"]));
    appendChild(parent, el);
    appendOrdered(node[tag], el);
  }
}

function parseStrict(xml: string): { root: XmlElement } | { error: string } {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { code, msg, line } = validation.err;
    return { error: `${code}: ${msg} (line ${line})` };
  }
  const parsed: unknown = strictParser.parse(xml);
  const root = createElement(DOCUMENT_NODE_NAME);
  appendOrdered(parsed, root);
  if (elementChildren(root).length === 0) return { error: "no root element" };
  return { root };
}

// ─── Lenient engine ──────────────────────────────────────────────────

function appendHtml(nodes: HtmlNode[], parent: XmlElement): void {
  for (const node of nodes) {
    if (node instanceof TextNode) {
      appendChild(parent, createText(node.text));
    } else if (node instanceof HTMLElement) {
      const el = createElement(node.rawTagName, { ...node.attributes });
      appendChild(parent, el);
      appendHtml(node.childNodes, el);
    }
  }
}

function parseLenient(xml: string): { root: XmlElement } | { error: string } {
  // node-html-parser keeps `<?xml ?>` and DOCTYPE as literal text.
  const source = xml.replace(PROLOGUE_PATTERN, "");
  const html = parseHtml(source, { lowerCaseTagName: false, comment: false });
  const root = createElement(DOCUMENT_NODE_NAME);
  appendHtml(html.childNodes, root);
  if (elementChildren(root).length === 0) return { error: "no element found" };
  return { root };
}

// ─── Entry point ─────────────────────────────────────────────────────

/**
 * Parse XML source into a {@link ParsedDocument}.
 *
 * Never throws: engine failures are reported through the outcome.
 */
export function parseXml(xml: string, options: ParseXmlOptions = {}): ParseOutcome {
  const path = options.path ?? null;
  const doctype = extractDoctype(xml);

  let strictError: string;
  try {
    const strict = parseStrict(xml);
    if ("root" in strict) {
      return { ok: true, document: { root: strict.root, doctype, engine: "strict", path } };
    }
    strictError = strict.error;
  } catch (err) {
    strictError = err instanceof Error ? err.message : String(err);
  }

  if (options.useLenientFallback === false) {
    return { ok: false, error: `strict: ${strictError}` };
  }

  try {
    const lenient = parseLenient(xml);
    if ("root" in lenient) {
      return {
        ok: true,
        document: { root: lenient.root, doctype, engine: "lenient", path },
        strictError,
      };
    }
    return { ok: false, error: `strict: ${strictError}; lenient: ${lenient.error}` };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `strict: ${strictError}; lenient: ${message}` };
  }
}
