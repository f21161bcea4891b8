import { describe, expect, it } from "vitest";
import { extractDoctype, parseXml } from "./parse.js";
import { documentElement, textOf } from "./tree.js";

describe("extractDoctype", () => {
  it("returns the declaration text", () => {
    const xml = `<!DOCTYPE collection SYSTEM "BioC.dtd">\n<collection/>`;
    expect(extractDoctype(xml)).toBe(`<!DOCTYPE collection SYSTEM "BioC.dtd">`);
  });

  it("returns null without a declaration", () => {
    expect(extractDoctype("<root/>")).toBeNull();
  });
});

describe("parseXml", () => {
  it("keeps mixed content in document order with the strict engine", () => {
    const outcome = parseXml(`<a x="1">t<b/>u</a>`);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;

    expect(outcome.document.engine).toBe("strict");
    const a = documentElement(outcome.document.root);
    expect(a?.name).toBe("a");
    expect(a?.attrs).toEqual({ x: "1" });
    expect(a?.children.map((c) => (c.kind === "text" ? c.text : `<${c.name}>`))).toEqual([
      "t",
      "<b>",
      "u",
    ]);
  });

  it("skips the XML declaration", () => {
    const outcome = parseXml(`<?xml version="1.0" encoding="UTF-8"?><root>x</root>`);
    expect(outcome.ok && documentElement(outcome.document.root)?.name).toBe("root");
  });

  it("decodes entities", () => {
    const outcome = parseXml("<p>A &amp; B</p>");
    expect(outcome.ok && textOf(outcome.document.root)).toBe("A & B");
  });

  it("keeps the path and DOCTYPE on the document", () => {
    const outcome = parseXml(`<!DOCTYPE collection SYSTEM "BioC.dtd"><collection/>`, {
      path: "/data/one.xml",
    });
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.document.path).toBe("/data/one.xml");
    expect(outcome.document.doctype).toBe(`<!DOCTYPE collection SYSTEM "BioC.dtd">`);
  });

  it("falls back to the lenient engine on malformed XML", () => {
    const outcome = parseXml("<article><p>Smith & Jones</p></article>");
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.document.engine).toBe("lenient");
    expect(outcome.strictError).toBeDefined();
    expect(textOf(outcome.document.root)).toBe("Smith & Jones");
  });

  it("keeps tag name case under the lenient engine", () => {
    const outcome = parseXml("<TEI><listBibl>A & B</listBibl></TEI>");
    expect(outcome.ok && documentElement(outcome.document.root)?.name).toBe("TEI");
  });

  it("reports failure when the lenient engine is disabled", () => {
    const outcome = parseXml("<article><p>Smith & Jones</p></article>", {
      useLenientFallback: false,
    });
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.startsWith("strict:")).toBe(true);
  });

  it.each(["", "plain text, no markup"])("fails without an element (%j)", (xml) => {
    expect(parseXml(xml).ok).toBe(false);
  });
});
