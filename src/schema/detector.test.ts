import { describe, expect, it } from "vitest";
import { type ParsedDocument, parseXml } from "../xml/parse.js";
import { detectSchema, detectSchemaWithSignal } from "./detector.js";

function parse(xml: string): ParsedDocument {
  const outcome = parseXml(xml);
  if (!outcome.ok) throw new Error(outcome.error);
  return outcome.document;
}

const JATS_DOCTYPE =
  '<!DOCTYPE article PUBLIC "-//NLM//DTD JATS (Z39.96) Journal Archiving and Interchange DTD v1.2 20190208//EN" "JATS-archivearticle1.dtd">';

describe("detectSchemaWithSignal", () => {
  it("trusts a JATS DOCTYPE regardless of body content", () => {
    const doc = parse(
      `${JATS_DOCTYPE}<article><teiHeader/><body><listBibl><biblStruct xml:id="r1"/></listBibl></body></article>`
    );
    expect(detectSchemaWithSignal(doc)).toEqual({ schema: "jats", signal: "doctype" });
  });

  it("recognizes a BioC DOCTYPE", () => {
    const doc = parse(`<!DOCTYPE collection SYSTEM "BioC.dtd"><collection><document/></collection>`);
    expect(detectSchemaWithSignal(doc)).toEqual({ schema: "bioc", signal: "doctype" });
  });

  it("recognizes the TEI namespace on the root", () => {
    const doc = parse(`<TEI xmlns="http://www.tei-c.org/ns/1.0"><text/></TEI>`);
    expect(detectSchemaWithSignal(doc)).toEqual({ schema: "tei", signal: "namespace" });
  });

  it("recognizes a prefixed TEI root", () => {
    const doc = parse(`<tei:TEI xmlns:tei="http://www.tei-c.org/ns/1.0"><tei:text/></tei:TEI>`);
    expect(detectSchema(doc)).toBe("tei");
  });

  it("recognizes the Wiley namespace on the root or a nested component", () => {
    const root = parse(`<component xmlns="http://www.wiley.com/namespaces/wiley"><body/></component>`);
    const nested = parse(
      `<wrapper><component xmlns="http://www.wiley.com/namespaces/wiley"/></wrapper>`
    );
    expect(detectSchemaWithSignal(root)).toEqual({ schema: "wiley", signal: "namespace" });
    expect(detectSchemaWithSignal(nested)).toEqual({ schema: "wiley", signal: "namespace" });
  });

  it("recognizes BioC reference passages", () => {
    const doc = parse(
      `<collection><document><passage><infon key="section_type">REF</infon><text>Doe J.</text></passage></document></collection>`
    );
    expect(detectSchemaWithSignal(doc)).toEqual({ schema: "bioc", signal: "bioc-structure" });
  });

  it("ignores BioC-like passages next to JATS metadata", () => {
    const doc = parse(
      `<article article-type="research-article"><front><article-meta/></front><passage><infon key="section_type">REF</infon></passage><ref-list/></article>`
    );
    expect(detectSchemaWithSignal(doc)).toEqual({ schema: "jats", signal: "jats-structure" });
  });

  it("recognizes a Wiley references component", () => {
    const doc = parse(`<article><component type="references"/></article>`);
    expect(detectSchemaWithSignal(doc)).toEqual({ schema: "wiley", signal: "wiley-structure" });
  });

  it("recognizes JATS front matter with a ref-list", () => {
    const doc = parse(
      `<article><front><journal-meta/><article-meta/></front><back><ref-list/></back></article>`
    );
    expect(detectSchemaWithSignal(doc)).toEqual({ schema: "jats", signal: "jats-structure" });
  });

  it("recognizes a TEI header with a bibliography list", () => {
    const doc = parse(`<TEI><teiHeader/><text><back><listBibl/></back></text></TEI>`);
    expect(detectSchemaWithSignal(doc)).toEqual({ schema: "tei", signal: "tei-structure" });
  });

  it("recognizes Wiley bib ids", () => {
    const doc = parse(`<doc><bib xml:id="b1"><citation>X</citation></bib></doc>`);
    expect(detectSchemaWithSignal(doc)).toEqual({ schema: "wiley", signal: "wiley-bib-id" });
  });

  it("tells Wiley ref-lists from JATS ones by their citation element", () => {
    const wiley = parse(`<doc><ref-list><ref id="r1"><citation>X</citation></ref></ref-list></doc>`);
    const jats = parse(
      `<doc><ref-list><ref id="r1"><mixed-citation>X</mixed-citation></ref></ref-list></doc>`
    );
    expect(detectSchemaWithSignal(wiley)).toEqual({ schema: "wiley", signal: "ref-list-shape" });
    expect(detectSchemaWithSignal(jats)).toEqual({ schema: "jats", signal: "ref-list-shape" });
  });

  it("returns unknown when nothing matches", () => {
    const doc = parse("<root><p>Nothing to see</p></root>");
    expect(detectSchemaWithSignal(doc)).toEqual({ schema: "unknown", signal: "none" });
  });

  it("is repeatable", () => {
    const doc = parse(`<TEI><teiHeader/><listBibl/></TEI>`);
    expect(detectSchema(doc)).toBe(detectSchema(doc));
    expect(detectSchema(doc)).toBe("tei");
  });
});
