import { describe, expect, it } from "vitest";
import { parseXml } from "../xml/parse.js";
import type { XmlElement } from "../xml/tree.js";
import { extractWileyCleanText, extractWileyPointers, parseWileyBibliography } from "./wiley.js";

function root(xml: string): XmlElement {
  const outcome = parseXml(xml);
  if (!outcome.ok) throw new Error(outcome.error);
  return outcome.document.root;
}

const WILEY = `
<component xmlns="http://www.wiley.com/namespaces/wiley" type="serialArticle">
  <body>
    <section>
      <p>Ice thickness <link href="#bib1">Smith 2019</link> and soils <xref ref-type="bibr" rid="bib2">[2]</xref>.</p>
      <p>See <ref target="#bib2">again</ref> and <ref target="#bib3">Kim 2017</ref>.</p>
    </section>
    <bibliography>
      <bib xml:id="bib1"><citation type="journal">Smith A. Sea ice data. 2019.</citation></bib>
      <bib xml:id="bib3"><citation-alternatives><citation>Kim C. Lake sediments. 2017.</citation></citation-alternatives></bib>
    </bibliography>
    <ref-list>
      <ref id="bib1"><citation>Duplicate entry</citation></ref>
      <ref id="bib2"><citation>Jones B. Soil cores. 2018.</citation></ref>
    </ref-list>
  </body>
</component>`;

describe("parseWileyBibliography", () => {
  it("merges bib elements and ref-list entries without overwriting", () => {
    const result = parseWileyBibliography(root(WILEY));
    expect(result.format).toBe("wiley");
    expect([...result.entries]).toEqual([
      ["bib1", "Smith A. Sea ice data. 2019."],
      ["bib3", "Kim C. Lake sediments. 2017."],
      ["bib2", "Jones B. Soil cores. 2018."],
    ]);
  });
});

describe("extractWileyCleanText", () => {
  it("reads the body without bibliography sections", () => {
    expect(extractWileyCleanText(root(WILEY))).toBe(
      "Ice thickness Smith 2019 and soils [2] . See again and Kim 2017 ."
    );
  });

  it("removes references components from a document without a body", () => {
    const text = extractWileyCleanText(
      root(
        `<article><section><p>Kept.</p></section><component type="references"><bib xml:id="b1"><citation>Gone.</citation></bib></component><references>Also gone.</references></article>`
      )
    );
    expect(text).toBe("Kept.");
  });
});

describe("extractWileyPointers", () => {
  it("combines every pointer idiom in document order", () => {
    const pointers = extractWileyPointers(root(WILEY), { contextDepth: 5 });
    expect(pointers.map((p) => [p.targetId, p.inTextCitation, p.citationTagName])).toEqual([
      ["bib1", "Smith 2019", "link"],
      ["bib2", "[2]", "xref"],
      ["bib3", "Kim 2017", "ref"],
    ]);
  });
});
