import { describe, expect, it } from "vitest";
import { RegexSentenceSegmenter } from "./sentence-segmenter.js";

describe("RegexSentenceSegmenter", () => {
  const segmenter = new RegexSentenceSegmenter();

  it("returns spans with offsets into the text", () => {
    const text = "Data are in GEO. See Fig. 2 for details. Done here!";
    expect(segmenter.segment(text)).toEqual([
      { start: 0, end: 16, text: "Data are in GEO." },
      { start: 17, end: 40, text: "See Fig. 2 for details." },
      { start: 41, end: 51, text: "Done here!" },
    ]);
  });

  it("does not split after et al. or initials", () => {
    const text = "As shown by Smith et al. 2020 and J. Doe, it holds.";
    expect(segmenter.segment(text).map((s) => s.text)).toEqual([text]);
  });

  it("does not split inside DOIs", () => {
    const text = "Files are at 10.5061/dryad.x1y2 online.";
    expect(segmenter.segment(text)).toHaveLength(1);
  });

  it("drops fragments shorter than the minimum length", () => {
    expect(new RegexSentenceSegmenter(10).segment("Ok. This one is long enough.")).toEqual([
      { start: 4, end: 28, text: "This one is long enough." },
    ]);
  });

  it("returns nothing for empty text", () => {
    expect(segmenter.segment("")).toEqual([]);
  });
});
