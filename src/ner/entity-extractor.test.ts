import { describe, expect, it, vi } from "vitest";
import type { LoggerMethods } from "../logger.js";
import { RegexSentenceSegmenter } from "../resolve/sentence-segmenter.js";
import { type TokenClassifier, type TokenPrediction, extractEntities } from "./entity-extractor.js";

const segmenter = new RegexSentenceSegmenter();

/** Labels "GSE12345" as B-primary wherever it appears in a sentence. */
async function fakeClassify(sentence: string): Promise<TokenPrediction[]> {
  const start = sentence.indexOf("GSE12345");
  if (start < 0) return [{ offset: [0, 4], labelId: 0 }];
  return [
    { offset: [0, 0], labelId: 0 },
    { offset: [start, start + 8], labelId: 1 },
    { offset: [start + 9, start + 13], labelId: 0 },
  ];
}

describe("extractEntities", () => {
  it("returns entities in document coordinates", async () => {
    const text = "Nothing more to say here. Data in GSE12345 here.";
    const classifier: TokenClassifier = { classify: vi.fn(fakeClassify) };

    const entities = await extractEntities(text, segmenter, classifier);

    expect(entities).toEqual([{ text: "GSE12345", type: "primary", start: 34, end: 42 }]);
    expect(text.slice(34, 42)).toBe("GSE12345");
    expect(classifier.classify).toHaveBeenCalledTimes(2);
  });

  it("skips sentences shorter than the minimum length", async () => {
    const classifier: TokenClassifier = { classify: vi.fn(fakeClassify) };
    await extractEntities("Data in GSE12345 here.", segmenter, classifier, {
      config: { minSentenceLength: 100 },
    });
    expect(classifier.classify).not.toHaveBeenCalled();
  });

  it("logs and skips a sentence whose classification fails", async () => {
    const logger: LoggerMethods = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const classifier: TokenClassifier = {
      classify: vi.fn(async (sentence: string) => {
        if (sentence.startsWith("Broken")) throw new Error("model offline");
        return fakeClassify(sentence);
      }),
    };

    const entities = await extractEntities(
      "Broken sentence first. Data in GSE12345 here.",
      segmenter,
      classifier,
      { logger }
    );

    expect(entities.map((e) => e.text)).toEqual(["GSE12345"]);
    expect(logger.warn).toHaveBeenCalledWith(
      "[ner] classification failed at offset 0: model offline"
    );
  });

  it("merges adjacent spans when enabled", async () => {
    const classifier: TokenClassifier = {
      classify: vi.fn(async () => [
        { offset: [8, 12] as const, labelId: 1 },
        { offset: [12, 13] as const, labelId: 0 },
        { offset: [13, 17] as const, labelId: 1 },
      ]),
    };
    const entities = await extractEntities("Data in GSE1 GSE2 here.", segmenter, classifier, {
      config: { mergeAdjacentSpans: true, mergeGap: 1 },
    });
    expect(entities).toEqual([{ text: "GSE1 GSE2", type: "primary", start: 8, end: 17 }]);
  });
});
