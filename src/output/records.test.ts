import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  formatCitationCsv,
  mergeCitationRecords,
  normalizeDatasetId,
  toCitationRecords,
  writeCitationCsv,
} from "./records.js";

describe("normalizeDatasetId", () => {
  it("turns bare DOIs into resolvable URLs", () => {
    expect(normalizeDatasetId("10.5061/dryad.abc.")).toBe("https://doi.org/10.5061/dryad.abc");
  });

  it("strips trailing punctuation", () => {
    expect(normalizeDatasetId(" GSE12345; ")).toBe("GSE12345");
  });

  it("rewrites any doi.org host to the https resolver", () => {
    expect(normalizeDatasetId("http://dx.doi.org/10.5061/dryad.x")).toBe("https://doi.org/10.5061/dryad.x");
    expect(normalizeDatasetId("https://doi.org/10.1/x")).toBe("https://doi.org/10.1/x");
  });

  it("leaves other URLs alone", () => {
    expect(normalizeDatasetId("https://www.ebi.ac.uk/ena/PRJEB1")).toBe("https://www.ebi.ac.uk/ena/PRJEB1");
  });
});

describe("toCitationRecords", () => {
  it("de-duplicates, sorts and numbers rows", () => {
    const records = toCitationRecords([
      { articleId: "a2", datasetId: "10.1/b", type: "primary" },
      { articleId: "a1", datasetId: "GSE1", type: "secondary" },
      { articleId: "a1", datasetId: "GSE1.", type: "Secondary" },
      { articleId: "a1", datasetId: "GSE1", type: "primary" },
      { articleId: "a1", datasetId: " ; ", type: "primary" },
      { articleId: "a2", datasetId: "http://dx.doi.org/10.1/b", type: "primary" },
    ]);
    expect(records).toEqual([
      { rowId: 0, articleId: "a1", datasetId: "GSE1", type: "Primary" },
      { rowId: 1, articleId: "a1", datasetId: "GSE1", type: "Secondary" },
      { rowId: 2, articleId: "a2", datasetId: "https://doi.org/10.1/b", type: "Primary" },
    ]);
  });
});

describe("mergeCitationRecords", () => {
  it("combines resolver hits and decoded entities", () => {
    const inputs = mergeCitationRecords(
      "a1",
      [{ context: "ctx", id: "10.5281/zenodo.1", method: "direct_doi" }],
      [{ text: "GSE9", type: "primary", start: 0, end: 4 }]
    );
    expect(inputs).toEqual([
      { articleId: "a1", datasetId: "10.5281/zenodo.1", type: "secondary" },
      { articleId: "a1", datasetId: "GSE9", type: "primary" },
    ]);
  });
});

describe("formatCitationCsv", () => {
  it("writes a header and quotes fields with commas", () => {
    expect(
      formatCitationCsv([{ rowId: 0, articleId: "a1", datasetId: "x,y", type: "Primary" }])
    ).toBe('row_id,article_id,dataset_id,type\n0,a1,"x,y",Primary\n');
  });
});

describe("writeCitationCsv", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "records-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates parent directories", async () => {
    const path = join(dir, "out", "submission.csv");
    await writeCitationCsv(path, [{ rowId: 0, articleId: "a1", datasetId: "GSE1", type: "Secondary" }]);
    expect(await readFile(path, "utf-8")).toBe(
      "row_id,article_id,dataset_id,type\n0,a1,GSE1,Secondary\n"
    );
  });
});
