import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { analyzeCorpus, listXmlFiles } from "./coverage-report.js";

const JATS = `<article article-type="research-article"><body><p>Text <xref ref-type="bibr" rid="b1">[1]</xref>.</p></body><back><ref-list><ref id="b1"><mixed-citation>Ref A</mixed-citation></ref></ref-list></back></article>`;
const NO_BIBLIOGRAPHY = "<root><p>No references here.</p></root>";

describe("coverage report", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "coverage-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("listXmlFiles", () => {
    it("lists xml files sorted by name", async () => {
      await writeFile(join(dir, "b.XML"), JATS);
      await writeFile(join(dir, "a.xml"), JATS);
      await writeFile(join(dir, "notes.txt"), "skip");
      expect(await listXmlFiles(dir)).toEqual([join(dir, "a.xml"), join(dir, "b.XML")]);
    });

    it("throws a read error for a missing directory", async () => {
      await expect(listXmlFiles(join(dir, "absent"))).rejects.toMatchObject({
        name: "ExtractionError",
        stage: "read",
      });
    });
  });

  describe("analyzeCorpus", () => {
    it("summarizes successes and isolates failures", async () => {
      const good = join(dir, "good.xml");
      const empty = join(dir, "empty.xml");
      const noBib = join(dir, "no-bib.xml");
      const missing = join(dir, "missing.xml");
      await writeFile(good, JATS);
      await writeFile(empty, "");
      await writeFile(noBib, NO_BIBLIOGRAPHY);
      const onProgress = vi.fn();

      const report = await analyzeCorpus([good, noBib, empty, missing], {
        concurrency: 2,
        onProgress,
      });

      expect(report.totalFiles).toBe(4);
      expect(report.successCount).toBe(1);
      expect(report.successRate).toBe(0.25);
      expect(report.engineOnSuccess).toEqual({ strict: 1 });
      expect(report.formatOnSuccess).toEqual({ jats: 1 });
      expect(report.engineOnFailure).toEqual({ strict: 1, none: 2 });
      expect(report.formatOnFailure).toEqual({ none: 3 });
      expect(report.failures.map((f) => [f.path, f.error?.stage])).toEqual([
        [noBib, "extract"],
        [empty, "parse"],
        [missing, "read"],
      ]);
      expect(report.files[0]).toMatchObject({
        path: good,
        schemaType: "jats",
        bibliographySize: 1,
        pointerCount: 1,
        error: null,
      });
      expect(onProgress).toHaveBeenCalledTimes(4);
    });

    it("reports a zero rate for an empty corpus", async () => {
      const report = await analyzeCorpus([]);
      expect(report.totalFiles).toBe(0);
      expect(report.successRate).toBe(0);
      expect(report.failures).toEqual([]);
    });
  });
});
