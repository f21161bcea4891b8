/**
 * Bibliography coverage over a corpus of XML files.
 *
 * Each file gets its own DocumentParser; a file that fails in any way is
 * recorded in the report and never stops the rest of the batch.
 */

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import type { ExtractionConfig } from "../config.js";
import { DocumentParser } from "../document-parser.js";
import { ExtractionError, errorMessage } from "../errors.js";
import { type LoggerMethods, silentLogger } from "../logger.js";
import type { KnownSchema, SchemaTag } from "../types.js";
import type { ParseEngine } from "../xml/parse.js";

export interface AnalyzeCorpusOptions {
  /** Files processed at once. Default: 4 */
  concurrency?: number;
  config?: Partial<ExtractionConfig>;
  logger?: LoggerMethods;
  onProgress?: (progress: { completed: number; total: number; path: string }) => void;
}

export interface FileOutcome {
  path: string;
  parserUsed: ParseEngine | null;
  schemaType: SchemaTag | null;
  bibliographyFormat: KnownSchema | null;
  bibliographySize: number;
  pointerCount: number;
  /** Set when no bibliography could be extracted. */
  error: ExtractionError | null;
}

export interface CoverageReport {
  totalFiles: number;
  successCount: number;
  /** Share of files with a non-empty bibliography, 0..1. */
  successRate: number;
  engineOnSuccess: Record<string, number>;
  formatOnSuccess: Record<string, number>;
  engineOnFailure: Record<string, number>;
  formatOnFailure: Record<string, number>;
  failures: FileOutcome[];
  files: FileOutcome[];
}

/** `.xml` files directly inside `dir`, sorted by name. */
export async function listXmlFiles(dir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err) {
    throw new ExtractionError(`cannot list directory: ${errorMessage(err)}`, "read", {
      path: dir,
      cause: err,
    });
  }
  return names
    .filter((name) => name.toLowerCase().endsWith(".xml"))
    .sort()
    .map((name) => join(dir, name));
}

async function analyzeFile(
  path: string,
  options: AnalyzeCorpusOptions,
  logger: LoggerMethods
): Promise<FileOutcome> {
  const outcome: FileOutcome = {
    path,
    parserUsed: null,
    schemaType: null,
    bibliographyFormat: null,
    bibliographySize: 0,
    pointerCount: 0,
    error: null,
  };

  try {
    const parserOptions: { logger: LoggerMethods; config?: Partial<ExtractionConfig> } = { logger };
    if (options.config) parserOptions.config = options.config;
    const parser = await DocumentParser.open(path, parserOptions);

    outcome.parserUsed = parser.parserUsed;
    outcome.schemaType = parser.schemaType;
    outcome.bibliographySize = parser.getBibliographyMap().size;
    outcome.bibliographyFormat = parser.bibliographyFormatUsed;
    outcome.pointerCount = parser.getPointerMap().length;

    if (!parser.isReadable) {
      outcome.error = new ExtractionError(parser.errors.join("; "), "read", { path });
    } else if (parser.isNull) {
      outcome.error = new ExtractionError(parser.errors.join("; "), "parse", { path });
    } else if (outcome.bibliographySize === 0) {
      outcome.error = new ExtractionError("no bibliography entries found", "extract", { path });
    }
  } catch (err) {
    outcome.error = new ExtractionError(errorMessage(err), "analyze", { path, cause: err });
    logger.error(`[analyze] ${path}: ${outcome.error.message}`);
  }
  return outcome;
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Parse every file and summarize bibliography extraction.
 */
export async function analyzeCorpus(
  paths: readonly string[],
  options: AnalyzeCorpusOptions = {}
): Promise<CoverageReport> {
  const logger = options.logger ?? silentLogger;
  const concurrency = Math.max(1, options.concurrency ?? 4);
  const files: FileOutcome[] = new Array(paths.length);
  let nextIndex = 0;
  let completed = 0;

  async function worker(): Promise<void> {
    while (nextIndex < paths.length) {
      const index = nextIndex++;
      const path = paths[index];
      if (path === undefined) continue;

      files[index] = await analyzeFile(path, options, logger);
      completed++;
      options.onProgress?.({ completed, total: paths.length, path });
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, paths.length) }, () => worker());
  await Promise.all(workers);

  const report: CoverageReport = {
    totalFiles: paths.length,
    successCount: 0,
    successRate: 0,
    engineOnSuccess: {},
    formatOnSuccess: {},
    engineOnFailure: {},
    formatOnFailure: {},
    failures: [],
    files,
  };

  for (const file of files) {
    const engine = file.parserUsed ?? "none";
    const format = file.bibliographyFormat ?? "none";
    if (file.error === null) {
      report.successCount++;
      increment(report.engineOnSuccess, engine);
      increment(report.formatOnSuccess, format);
    } else {
      report.failures.push(file);
      increment(report.engineOnFailure, engine);
      increment(report.formatOnFailure, format);
    }
  }
  report.successRate = report.totalFiles > 0 ? report.successCount / report.totalFiles : 0;

  logger.info(
    `[analyze] ${report.successCount}/${report.totalFiles} files with a bibliography`
  );
  return report;
}
