/**
 * Per-document facade.
 *
 * Parses the source once, detects its schema once, and computes each
 * artifact (bibliography, clean text, pointers) lazily on first access.
 * Every accessor is total: an unreadable or unparseable document yields
 * empty artifacts.
 */

import { readFile } from "node:fs/promises";
import { type ExtractionConfig, resolveConfig } from "./config.js";
import { ExtractionError, errorMessage } from "./errors.js";
import { createExtractor, runBibliographyStrategies } from "./extract/index.js";
import { type BibliographyResult, type ExtractorStrategy, emptyBibliography } from "./extract/types.js";
import { type LoggerMethods, silentLogger } from "./logger.js";
import { type DetectionResult, detectSchemaWithSignal } from "./schema/detector.js";
import type { BibliographyMap, ContextualPointer, KnownSchema, SchemaTag } from "./types.js";
import { type ParseEngine, type ParseXmlOptions, type ParsedDocument, parseXml } from "./xml/parse.js";

export interface DocumentParserOptions {
  config?: Partial<ExtractionConfig>;
  logger?: LoggerMethods;
  /** Source path, kept for diagnostics. */
  path?: string;
}

export class DocumentParser {
  readonly path: string | null;
  private readonly config: ExtractionConfig;
  private readonly logger: LoggerMethods;
  private readonly document: ParsedDocument | null = null;
  private readonly detection: DetectionResult | null = null;
  private readonly extractor: ExtractorStrategy | null = null;
  private readonly problems: string[] = [];
  private readonly readable: boolean;

  private bibliography: BibliographyResult | null = null;
  private fullText: string | null = null;
  private pointers: readonly ContextualPointer[] | null = null;

  /**
   * @param xml - Source text, or null when it could not be read
   *   (the parser then stays in its null state).
   */
  constructor(xml: string | null, options: DocumentParserOptions = {}) {
    this.path = options.path ?? null;
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? silentLogger;
    this.readable = xml !== null;

    if (xml === null) return;

    const parseOptions: ParseXmlOptions = { useLenientFallback: this.config.useLenientFallback };
    if (options.path) parseOptions.path = options.path;
    const outcome = parseXml(xml, parseOptions);
    if (!outcome.ok) {
      this.problems.push(outcome.error);
      this.logger.warn(`[parse] ${this.label}: unparseable (${outcome.error})`);
      return;
    }
    if (outcome.strictError !== undefined) {
      this.problems.push(`strict: ${outcome.strictError}`);
      this.logger.warn(`[parse] ${this.label}: strict parse failed, used lenient engine`);
    }

    this.document = outcome.document;
    this.detection = detectSchemaWithSignal(outcome.document);
    this.extractor = createExtractor(this.detection.schema);
    this.logger.debug(
      `[detect] ${this.label}: ${this.detection.schema} (signal: ${this.detection.signal})`
    );
  }

  /**
   * Read `path` and build a parser. A read failure yields a null-state parser.
   * Only the file read is async; parsing and extraction run synchronously.
   */
  static async open(path: string, options: Omit<DocumentParserOptions, "path"> = {}): Promise<DocumentParser> {
    const logger = options.logger ?? silentLogger;
    try {
      const xml = await readFile(path, "utf-8");
      return new DocumentParser(xml, { ...options, path });
    } catch (err) {
      const error = new ExtractionError(`cannot read file: ${errorMessage(err)}`, "read", {
        path,
        cause: err,
      });
      logger.warn(`[read] ${path}: ${error.message}`);
      const parser = new DocumentParser(null, { ...options, path });
      parser.problems.push(error.message);
      return parser;
    }
  }

  static fromString(xml: string, options: DocumentParserOptions = {}): DocumentParser {
    return new DocumentParser(xml, options);
  }

  private get label(): string {
    return this.path ?? "<string>";
  }

  /** False when the source could not be read at all. */
  get isReadable(): boolean {
    return this.readable;
  }

  /** True when nothing could be read or parsed. */
  get isNull(): boolean {
    return this.document === null;
  }

  /** Engine that produced the tree, or null in the null state. */
  get parserUsed(): ParseEngine | null {
    return this.document?.engine ?? null;
  }

  get schemaType(): SchemaTag | null {
    return this.detection?.schema ?? null;
  }

  /** Rule set that actually produced the bibliography map. Computes it if needed. */
  get bibliographyFormatUsed(): KnownSchema | null {
    return this.bibliographyResult().format;
  }

  /** Read, parse and extraction problems recorded so far. */
  get errors(): readonly string[] {
    return this.problems;
  }

  getBibliographyMap(): BibliographyMap {
    return this.bibliographyResult().entries;
  }

  /** Element id → citation key, for keys that differ from the ids pointers carry. */
  getBibliographyAliases(): ReadonlyMap<string, string> {
    return this.bibliographyResult().aliases;
  }

  getFullText(): string {
    if (this.fullText === null) {
      const { document, extractor } = this;
      this.fullText =
        document && extractor
          ? this.guard("clean text", () => extractor.extractCleanText(document.root), "")
          : "";
    }
    return this.fullText;
  }

  /** Pointers in document order. */
  getPointerMap(): readonly ContextualPointer[] {
    if (this.pointers === null) {
      const { document, extractor } = this;
      const options = { contextDepth: this.config.contextDepth };
      this.pointers =
        document && extractor
          ? this.guard("pointers", () => extractor.extractPointers(document.root, options), [])
          : [];
    }
    return this.pointers;
  }

  private bibliographyResult(): BibliographyResult {
    if (this.bibliography) return this.bibliography;

    const { document, extractor } = this;
    let result = emptyBibliography();
    if (document && extractor) {
      result = this.guard("bibliography", () => extractor.parseBibliography(document.root), result);
      // Retry explicitly so the reported format names the rules that worked.
      if (result.entries.size === 0 && extractor.schema === "unknown") {
        result = runBibliographyStrategies(document.root, this.logger);
      }
      this.logger.debug(
        `[extract] ${this.label}: ${result.entries.size} bibliography entries (format: ${result.format ?? "none"})`
      );
    }
    this.bibliography = result;
    return result;
  }

  /** Run one extraction step; a throw is logged, recorded, and replaced by `fallback`. */
  private guard<T>(artifact: string, compute: () => T, fallback: T): T {
    try {
      return compute();
    } catch (err) {
      const message = `${artifact} extraction failed: ${errorMessage(err)}`;
      this.problems.push(message);
      this.logger.warn(`[extract] ${this.label}: ${message}`);
      return fallback;
    }
  }
}
