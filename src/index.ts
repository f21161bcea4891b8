/**
 * # dataset-citation-extractor
 *
 * Bibliography, clean text and in-text citation extraction for scholarly
 * article XML (JATS, TEI, Wiley, BioC, or anything close enough), plus the
 * pieces that turn them into dataset citation records.
 *
 * ## Workflow
 *
 * 1. **Parse**: {@link DocumentParser} reads a file with a strict XML engine,
 *    retrying with an HTML-tolerant one, and detects the schema family.
 * 2. **Extract**: the bibliography map, clean body text and citation
 *    pointers are computed lazily, once each.
 * 3. **Resolve**: {@link ReferenceResolver} joins pointers to bibliography
 *    entries and finds DOIs in candidate sentences.
 * 4. **Decode**: {@link decodePredictions} turns token classifier output into
 *    dataset mention spans.
 * 5. **Report**: {@link toCitationRecords} builds de-duplicated output rows.
 *
 * ## Quick Example
 *
 * ```typescript
 * import {
 *   DocumentParser,
 *   ReferenceResolver,
 *   RegexSentenceSegmenter,
 *   createLogger,
 *   loadConfigFromEnv,
 *   mergeCitationRecords,
 *   toCitationRecords,
 * } from "dataset-citation-extractor";
 *
 * const config = loadConfigFromEnv();
 * const logger = createLogger({ level: config.logLevel });
 * const parser = await DocumentParser.open("articles/PMC0000001.xml", { config, logger });
 *
 * parser.schemaType; // "jats"
 * parser.getBibliographyMap(); // Map { "1" => "Doe J. Example data. 2020." }
 *
 * const resolver = new ReferenceResolver(parser, new RegexSentenceSegmenter(), { logger });
 * const citations = resolver.resolveReferences();
 * const dois = [...resolver.findDirectDois(), ...resolver.resolvePointersInSentences()];
 *
 * const rows = toCitationRecords(mergeCitationRecords("PMC0000001", dois, []));
 * ```
 *
 * ## Configuration
 *
 * - **contextDepth**: ancestor levels searched for a pointer's context. Default: 5
 * - **useLenientFallback**: retry unparseable XML with the tolerant engine. Default: true
 * - **mergeAdjacentSpans** / **mergeGap**: coalesce same-type entity spans. Default: off, 1
 * - **logLevel**: level for {@link createLogger}. Default: "info"
 * - Environment: `LOG_LEVEL`, `CONTEXT_DEPTH`, `MERGE_ADJACENT_SPANS` via {@link loadConfigFromEnv}
 *
 * @module dataset-citation-extractor
 */

// === Parsing & detection ===
export { DocumentParser } from "./document-parser.js";
export type { DocumentParserOptions } from "./document-parser.js";
export { parseXml, extractDoctype } from "./xml/parse.js";
export type { ParseEngine, ParseOutcome, ParsedDocument, ParseXmlOptions } from "./xml/parse.js";
export { detectSchema, detectSchemaWithSignal } from "./schema/detector.js";
export type { DetectionResult, DetectionSignal } from "./schema/detector.js";

// === Extraction ===
export {
  BIBLIOGRAPHY_STRATEGY_ORDER,
  DEFAULT_CONTEXT_DEPTH,
  attachContext,
  createExtractor,
  runBibliographyStrategies,
} from "./extract/index.js";
export type { BibliographyResult, ExtractOptions, ExtractorStrategy } from "./extract/index.js";

// === Resolution ===
export { ReferenceResolver } from "./resolve/reference-resolver.js";
export type {
  CandidateCitation,
  CitationMethod,
  ReferenceResolverOptions,
  ReferenceSource,
  ResolverDiagnostics,
} from "./resolve/reference-resolver.js";
export { RegexSentenceSegmenter } from "./resolve/sentence-segmenter.js";
export type { SentenceSegmenter } from "./resolve/sentence-segmenter.js";
export {
  ACCESSION_PATTERNS,
  DOI_PATTERN,
  findAccessionIds,
  findDois,
  isCandidateSentence,
} from "./resolve/candidate-filter.js";

// === NER decoding ===
export { ID_TO_LABEL, LABEL_MAP, labelName } from "./ner/labels.js";
export type { LabelName } from "./ner/labels.js";
export { decodePredictions, mergeAdjacentEntities } from "./ner/span-decoder.js";
export type { TokenOffset } from "./ner/span-decoder.js";
export { alignCharSpanToLabels } from "./ner/label-alignment.js";
export type { LabelledSpan } from "./ner/label-alignment.js";
export { extractEntities } from "./ner/entity-extractor.js";
export type { ExtractEntitiesOptions, TokenClassifier, TokenPrediction } from "./ner/entity-extractor.js";

// === Output & batch ===
export {
  formatCitationCsv,
  mergeCitationRecords,
  normalizeDatasetId,
  toCitationRecords,
  writeCitationCsv,
} from "./output/records.js";
export type { CitationInput, CitationRecord, CitationType } from "./output/records.js";
export { analyzeCorpus, listXmlFiles } from "./batch/coverage-report.js";
export type { AnalyzeCorpusOptions, CoverageReport, FileOutcome } from "./batch/coverage-report.js";

// === Ambient ===
export { DEFAULT_EXTRACTION_CONFIG, LOG_LEVELS, loadConfigFromEnv, resolveConfig } from "./config.js";
export type { ExtractionConfig, LogLevel } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { CreateLoggerOptions, LoggerMethods } from "./logger.js";
export { ExtractionError } from "./errors.js";
export type { ExtractionStage } from "./errors.js";

// === Types ===
export type {
  BibliographyMap,
  ContextualPointer,
  DecodedEntity,
  EntityType,
  KnownSchema,
  ResolvedCitation,
  SchemaTag,
  Span,
} from "./types.js";
