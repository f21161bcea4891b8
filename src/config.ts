/**
 * Extraction settings with defaults and environment overrides.
 */

import { z } from "zod";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ExtractionConfig {
  /** How many ancestors to climb when looking for a pointer's block-level context. */
  contextDepth: number;
  /** Retry with the HTML-tolerant engine when strict XML parsing fails. */
  useLenientFallback: boolean;
  /** Lower-case keywords that make a sentence a resolution candidate. */
  candidateKeywords: readonly string[];
  /** Sentences shorter than this are not sent to the token classifier. */
  minSentenceLength: number;
  /** Coalesce same-type entity spans separated by at most `mergeGap` characters. */
  mergeAdjacentSpans: boolean;
  mergeGap: number;
  /** pino level handed to `createLogger`. */
  logLevel: LogLevel;
}

export const DEFAULT_CANDIDATE_KEYWORDS: readonly string[] = [
  "doi",
  "accession",
  "available",
  "deposited",
  "database",
  "repository",
  "dryad",
  "zenodo",
  "figshare",
  "genbank",
  "seanoe",
  "pdb",
  "geo",
  "arrayexpress",
  "biosample",
  "bioproject",
  "dataset",
  "supplementary material",
  "supplemental data",
];

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = {
  contextDepth: 5,
  useLenientFallback: true,
  candidateKeywords: DEFAULT_CANDIDATE_KEYWORDS,
  minSentenceLength: 5,
  mergeAdjacentSpans: false,
  mergeGap: 1,
  logLevel: "info",
};

/** Merge partial overrides onto the defaults. */
export function resolveConfig(overrides: Partial<ExtractionConfig> = {}): ExtractionConfig {
  return { ...DEFAULT_EXTRACTION_CONFIG, ...overrides };
}

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const logLevelSchema = z.enum(LOG_LEVELS).optional();
const contextDepthSchema = z.coerce.number().int().min(1).max(50).optional();
const mergeAdjacentSpansSchema = booleanFlag.optional();

/**
 * Read overrides from environment variables.
 * Each invalid variable is ignored on its own; the rest still apply.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): ExtractionConfig {
  const overrides: Partial<ExtractionConfig> = {};

  const level = logLevelSchema.safeParse(env.LOG_LEVEL);
  if (level.success && level.data !== undefined) overrides.logLevel = level.data;

  const depth = contextDepthSchema.safeParse(env.CONTEXT_DEPTH);
  if (depth.success && depth.data !== undefined) overrides.contextDepth = depth.data;

  const merge = mergeAdjacentSpansSchema.safeParse(env.MERGE_ADJACENT_SPANS);
  if (merge.success && merge.data !== undefined) overrides.mergeAdjacentSpans = merge.data;

  return resolveConfig(overrides);
}
