/**
 * Sentence-by-sentence entity extraction over a document's clean text.
 */

import { type ExtractionConfig, resolveConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { type LoggerMethods, silentLogger } from "../logger.js";
import type { SentenceSegmenter } from "../resolve/sentence-segmenter.js";
import type { DecodedEntity } from "../types.js";
import { type TokenOffset, decodePredictions, mergeAdjacentEntities } from "./span-decoder.js";

/** One classified token; offsets are relative to the classified sentence. */
export interface TokenPrediction {
  offset: TokenOffset | null;
  labelId: number;
}

/** Token classification model, e.g. a fine-tuned transformer behind an HTTP endpoint. */
export interface TokenClassifier {
  classify(sentence: string): Promise<TokenPrediction[]>;
}

export interface ExtractEntitiesOptions {
  config?: Partial<ExtractionConfig>;
  logger?: LoggerMethods;
}

/**
 * Classify each sentence of `text` and decode entities in document
 * coordinates. A sentence whose classification fails is logged and skipped.
 */
export async function extractEntities(
  text: string,
  segmenter: SentenceSegmenter,
  classifier: TokenClassifier,
  options: ExtractEntitiesOptions = {}
): Promise<DecodedEntity[]> {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? silentLogger;

  const entities: DecodedEntity[] = [];
  for (const sentence of segmenter.segment(text)) {
    if (sentence.text.length < config.minSentenceLength) continue;

    let predictions: TokenPrediction[];
    try {
      predictions = await classifier.classify(sentence.text);
    } catch (err) {
      logger.warn(`[ner] classification failed at offset ${sentence.start}: ${errorMessage(err)}`);
      continue;
    }

    const decoded = decodePredictions(
      sentence.text,
      predictions.map((p) => p.offset),
      predictions.map((p) => p.labelId)
    );
    for (const entity of decoded) {
      entities.push({
        ...entity,
        start: entity.start + sentence.start,
        end: entity.end + sentence.start,
      });
    }
  }

  return config.mergeAdjacentSpans ? mergeAdjacentEntities(entities, text, config.mergeGap) : entities;
}
