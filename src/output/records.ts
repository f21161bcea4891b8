/**
 * Final per-article citation records.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { CandidateCitation } from "../resolve/reference-resolver.js";
import type { DecodedEntity, EntityType } from "../types.js";

export type CitationType = "Primary" | "Secondary";

export interface CitationRecord {
  rowId: number;
  articleId: string;
  datasetId: string;
  type: CitationType;
}

export interface CitationInput {
  articleId: string;
  datasetId: string;
  type: EntityType | CitationType;
}

/**
 * Strip trailing ` .,;` and rewrite DOIs to `https://doi.org/...`, whether
 * bare (`10.`) or behind any doi.org host (`http://dx.doi.org/...`).
 */
export function normalizeDatasetId(id: string): string {
  const trimmed = id.trim().replace(/[\s.,;]+$/, "");
  const host = trimmed.indexOf("doi.org");
  if (host >= 0) return `https://${trimmed.slice(host)}`;
  return trimmed.toLowerCase().startsWith("10.") ? `https://doi.org/${trimmed}` : trimmed;
}

function compare(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function toCitationType(type: EntityType | CitationType): CitationType {
  return type.toLowerCase() === "primary" ? "Primary" : "Secondary";
}

/**
 * Normalize, de-duplicate on (article, dataset, type), sort, and number rows
 * from 0. Inputs whose id normalizes to "" are dropped.
 */
export function toCitationRecords(inputs: readonly CitationInput[]): CitationRecord[] {
  const unique = new Map<string, Omit<CitationRecord, "rowId">>();
  for (const input of inputs) {
    const datasetId = normalizeDatasetId(input.datasetId);
    if (!datasetId) continue;
    const type = toCitationType(input.type);
    const key = JSON.stringify([input.articleId, datasetId, type]);
    if (!unique.has(key)) unique.set(key, { articleId: input.articleId, datasetId, type });
  }

  return [...unique.values()]
    .sort(
      (a, b) =>
        compare(a.articleId, b.articleId) ||
        compare(a.datasetId, b.datasetId) ||
        compare(a.type, b.type)
    )
    .map((record, rowId) => ({ rowId, ...record }));
}

/**
 * Combine resolver DOIs and decoded entities of one article.
 * Resolver hits carry no class of their own and get `defaultType`.
 */
export function mergeCitationRecords(
  articleId: string,
  candidates: readonly CandidateCitation[],
  entities: readonly DecodedEntity[],
  defaultType: EntityType = "secondary"
): CitationInput[] {
  return [
    ...candidates.map((c) => ({ articleId, datasetId: c.id, type: defaultType })),
    ...entities.map((e) => ({ articleId, datasetId: e.text, type: e.type })),
  ];
}

const CSV_HEADER = "row_id,article_id,dataset_id,type";

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Records as CSV with a header line, one record per line. */
export function formatCitationCsv(records: readonly CitationRecord[]): string {
  const lines = records.map((r) =>
    [String(r.rowId), r.articleId, r.datasetId, r.type].map(csvField).join(",")
  );
  return `${[CSV_HEADER, ...lines].join("\n")}\n`;
}

export async function writeCitationCsv(path: string, records: readonly CitationRecord[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, formatCitationCsv(records), "utf-8");
}
