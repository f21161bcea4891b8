/**
 * Reconstruct entity spans from token-level predictions.
 *
 * Tokens with any B- or I- label are grouped into runs that end at the first
 * `O`; each run's type is the majority vote over its tokens. Runs cannot
 * cross the boundary of the sequence they were predicted in; see
 * {@link mergeAdjacentEntities} for re-joining them.
 */

import type { DecodedEntity, EntityType } from "../types.js";
import { entityTypeOf, labelName } from "./labels.js";

/** Character offsets `[start, end)` of a token in the classified text. */
export type TokenOffset = readonly [number, number];

function isPadding(offset: TokenOffset | null | undefined): boolean {
  return !offset || (offset[0] === 0 && offset[1] === 0);
}

/** Most frequent type; ties go to the type seen first. */
function majorityType(types: readonly EntityType[]): EntityType | undefined {
  const votes = new Map<EntityType, number>();
  for (const type of types) votes.set(type, (votes.get(type) ?? 0) + 1);
  let winner: EntityType | undefined;
  let best = 0;
  for (const [type, count] of votes) {
    if (count > best) {
      winner = type;
      best = count;
    }
  }
  return winner;
}

/**
 * Decode predictions for one classified text.
 *
 * @param offsets - One entry per token; `null` or `[0, 0]` marks special and padding tokens
 * @param predictions - Label id per token. Extra ids beyond `offsets` are ignored.
 */
export function decodePredictions(
  text: string,
  offsets: ReadonlyArray<TokenOffset | null>,
  predictions: readonly number[]
): DecodedEntity[] {
  const length = Math.min(offsets.length, predictions.length);
  const runs: number[][] = [];
  let current: number[] = [];

  for (let i = 0; i < length; i++) {
    if (isPadding(offsets[i])) continue;
    const prediction = predictions[i];
    const type = prediction === undefined ? null : entityTypeOf(labelName(prediction));
    if (type === null) {
      if (current.length > 0) runs.push(current);
      current = [];
      continue;
    }
    current.push(i);
  }
  if (current.length > 0) runs.push(current);

  const entities: DecodedEntity[] = [];
  for (const run of runs) {
    const types: EntityType[] = [];
    for (const i of run) {
      const prediction = predictions[i];
      const type = prediction === undefined ? null : entityTypeOf(labelName(prediction));
      if (type) types.push(type);
    }
    const type = majorityType(types);
    const first = offsets[run[0] ?? -1];
    const last = offsets[run[run.length - 1] ?? -1];
    if (!type || !first || !last) continue;

    const start = first[0];
    const end = last[1];
    if (end <= start) continue;
    entities.push({ text: text.slice(start, end), type, start, end });
  }
  return entities;
}

/**
 * Coalesce same-type entities separated by at most `gap` characters,
 * re-slicing the merged span from `text`.
 */
export function mergeAdjacentEntities(
  entities: readonly DecodedEntity[],
  text: string,
  gap = 1
): DecodedEntity[] {
  const sorted = [...entities].sort((a, b) => a.start - b.start);
  const merged: DecodedEntity[] = [];
  for (const entity of sorted) {
    const previous = merged[merged.length - 1];
    if (previous && previous.type === entity.type && entity.start - previous.end <= gap) {
      const end = Math.max(previous.end, entity.end);
      merged[merged.length - 1] = {
        text: text.slice(previous.start, end),
        type: previous.type,
        start: previous.start,
        end,
      };
      continue;
    }
    merged.push({ ...entity });
  }
  return merged;
}
