import type { EntityType } from "../types.js";
import { LABEL_MAP, labelId } from "./labels.js";
import type { TokenOffset } from "./span-decoder.js";

export interface LabelledSpan {
  start: number;
  end: number;
  type: EntityType;
}

/**
 * Per-token label ids for one labelled character span.
 *
 * Tokens lying wholly inside the span get `B-` (the first) or `I-` (the
 * rest); padding tokens and tokens outside the span stay `O`.
 */
export function alignCharSpanToLabels(
  offsets: ReadonlyArray<TokenOffset | null>,
  span: LabelledSpan
): number[] {
  const labels = offsets.map((): number => LABEL_MAP.O);
  let first = true;
  offsets.forEach((offset, i) => {
    if (!offset) return;
    const [start, end] = offset;
    if (start === 0 && end === 0) return;
    if (start < span.start || end > span.end) return;
    labels[i] = labelId(first ? "B" : "I", span.type);
    first = false;
  });
  return labels;
}
