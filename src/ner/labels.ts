/**
 * BIO label table of the dataset-mention token classifier.
 */

import type { EntityType } from "../types.js";

export const LABEL_MAP = {
  O: 0,
  "B-primary": 1,
  "I-primary": 2,
  "B-secondary": 3,
  "I-secondary": 4,
} as const;

export type LabelName = keyof typeof LABEL_MAP;

export const ID_TO_LABEL: ReadonlyMap<number, LabelName> = new Map<number, LabelName>(
  Object.entries(LABEL_MAP).map(([name, id]): [number, LabelName] => [id, toLabelName(name)])
);

function toLabelName(name: string): LabelName {
  switch (name) {
    case "B-primary":
    case "I-primary":
    case "B-secondary":
    case "I-secondary":
      return name;
    default:
      return "O";
  }
}

/** Label name of a predicted id; ids outside the table read as `O`. */
export function labelName(id: number): LabelName {
  return ID_TO_LABEL.get(id) ?? "O";
}

/** Entity type carried by a label, or null for `O`. */
export function entityTypeOf(label: LabelName): EntityType | null {
  if (label === "O") return null;
  return label.endsWith("primary") ? "primary" : "secondary";
}

export function labelId(position: "B" | "I", type: EntityType): number {
  return LABEL_MAP[`${position}-${type}` as const];
}
