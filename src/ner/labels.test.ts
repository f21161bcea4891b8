import { describe, expect, it } from "vitest";
import { ID_TO_LABEL, entityTypeOf, labelName } from "./labels.js";
import { alignCharSpanToLabels } from "./label-alignment.js";

describe("label table", () => {
  it("maps ids to names", () => {
    expect([...ID_TO_LABEL]).toEqual([
      [0, "O"],
      [1, "B-primary"],
      [2, "I-primary"],
      [3, "B-secondary"],
      [4, "I-secondary"],
    ]);
    expect(labelName(42)).toBe("O");
  });

  it("derives the entity type of a label", () => {
    expect(entityTypeOf("I-secondary")).toBe("secondary");
    expect(entityTypeOf("B-primary")).toBe("primary");
    expect(entityTypeOf("O")).toBeNull();
  });
});

describe("alignCharSpanToLabels", () => {
  it("labels the tokens inside the span B- then I-", () => {
    const offsets: Array<readonly [number, number]> = [
      [0, 0],
      [0, 4],
      [5, 9],
      [10, 14],
      [0, 0],
    ];
    expect(alignCharSpanToLabels(offsets, { start: 5, end: 14, type: "secondary" })).toEqual([
      0, 0, 3, 4, 0,
    ]);
  });

  it("leaves tokens that only overlap the span outside", () => {
    expect(alignCharSpanToLabels([[0, 6], null], { start: 2, end: 6, type: "primary" })).toEqual([
      0, 0,
    ]);
  });
});
