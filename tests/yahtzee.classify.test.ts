import { describe, it, expect } from "vitest";
import {
  classifyRoll,
  describeClassification,
  formatRollKind,
} from "../src/yahtzee/domain/classify";

describe("classifyRoll", () => {
  it("flags only yahtzee for five identical dice (per-die counts are all 5)", () => {
    expect(classifyRoll([6, 6, 6, 6, 6])).toEqual([true, false, false, false, false, false]);
    expect(classifyRoll([1, 1, 1, 1, 1])).toEqual([true, false, false, false, false, false]);
  });

  it("detects a low straight from the four lowest distinct values", () => {
    expect(classifyRoll([1, 2, 3, 4, 6])).toEqual([false, false, true, false, false, false]);
  });

  it("reports both straights for 2-3-4-5-6", () => {
    expect(classifyRoll([2, 3, 4, 5, 6])).toEqual([false, false, true, true, false, false]);
  });

  it("reports both straights for 1-2-3-4-5 in any order", () => {
    expect(classifyRoll([5, 3, 1, 4, 2])).toEqual([false, false, true, true, false, false]);
  });

  it("detects full house together with three of a kind", () => {
    expect(classifyRoll([1, 1, 1, 2, 2])).toEqual([false, true, false, false, false, true]);
  });

  it("does not call two pairs a full house", () => {
    expect(classifyRoll([1, 1, 2, 2, 3])).toEqual([false, false, false, false, false, false]);
  });

  it("reports four of a kind without three of a kind", () => {
    expect(classifyRoll([4, 4, 4, 4, 2])).toEqual([false, false, false, false, true, false]);
  });

  it("keeps a low straight when one value is duplicated", () => {
    expect(classifyRoll([1, 1, 2, 3, 4])).toEqual([false, false, true, false, false, false]);
    expect(classifyRoll([3, 4, 5, 6, 6])).toEqual([false, false, true, false, false, false]);
  });

  it("only checks the lowest four distinct values for the low straight", () => {
    // 3-4-5-6 is present but the lowest four distinct are 1,3,4,5
    expect(classifyRoll([1, 3, 4, 5, 6])).toEqual([false, false, false, false, false, false]);
  });

  it("rejects a five-distinct hand with a gap as a high straight", () => {
    expect(classifyRoll([1, 2, 3, 4, 6])[3]).toBe(false);
  });

  it("is pure", () => {
    const hand = [3, 3, 3, 5, 5];
    const first = classifyRoll(hand);
    const second = classifyRoll(hand);
    expect(second).toEqual(first);
    expect(hand).toEqual([3, 3, 3, 5, 5]);
  });
});

describe("describeClassification", () => {
  it("lists the matched kinds in fixed order", () => {
    expect(describeClassification(classifyRoll([2, 2, 2, 6, 6]))).toEqual([
      "full_house",
      "three_of_a_kind",
    ]);
    expect(describeClassification(classifyRoll([1, 2, 4, 5, 6]))).toEqual([]);
  });
});

describe("formatRollKind", () => {
  it("title-cases each word", () => {
    expect(formatRollKind("yahtzee")).toBe("Yahtzee");
    expect(formatRollKind("four_of_a_kind")).toBe("Four Of A Kind");
    expect(formatRollKind("low_straight")).toBe("Low Straight");
  });
});
