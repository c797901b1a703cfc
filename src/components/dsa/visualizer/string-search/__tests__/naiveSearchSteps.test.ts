import { describe, expect, it } from "vitest";
import { naiveSearchSteps } from "../engine/naiveSearchSteps";

function matchStarts(text: string, pattern: string) {
  return naiveSearchSteps(text, pattern)
    .filter((s) => s.outcome === "match")
    .flatMap((s) => s.foundAt);
}

describe("naiveSearchSteps", () => {
  it("returns no steps for an empty pattern", () => {
    expect(naiveSearchSteps("ABC", "")).toEqual([]);
  });

  it("returns no steps when the pattern is longer than the text", () => {
    expect(naiveSearchSteps("AB", "ABC")).toEqual([]);
    expect(naiveSearchSteps("", "A")).toEqual([]);
  });

  it("emits one compare and one match step for a single-character hit", () => {
    expect(naiveSearchSteps("A", "A")).toEqual([
      { id: "naive:s0:p0:compare", textIndex: 0, patternIndex: 0, shift: 0, outcome: "pending", foundAt: [] },
      { id: "naive:s0:p0:match", textIndex: 0, patternIndex: 0, shift: 0, outcome: "match", foundAt: [0] },
    ]);
  });

  it("stops a shift at the first mismatch", () => {
    expect(naiveSearchSteps("ABC", "XYZ")).toEqual([
      { id: "naive:s0:p0:compare", textIndex: 0, patternIndex: 0, shift: 0, outcome: "pending", foundAt: [] },
      { id: "naive:s0:p0:mismatch", textIndex: 0, patternIndex: 0, shift: 0, outcome: "mismatch", foundAt: [] },
    ]);
  });

  it("traces matches and mismatches across shifts in emission order", () => {
    const trace = naiveSearchSteps("ABAB", "AB").map((s) => [s.textIndex, s.patternIndex, s.shift, s.outcome]);
    expect(trace).toEqual([
      [0, 0, 0, "pending"],
      [1, 1, 0, "pending"],
      [1, 1, 0, "match"],
      [1, 0, 1, "pending"],
      [1, 0, 1, "mismatch"],
      [2, 0, 2, "pending"],
      [3, 1, 2, "pending"],
      [3, 1, 2, "match"],
    ]);
  });

  it("finds every occurrence left to right", () => {
    expect(matchStarts("AABAACAADAABAABA", "AABA")).toEqual([0, 9, 12]);
  });

  it("finds overlapping occurrences", () => {
    expect(matchStarts("AAAA", "AA")).toEqual([0, 1, 2]);
    expect(naiveSearchSteps("AAAA", "AA")).toHaveLength(9);
  });

  it("is deterministic for identical input", () => {
    expect(naiveSearchSteps("AABAACAADAABAABA", "AABA")).toEqual(naiveSearchSteps("AABAACAADAABAABA", "AABA"));
  });

  it("keeps shifts non-decreasing and pattern indices increasing from 0 within a shift", () => {
    const inputs: Array<[string, string]> = [
      ["AABAACAADAABAABA", "AABA"],
      ["mississippi", "issi"],
      ["abcabcabd", "abd"],
    ];

    for (const [text, pattern] of inputs) {
      const steps = naiveSearchSteps(text, pattern);
      let lastShift = -1;
      let expectedIndex = 0;

      for (const step of steps) {
        expect(step.shift).toBeGreaterThanOrEqual(lastShift);
        if (step.shift !== lastShift) {
          lastShift = step.shift;
          expectedIndex = 0;
        }
        if (step.outcome === "pending") {
          expect(step.patternIndex).toBe(expectedIndex);
          expect(step.textIndex).toBe(step.shift + step.patternIndex);
          expectedIndex++;
        }
      }
    }
  });

  it("reports as many full matches as there are occurrences", () => {
    const text = "mississippi";
    const pattern = "issi";
    let occurrences = 0;
    for (let i = 0; i + pattern.length <= text.length; i++) {
      if (text.slice(i, i + pattern.length) === pattern) occurrences++;
    }
    expect(occurrences).toBe(2);
    expect(matchStarts(text, pattern)).toEqual([1, 4]);
  });
});
