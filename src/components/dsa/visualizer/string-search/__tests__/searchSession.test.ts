import { describe, expect, it } from "vitest";
import { naiveSearchSteps } from "../engine/naiveSearchSteps";
import {
  advanceSearchSession,
  createSearchSession,
  currentSearchStep,
  describeSearchSession,
  resetSearchSession,
  searchProgress,
  startSearchSession,
  validateSearchInput,
} from "../engine/searchSession";
import type { SearchSession } from "../types";

function started(text: string, pattern: string): SearchSession {
  const result = startSearchSession(createSearchSession(), text, pattern);
  if (!result.ok) throw new Error(result.error);
  return result.session;
}

function advanceTimes(session: SearchSession, times: number) {
  let s = session;
  for (let i = 0; i < times; i++) s = advanceSearchSession(s);
  return s;
}

describe("validateSearchInput", () => {
  it("accepts a pattern no longer than the text", () => {
    expect(validateSearchInput("AB", "AB")).toEqual({ ok: true, value: { text: "AB", pattern: "AB" } });
  });

  it("rejects empty text or pattern", () => {
    expect(validateSearchInput("", "A")).toEqual({ ok: false, error: "Text and Pattern cannot be empty." });
    expect(validateSearchInput("A", "")).toEqual({ ok: false, error: "Text and Pattern cannot be empty." });
  });

  it("rejects a pattern longer than the text", () => {
    expect(validateSearchInput("AB", "ABC")).toEqual({ ok: false, error: "Pattern cannot be longer than the text." });
  });
});

describe("search session", () => {
  it("starts out not started", () => {
    expect(createSearchSession()).toEqual({
      text: "",
      pattern: "",
      steps: [],
      cursor: { kind: "not-started" },
      foundPositions: [],
      isComplete: false,
    });
  });

  it("leaves the session untouched when start is rejected", () => {
    const session = createSearchSession();
    const result = startSearchSession(session, "AB", "ABC");

    expect(result.ok).toBe(false);
    expect(result.session).toBe(session);
  });

  it("treats advance before start as a no-op", () => {
    const session = createSearchSession();
    expect(advanceSearchSession(session)).toBe(session);
  });

  it("begins at the initial position with the generated steps", () => {
    const session = started("AAAA", "AA");

    expect(session.cursor).toEqual({ kind: "initial" });
    expect(session.steps).toEqual(naiveSearchSteps("AAAA", "AA"));
    expect(currentSearchStep(session)).toBeNull();
    expect(searchProgress(session)).toBe(0);
  });

  it("clears found positions when restarted", () => {
    const walked = advanceTimes(started("AAAA", "AA"), 3);
    expect(walked.foundPositions).toEqual([0]);

    const result = startSearchSession(walked, "AAAA", "AA");
    expect(result.ok).toBe(true);
    expect(result.session.foundPositions).toEqual([]);
    expect(result.session.cursor).toEqual({ kind: "initial" });
  });

  it("needs one extra advance after the last step to complete", () => {
    let session = started("A", "A");

    session = advanceSearchSession(session);
    expect(session.cursor).toEqual({ kind: "step", index: 0 });
    expect(session.foundPositions).toEqual([]);

    session = advanceSearchSession(session);
    expect(session.cursor).toEqual({ kind: "step", index: 1 });
    expect(session.foundPositions).toEqual([0]);
    expect(session.isComplete).toBe(false);

    session = advanceSearchSession(session);
    expect(session.isComplete).toBe(true);
    expect(session.cursor).toEqual({ kind: "step", index: 1 });

    expect(advanceSearchSession(session)).toBe(session);
  });

  it("places the cursor at k - 1 after k advances", () => {
    const session = started("AABAACAADAABAABA", "AABA");

    for (let k = 1; k <= session.steps.length; k++) {
      expect(advanceTimes(session, k).cursor).toEqual({ kind: "step", index: k - 1 });
    }
  });

  it("collects every match start over a full walk", () => {
    const session = started("AABAACAADAABAABA", "AABA");
    const done = advanceTimes(session, session.steps.length + 1);

    expect(done.isComplete).toBe(true);
    expect(done.foundPositions).toEqual([0, 9, 12]);
    expect(done.foundPositions).toEqual(session.steps.flatMap((s) => s.foundAt));
    expect(describeSearchSession(done).summary).toBe("Search complete. Pattern found at indices: [0, 9, 12]");
  });

  it("collects overlapping matches", () => {
    const session = started("AAAA", "AA");
    expect(advanceTimes(session, session.steps.length + 1).foundPositions).toEqual([0, 1, 2]);
  });

  it("reports not found when nothing matches", () => {
    const session = started("ABC", "XYZ");
    expect(session.steps).toHaveLength(2);

    const done = advanceTimes(session, 3);
    const view = describeSearchSession(done);

    expect(done.isComplete).toBe(true);
    expect(done.foundPositions).toEqual([]);
    expect(view.summary).toBe("Search complete. Pattern not found.");
    expect(view.status).toBe("Mismatch at text[0] and pattern[0]. Shifting pattern.");
  });

  it("resets to not started", () => {
    expect(resetSearchSession()).toEqual(createSearchSession());
  });
});

describe("describeSearchSession", () => {
  it("previews the given input before a session starts", () => {
    const view = describeSearchSession(createSearchSession(), { text: "XY", pattern: "Y" });

    expect(view.step).toBeNull();
    expect(view.status).toBe("Enter text and pattern, then press Start Search.");
    expect(view.summary).toBeNull();
    expect(view.grid.textCells.map((c) => c.char)).toEqual(["X", "Y"]);
    expect(view.grid.patternCells.map((c) => [c.column, c.char])).toEqual([[0, "Y"]]);
  });

  it("renders the session strings once started", () => {
    const session = advanceTimes(started("AAAA", "AA"), 3);
    const view = describeSearchSession(session, { text: "edited", pattern: "ed" });

    expect(view.status).toBe("Pattern found at index 0! Press 'Next Step' to continue search.");
    expect(view.grid.textCells.map((c) => c.highlight)).toEqual(["match", "match", "default", "default"]);
  });

  it("shows the ready prompt at the initial position", () => {
    expect(describeSearchSession(started("AAAA", "AA")).status).toBe("Ready. Press 'Next Step' to begin comparison.");
  });
});
