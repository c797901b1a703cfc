import type { SearchOutcome, SearchStep } from "../types";

const KIND: Record<SearchOutcome, string> = {
  pending: "compare",
  mismatch: "mismatch",
  match: "match",
};

function makeStep(textIndex: number, patternIndex: number, shift: number, outcome: SearchOutcome): SearchStep {
  return {
    id: `naive:s${shift}:p${patternIndex}:${KIND[outcome]}`,
    textIndex,
    patternIndex,
    shift,
    outcome,
    foundAt: outcome === "match" ? [shift] : [],
  };
}

/**
 * Generates deterministic naive string search steps.
 * - Tries every shift left to right, comparing left to right within a shift.
 * - Each comparison yields a "pending" step, followed by a "mismatch" step if the characters differ.
 * - A shift with no mismatch yields one "match" step; scanning continues, so overlaps are found.
 */
export function naiveSearchSteps(text: string, pattern: string): SearchStep[] {
  const n = text.length;
  const m = pattern.length;
  const steps: SearchStep[] = [];

  if (m === 0 || n < m) return steps;

  for (let shift = 0; shift <= n - m; shift++) {
    let matched = true;

    for (let j = 0; j < m; j++) {
      steps.push(makeStep(shift + j, j, shift, "pending"));

      if (text[shift + j] !== pattern[j]) {
        steps.push(makeStep(shift + j, j, shift, "mismatch"));
        matched = false;
        break;
      }
    }

    if (matched) {
      steps.push(makeStep(shift + m - 1, m - 1, shift, "match"));
    }
  }

  return steps;
}
