import type { CellHighlight, GridCell, GridLabel, SearchGridModel, SearchStep } from "../types";

function inRange(column: number, columns: number) {
  return column >= 0 && column < columns;
}

function patternHighlight(step: SearchStep | null, k: number): CellHighlight {
  if (!step) return "default";
  if (step.outcome === "match") return "match";
  if (k !== step.patternIndex) return "default";
  return step.outcome === "pending" ? "comparing" : "mismatch";
}

function textHighlight(
  step: SearchStep | null,
  k: number,
  found: ReadonlySet<number>,
  current: ReadonlySet<number>,
): CellHighlight {
  if (step?.outcome === "pending" && k === step.textIndex) return "comparing";
  if (step?.outcome === "mismatch" && k === step.textIndex) return "mismatch";
  if (current.has(k)) return "match";
  return found.has(k) ? "found" : "default";
}

function coveredPositions(starts: readonly number[], m: number): Set<number> {
  const covered = new Set<number>();
  for (const start of starts) {
    for (let k = 0; k < m; k++) covered.add(start + k);
  }
  return covered;
}

/**
 * Builds the four-row grid (pattern labels, pattern, text, text labels) for one step.
 * Without a step the pattern sits unshifted and nothing is highlighted.
 */
export function renderSearchGrid(
  text: string,
  pattern: string,
  step: SearchStep | null,
  foundPositions: readonly number[],
): SearchGridModel {
  const n = text.length;
  const m = pattern.length;
  const shift = step?.shift ?? 0;

  const found = coveredPositions(foundPositions, m);
  const current = step?.outcome === "match" ? coveredPositions(step.foundAt, m) : new Set<number>();

  const patternLabels: GridLabel[] = [];
  const patternCells: GridCell[] = [];
  for (let k = 0; k < m; k++) {
    const column = shift + k;
    if (!inRange(column, n)) continue;
    patternLabels.push({ column, value: k });
    patternCells.push({ index: k, column, char: pattern[k] ?? "", highlight: patternHighlight(step, k) });
  }

  const textCells: GridCell[] = [];
  const textLabels: GridLabel[] = [];
  for (let k = 0; k < n; k++) {
    textCells.push({ index: k, column: k, char: text[k] ?? "", highlight: textHighlight(step, k, found, current) });
    textLabels.push({ column: k, value: k });
  }

  return { columns: n, shift, patternLabels, patternCells, textCells, textLabels };
}

export function searchStatusText(step: SearchStep | null): string {
  if (!step) return "Ready. Press 'Next Step' to begin comparison.";

  switch (step.outcome) {
    case "pending":
      return `Shifting pattern by ${step.shift}. Comparing pattern[${step.patternIndex}] with text[${step.textIndex}].`;
    case "mismatch":
      return `Mismatch at text[${step.textIndex}] and pattern[${step.patternIndex}]. Shifting pattern.`;
    case "match":
      return `Pattern found at index ${step.foundAt[0] ?? step.shift}! Press 'Next Step' to continue search.`;
  }
}

export function searchSummaryText(foundPositions: readonly number[]): string {
  if (foundPositions.length === 0) return "Search complete. Pattern not found.";
  return `Search complete. Pattern found at indices: [${foundPositions.join(", ")}]`;
}
