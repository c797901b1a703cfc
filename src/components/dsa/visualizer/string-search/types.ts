export type SearchOutcome = "pending" | "mismatch" | "match";

export type SearchStep = {
  id: string;
  textIndex: number;
  patternIndex: number;
  shift: number; // start of the current alignment; for "match" this is the match start
  outcome: SearchOutcome;
  foundAt: number[]; // [] or [shift] on a full match
};

export type SearchCursor =
  | { kind: "not-started" }
  | { kind: "initial" }
  | { kind: "step"; index: number };

export type SearchSession = {
  text: string;
  pattern: string;
  steps: readonly SearchStep[];
  cursor: SearchCursor;
  foundPositions: number[];
  isComplete: boolean;
};

export type CellHighlight = "default" | "comparing" | "mismatch" | "match" | "found";

export type GridCell = {
  /** Index into the pattern or text this cell shows. */
  index: number;
  /** 0-based grid column, aligned to text positions. */
  column: number;
  char: string;
  highlight: CellHighlight;
};

export type GridLabel = {
  column: number;
  value: number;
};

export type SearchGridModel = {
  columns: number;
  shift: number;
  patternLabels: GridLabel[];
  patternCells: GridCell[];
  textCells: GridCell[];
  textLabels: GridLabel[];
};

export type SearchSessionView = {
  step: SearchStep | null;
  grid: SearchGridModel;
  status: string;
  summary: string | null;
};
