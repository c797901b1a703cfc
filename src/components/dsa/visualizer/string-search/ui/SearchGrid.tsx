import { cn } from "@/lib/utils";
import type { CellHighlight, GridCell, SearchGridModel } from "../types";

export const HIGHLIGHT_CLASSES: Record<CellHighlight, string> = {
  default: "bg-card text-card-foreground",
  comparing: "border-yellow-500 bg-yellow-400 text-slate-900",
  mismatch: "border-red-600 bg-red-500 text-white",
  match: "border-green-600 bg-green-500 text-white",
  found: "border-blue-600 bg-blue-500 text-white",
};

const LEGEND: Array<{ highlight: CellHighlight; label: string }> = [
  { highlight: "default", label: "Default" },
  { highlight: "comparing", label: "Comparing" },
  { highlight: "mismatch", label: "Mismatch" },
  { highlight: "match", label: "Current Full Match" },
  { highlight: "found", label: "Previously Found" },
];

type SearchGridProps = {
  grid: SearchGridModel;
};

function CharCell({ cell, row, kind }: { cell: GridCell; row: number; kind: "pattern" | "text" }) {
  return (
    <div
      className={cn(
        "flex h-10 w-10 items-center justify-center rounded-md border font-mono text-lg font-semibold",
        "transition-colors duration-300",
        HIGHLIGHT_CLASSES[cell.highlight]
      )}
      style={{ gridRow: row, gridColumn: cell.column + 1 }}
      data-row={kind}
      data-index={cell.index}
      data-highlight={cell.highlight}
      aria-label={`${kind === "pattern" ? "Pattern" : "Text"} character ${cell.char} at index ${cell.index}`}
    >
      {cell.char === " " ? "␠" : cell.char}
    </div>
  );
}

export function SearchGrid({ grid }: SearchGridProps) {
  return (
    <div className="w-full space-y-4">
      <div className="overflow-x-auto rounded-lg bg-slate-800 p-4">
        <div
          className="mx-auto grid w-max gap-x-2 gap-y-2"
          style={{ gridTemplateColumns: `repeat(${Math.max(1, grid.columns)}, 2.5rem)` }}
        >
          {grid.patternLabels.map((l) => (
            <div
              key={`p-label-${l.value}`}
              className="text-center font-mono text-xs text-white"
              style={{ gridRow: 1, gridColumn: l.column + 1 }}
            >
              {l.value}
            </div>
          ))}
          {grid.patternCells.map((cell) => (
            <CharCell key={`p-${cell.index}`} cell={cell} row={2} kind="pattern" />
          ))}
          {grid.textCells.map((cell) => (
            <CharCell key={`t-${cell.index}`} cell={cell} row={3} kind="text" />
          ))}
          {grid.textLabels.map((l) => (
            <div
              key={`t-label-${l.value}`}
              className="text-center font-mono text-xs text-white"
              style={{ gridRow: 4, gridColumn: l.column + 1 }}
            >
              {l.value}
            </div>
          ))}
        </div>
      </div>

      <div className="flex flex-wrap items-center justify-center gap-4 text-xs text-muted-foreground" data-testid="search-legend">
        {LEGEND.map((item) => (
          <div key={item.highlight} className="flex items-center gap-2">
            <span className={cn("h-3 w-3 rounded-sm border", HIGHLIGHT_CLASSES[item.highlight])} />
            <span>{item.label}</span>
          </div>
        ))}
      </div>
    </div>
  );
}
