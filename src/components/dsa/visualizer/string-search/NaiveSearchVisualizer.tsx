import { Badge } from "@/components/ui/badge";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { Separator } from "@/components/ui/separator";
import { useState } from "react";
import { DEFAULT_SEARCH_PATTERN, DEFAULT_SEARCH_TEXT } from "@/configs/environment";
import { useNaiveSearchSession } from "@/hooks/useNaiveSearchSession";
import { searchProgress } from "@/components/dsa/visualizer/string-search/engine/searchSession";
import { SearchControls } from "@/components/dsa/visualizer/string-search/ui/SearchControls";
import { SearchGrid } from "@/components/dsa/visualizer/string-search/ui/SearchGrid";
import { SearchInput } from "@/components/dsa/visualizer/string-search/ui/SearchInput";
import type { SearchOutcome } from "@/components/dsa/visualizer/string-search/types";

const OUTCOME_LABELS: Record<SearchOutcome, string> = {
  pending: "Comparing",
  mismatch: "Mismatch",
  match: "Full match",
};

type NaiveSearchVisualizerProps = {
  initialText?: string;
  initialPattern?: string;
};

export default function NaiveSearchVisualizer({
  initialText = DEFAULT_SEARCH_TEXT,
  initialPattern = DEFAULT_SEARCH_PATTERN,
}: NaiveSearchVisualizerProps) {
  const [text, setText] = useState(initialText);
  const [pattern, setPattern] = useState(initialPattern);

  const { session, view, error, canAdvance, start, advance, reset } = useNaiveSearchSession({ text, pattern });
  const started = session.cursor.kind !== "not-started";

  const onReset = () => {
    reset();
    // keep convenient defaults
    setText(initialText);
    setPattern(initialPattern);
  };

  return (
    <div className="grid gap-6 lg:grid-cols-[1.6fr_1fr]">
      <Card>
        <CardHeader>
          <CardTitle className="text-base">Naive String Search Visualizer</CardTitle>
        </CardHeader>
        <CardContent className="space-y-6">
          <SearchGrid grid={view.grid} />

          <Separator />

          <SearchControls canAdvance={canAdvance} onAdvance={advance} onReset={onReset} />

          <div className="flex items-center justify-between">
            <span className="text-sm font-medium">Step</span>
            <span className="text-sm text-muted-foreground" data-testid="step-counter">
              {searchProgress(session)}/{session.steps.length}
            </span>
          </div>
        </CardContent>
      </Card>

      <div className="space-y-6">
        <Card>
          <CardHeader>
            <CardTitle className="text-base">Text & pattern</CardTitle>
          </CardHeader>
          <CardContent>
            <SearchInput
              text={text}
              pattern={pattern}
              onTextChange={setText}
              onPatternChange={setPattern}
              onStart={() => start(text, pattern)}
              error={error}
            />
          </CardContent>
        </Card>

        <Card>
          <CardHeader>
            <CardTitle className="text-base">What’s happening</CardTitle>
          </CardHeader>
          <CardContent className="space-y-3">
            <div className="flex items-center gap-2">
              {view.step ? <Badge variant="secondary">{OUTCOME_LABELS[view.step.outcome]}</Badge> : null}
              {started ? <Badge variant="outline">Shift {view.step?.shift ?? 0}</Badge> : null}
            </div>
            <p className="text-sm text-muted-foreground" data-testid="search-status">
              {view.status}
            </p>
            {view.summary ? (
              <div className="space-y-1">
                <p
                  className={session.foundPositions.length > 0 ? "text-sm text-primary" : "text-sm text-destructive"}
                  data-testid="search-summary"
                >
                  {view.summary}
                </p>
                <p className="text-xs text-muted-foreground">Press Reset to start again.</p>
              </div>
            ) : null}
          </CardContent>
        </Card>
      </div>
    </div>
  );
}
