import { Button } from "@/components/ui/button";
import { RotateCcw, StepForward } from "lucide-react";

type SearchControlsProps = {
  canAdvance: boolean;
  onAdvance: () => void;
  onReset: () => void;
};

// Forward-only: the walker has no back step and no auto-play.
export function SearchControls({ canAdvance, onAdvance, onReset }: SearchControlsProps) {
  return (
    <div className="flex flex-wrap items-center gap-2">
      <Button variant="secondary" onClick={onAdvance} disabled={!canAdvance} className="gap-2" data-action="next">
        <StepForward className="h-4 w-4" />
        Next Step
      </Button>
      <Button variant="outline" onClick={onReset} className="gap-2" data-action="reset">
        <RotateCcw className="h-4 w-4" />
        Reset
      </Button>
    </div>
  );
}
