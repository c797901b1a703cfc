import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { Label } from "@/components/ui/label";
import { Search } from "lucide-react";

type SearchInputProps = {
  text: string;
  pattern: string;
  onTextChange: (v: string) => void;
  onPatternChange: (v: string) => void;
  onStart: () => void;
  error?: string | null;
};

export function SearchInput({ text, pattern, onTextChange, onPatternChange, onStart, error }: SearchInputProps) {
  return (
    <div className="space-y-3">
      <div className="grid gap-3 sm:grid-cols-[2fr_1fr]">
        <div className="space-y-2">
          <Label htmlFor="search-text">Text</Label>
          <Input
            id="search-text"
            value={text}
            onChange={(e) => onTextChange(e.target.value)}
            placeholder="Text to search…"
          />
        </div>
        <div className="space-y-2">
          <Label htmlFor="search-pattern">Pattern</Label>
          <Input
            id="search-pattern"
            value={pattern}
            onChange={(e) => onPatternChange(e.target.value)}
            placeholder="Pattern…"
          />
        </div>
      </div>
      <div className="text-xs text-muted-foreground">Tip: spaces are shown as ␠.</div>
      {error ? (
        <div role="alert" className="text-sm text-destructive">
          {error}
        </div>
      ) : null}

      <Button onClick={onStart} className="gap-2" data-action="start">
        <Search className="h-4 w-4" />
        Start Search
      </Button>
    </div>
  );
}
