import { z } from "zod";
import type { SearchSession, SearchSessionView, SearchStep } from "../types";
import { naiveSearchSteps } from "./naiveSearchSteps";
import { renderSearchGrid, searchStatusText, searchSummaryText } from "./searchPresentation";

const EMPTY_INPUT_ERROR = "Text and Pattern cannot be empty.";

export const searchInputSchema = z
  .object({
    text: z.string().min(1, EMPTY_INPUT_ERROR),
    pattern: z.string().min(1, EMPTY_INPUT_ERROR),
  })
  .refine((v) => v.pattern.length <= v.text.length, {
    message: "Pattern cannot be longer than the text.",
    path: ["pattern"],
  });

export type SearchInput = z.infer<typeof searchInputSchema>;

export type SearchInputResult =
  | { ok: true; value: SearchInput }
  | { ok: false; error: string };

export type StartSearchResult =
  | { ok: true; session: SearchSession }
  | { ok: false; error: string; session: SearchSession };

export function validateSearchInput(text: string, pattern: string): SearchInputResult {
  const parsed = searchInputSchema.safeParse({ text, pattern });
  if (parsed.success) return { ok: true, value: parsed.data };
  return { ok: false, error: parsed.error.issues[0]?.message ?? "Invalid search input." };
}

export function createSearchSession(): SearchSession {
  return {
    text: "",
    pattern: "",
    steps: [],
    cursor: { kind: "not-started" },
    foundPositions: [],
    isComplete: false,
  };
}

/**
 * Validates the input and, if accepted, materializes the full step trace.
 * A rejected start hands back the session it was given, untouched.
 */
export function startSearchSession(session: SearchSession, text: string, pattern: string): StartSearchResult {
  const input = validateSearchInput(text, pattern);
  if (!input.ok) return { ok: false, error: input.error, session };

  return {
    ok: true,
    session: {
      text: input.value.text,
      pattern: input.value.pattern,
      steps: naiveSearchSteps(input.value.text, input.value.pattern),
      cursor: { kind: "initial" },
      foundPositions: [],
      isComplete: false,
    },
  };
}

/**
 * Moves the cursor forward by exactly one step.
 * Advancing from the last step marks the session complete; the cursor stays put so the
 * last step remains on screen. Not-started and completed sessions are returned as-is.
 */
export function advanceSearchSession(session: SearchSession): SearchSession {
  const { cursor, steps } = session;
  if (cursor.kind === "not-started" || session.isComplete) return session;

  const next = cursor.kind === "initial" ? 0 : cursor.index + 1;
  const step = steps[next];
  if (!step) return { ...session, isComplete: true };

  return {
    ...session,
    cursor: { kind: "step", index: next },
    foundPositions: step.outcome === "match" ? [...session.foundPositions, ...step.foundAt] : session.foundPositions,
  };
}

export function resetSearchSession(): SearchSession {
  return createSearchSession();
}

export function currentSearchStep(session: SearchSession): SearchStep | null {
  if (session.cursor.kind !== "step") return null;
  return session.steps[session.cursor.index] ?? null;
}

export function isSearchStarted(session: SearchSession) {
  return session.cursor.kind !== "not-started";
}

/** Position shown in the step counter: 0 before the first step, then 1..steps.length. */
export function searchProgress(session: SearchSession) {
  return session.cursor.kind === "step" ? session.cursor.index + 1 : 0;
}

/**
 * Everything the page needs after a command: the grid, status line and (once complete) summary.
 * Before a session starts, the grid previews the given input instead of the session's strings.
 */
export function describeSearchSession(
  session: SearchSession,
  preview: { text: string; pattern: string } = session,
): SearchSessionView {
  const started = isSearchStarted(session);
  const step = currentSearchStep(session);
  const text = started ? session.text : preview.text;
  const pattern = started ? session.pattern : preview.pattern;

  return {
    step,
    grid: renderSearchGrid(text, pattern, step, session.foundPositions),
    status: started ? searchStatusText(step) : "Enter text and pattern, then press Start Search.",
    summary: session.isComplete ? searchSummaryText(session.foundPositions) : null,
  };
}
