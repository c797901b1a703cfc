/**
 * NaiveSearchSession Hook
 * Owns the walker state for one visualizer instance and exposes the
 * start / advance / reset commands plus the derived view.
 */

import { useCallback, useMemo, useState } from 'react';
import { ENABLE_SEARCH_TRACE } from '@/configs/environment';
import type { SearchSession, SearchSessionView } from '@/components/dsa/visualizer/string-search/types';
import {
  advanceSearchSession,
  createSearchSession,
  describeSearchSession,
  resetSearchSession,
  startSearchSession,
  validateSearchInput,
} from '@/components/dsa/visualizer/string-search/engine/searchSession';

interface NaiveSearchSessionState {
  session: SearchSession;
  view: SearchSessionView;
  error: string | null;
  canAdvance: boolean;
  start: (text: string, pattern: string) => boolean;
  advance: () => void;
  reset: () => void;
}

function trace(message: string, ...details: unknown[]) {
  if (ENABLE_SEARCH_TRACE) console.info(`[naive-search] ${message}`, ...details);
}

export function useNaiveSearchSession(preview: { text: string; pattern: string }): NaiveSearchSessionState {
  const [session, setSession] = useState<SearchSession>(createSearchSession);
  const [error, setError] = useState<string | null>(null);

  const start = useCallback((text: string, pattern: string) => {
    const input = validateSearchInput(text, pattern);
    if (!input.ok) {
      if (ENABLE_SEARCH_TRACE) console.warn('[naive-search] start rejected:', input.error);
      setError(input.error);
      return false;
    }

    trace('start', { text, pattern });
    setError(null);
    setSession((prev) => startSearchSession(prev, text, pattern).session);
    return true;
  }, []);

  // Functional update so back-to-back commands each see the previous result.
  const advance = useCallback(() => {
    setSession((prev) => {
      const next = advanceSearchSession(prev);
      if (next === prev) return prev;

      if (next.isComplete) {
        trace('complete', next.foundPositions);
      } else if (next.cursor.kind === 'step') {
        trace(`step ${next.cursor.index}`, next.steps[next.cursor.index]);
      }
      return next;
    });
  }, []);

  const reset = useCallback(() => {
    trace('reset');
    setError(null);
    setSession(resetSearchSession());
  }, []);

  const { text, pattern } = preview;
  const view = useMemo(() => describeSearchSession(session, { text, pattern }), [session, text, pattern]);
  const canAdvance = session.cursor.kind !== 'not-started' && !session.isComplete;

  return { session, view, error, canAdvance, start, advance, reset };
}
