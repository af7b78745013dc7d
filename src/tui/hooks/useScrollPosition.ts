import { useState, useCallback } from "react";

/**
 * Keep `offset` within `[0, max(0, count - viewport)]`.
 */
export function clampOffset(offset: number, count: number, viewport: number): number {
  return Math.min(Math.max(0, offset), Math.max(0, count - viewport));
}

/**
 * Scroll state for a pane of `lineCount` lines shown `viewportHeight` at a
 * time. Resets to the top whenever `resetKey` changes.
 */
export function useScrollPosition(
  lineCount: number,
  viewportHeight: number,
  resetKey?: string,
) {
  const [state, setState] = useState({ offset: 0, key: resetKey });

  const offset = state.key === resetKey
    ? clampOffset(state.offset, lineCount, viewportHeight)
    : 0;

  const scrollBy = useCallback(
    (delta: number) => {
      setState((prev) => {
        const base = prev.key === resetKey ? prev.offset : 0;
        return {
          offset: clampOffset(base + delta, lineCount, viewportHeight),
          key: resetKey,
        };
      });
    },
    [lineCount, viewportHeight, resetKey],
  );

  return {
    offset,
    scrollBy,
    canScrollUp: offset > 0,
    canScrollDown: offset + viewportHeight < lineCount,
  };
}
