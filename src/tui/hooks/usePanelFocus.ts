import { useInput, type Key } from "ink";
import { useState } from "react";

export type PanelId = "workspaces" | "sessions" | "preview";

export const PANELS: readonly PanelId[] = ["workspaces", "sessions", "preview"];

export type FocusAction =
  | { type: "quit" }
  | { type: "focus"; panel: PanelId };

type KeyState = Pick<Key, "tab" | "shift" | "escape">;

/**
 * Map a keypress to a focus change. `1`-`3` jump straight to a panel;
 * `Esc` in the preview goes back to the session list.
 */
export function focusActionFor(
  current: PanelId,
  input: string,
  key: KeyState,
): FocusAction | undefined {
  if (input === "q") return { type: "quit" };

  const jump = PANELS[Number(input) - 1];
  if (/^[1-9]$/.test(input) && jump) return { type: "focus", panel: jump };

  if (key.escape && current === "preview") return { type: "focus", panel: "sessions" };

  const backwards = (key.tab && key.shift) || input === "h";
  const forwards = (key.tab && !key.shift) || input === "l";
  if (!backwards && !forwards) return undefined;

  const idx = PANELS.indexOf(current) + (forwards ? 1 : -1);
  const panel = PANELS[(idx + PANELS.length) % PANELS.length];
  return panel ? { type: "focus", panel } : undefined;
}

export function usePanelFocus(onQuit: () => void, enabled = true) {
  const [activePanel, setActivePanel] = useState<PanelId>("workspaces");

  useInput(
    (input, key) => {
      const action = focusActionFor(activePanel, input, key);
      if (!action) return;
      if (action.type === "quit") {
        onQuit();
      } else {
        setActivePanel(action.panel);
      }
    },
    { isActive: enabled },
  );

  return { activePanel, setActivePanel };
}
