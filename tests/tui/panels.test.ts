import { describe, it, expect } from "vitest";
import { previewLineStyle } from "../../src/tui/utils/previewStyle.js";
import { clampOffset } from "../../src/tui/hooks/useScrollPosition.js";
import { metadataRows } from "../../src/tui/SessionMetadataPanel.js";
import { TRUNCATED_LINE } from "../../src/transcripts/preview.js";
import { focusActionFor } from "../../src/tui/hooks/usePanelFocus.js";
import { keyHints, sessionStatus } from "../../src/tui/StatusBar.js";
import { session } from "../sessions/fixtures.js";

describe("previewLineStyle", () => {
  it("colours lines by direction", () => {
    expect(previewLineStyle("  ▶ [user] hi")).toEqual({ color: "blue" });
    expect(previewLineStyle("  ◀ [assistant] hi")).toEqual({ color: "green" });
    expect(previewLineStyle("  \u{1f527} read_file")).toEqual({ color: "yellow", dim: true });
    expect(previewLineStyle(TRUNCATED_LINE)).toEqual({ dim: true });
  });
});

describe("clampOffset", () => {
  it("keeps the window inside the content", () => {
    expect(clampOffset(-3, 50, 10)).toBe(0);
    expect(clampOffset(45, 50, 10)).toBe(40);
    expect(clampOffset(5, 4, 10)).toBe(0);
  });
});

describe("metadataRows", () => {
  it("lists counts, tokens and attribution", () => {
    const rows = new Map(
      metadataRows(
        session({
          id: "abc",
          workspace: "/srv/app",
          model: "",
          inputTokens: 12,
          outputTokens: 34,
          codeEdits: 3,
        }),
      ),
    );
    expect(rows.get("Workspace")).toBe("/srv/app");
    expect(rows.get("Model")).toBe("unknown");
    expect(rows.get("Tokens")).toBe("~12 in / ~34 out");
    expect(rows.get("Code edits")).toBe("3");
  });
});

describe("focusActionFor", () => {
  const none = { tab: false, shift: false, escape: false };

  it("cycles panels with tab and h/l", () => {
    expect(focusActionFor("workspaces", "", { ...none, tab: true })).toEqual({
      type: "focus",
      panel: "sessions",
    });
    expect(focusActionFor("workspaces", "", { ...none, tab: true, shift: true })).toEqual({
      type: "focus",
      panel: "preview",
    });
    expect(focusActionFor("preview", "l", none)).toEqual({ type: "focus", panel: "workspaces" });
    expect(focusActionFor("sessions", "h", none)).toEqual({ type: "focus", panel: "workspaces" });
  });

  it("jumps to a panel by number", () => {
    expect(focusActionFor("workspaces", "3", none)).toEqual({ type: "focus", panel: "preview" });
    expect(focusActionFor("workspaces", "4", none)).toBeUndefined();
  });

  it("steps back from the preview on escape", () => {
    expect(focusActionFor("preview", "", { ...none, escape: true })).toEqual({
      type: "focus",
      panel: "sessions",
    });
    expect(focusActionFor("workspaces", "", { ...none, escape: true })).toBeUndefined();
  });

  it("quits on q and ignores other keys", () => {
    expect(focusActionFor("sessions", "q", none)).toEqual({ type: "quit" });
    expect(focusActionFor("sessions", "j", none)).toBeUndefined();
  });
});

describe("status bar", () => {
  it("summarises the highlighted session", () => {
    expect(
      sessionStatus(
        session({
          id: "s1",
          date: "2026-02-03 04:05",
          messages: 7,
          toolCalls: 2,
          totalTokens: 120,
          model: "",
        }),
      ),
    ).toBe("2026-02-03 04:05 · 7 msgs · 2 tools · ~120 tokens · unknown model");
  });

  it("offers panel-specific keys", () => {
    expect(keyHints("sessions", false).map(([key]) => key)).toEqual(["j/k", "1-3 h/l", "Enter", "/", "q"]);
    expect(keyHints("preview", false).map(([key]) => key)).toEqual([
      "j/k d/u",
      "1-3 h/l",
      "Esc",
      "/",
      "q",
    ]);
    expect(keyHints("workspaces", true)).toEqual([["Enter", "keep filter"], ["Esc", "clear"]]);
  });
});
