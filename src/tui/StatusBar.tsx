import React from "react";
import { Box, Text } from "ink";
import type { PanelId } from "./hooks/usePanelFocus.js";
import type { SessionRecord } from "../schemas/transcript.js";

export const FILTER_HELP = "format:jsonl|txt  model:<name>";

interface StatusBarProps {
  activePanel: PanelId;
  searchMode: boolean;
  searchQuery: string;
  selectedSession: SessionRecord | null;
  shownSessions: number;
  totalSessions: number;
  previewLimit: number;
}

/** Key hints for the focused panel, as `[key, action]` pairs. */
export function keyHints(panel: PanelId, searchMode: boolean): Array<[string, string]> {
  if (searchMode) {
    return [["Enter", "keep filter"], ["Esc", "clear"]];
  }
  const moving: [string, string] = panel === "preview" ? ["j/k d/u", "scroll"] : ["j/k", "move"];
  const hints: Array<[string, string]> = [moving, ["1-3 h/l", "panels"]];
  if (panel === "sessions") hints.push(["Enter", "preview"]);
  if (panel === "preview") hints.push(["Esc", "back"]);
  hints.push(["/", "search"], ["q", "quit"]);
  return hints;
}

/** One-line digest of the highlighted session. */
export function sessionStatus(session: SessionRecord): string {
  return [
    session.date,
    `${session.messages} msgs`,
    `${session.toolCalls} tools`,
    `~${session.totalTokens} tokens`,
    session.model || "unknown model",
  ].join(" · ");
}

export function StatusBar({
  activePanel,
  searchMode,
  searchQuery,
  selectedSession,
  shownSessions,
  totalSessions,
  previewLimit,
}: StatusBarProps) {
  const counts =
    shownSessions === totalSessions
      ? `${totalSessions} sessions`
      : `${shownSessions}/${totalSessions} sessions`;

  return (
    <Box flexDirection="column">
      <Text wrap="truncate">
        <Text dimColor>{` ${counts}  preview ≤${previewLimit} lines`}</Text>
        {selectedSession && <Text>{`  ${sessionStatus(selectedSession)}`}</Text>}
      </Text>
      <Text wrap="truncate">
        {searchMode || searchQuery ? (
          <Text>
            <Text color="cyan">{` /${searchQuery}`}</Text>
            {searchMode && <Text dimColor>{`  ${FILTER_HELP}`}</Text>}
          </Text>
        ) : null}
        {keyHints(activePanel, searchMode).map(([key, action]) => (
          <Text key={key} dimColor>
            {"  "}
            <Text bold color="yellow">{key}</Text> {action}
          </Text>
        ))}
      </Text>
    </Box>
  );
}
