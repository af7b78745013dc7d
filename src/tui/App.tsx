import React, { useState, useMemo, useEffect, useCallback } from "react";
import { Box, useStdout, useInput } from "ink";
import { usePanelFocus } from "./hooks/usePanelFocus.js";
import { WorkspaceList } from "./WorkspaceList.js";
import { SessionList } from "./SessionList.js";
import { PreviewPane } from "./PreviewPane.js";
import { SessionMetadataPanel } from "./SessionMetadataPanel.js";
import { StatusBar } from "./StatusBar.js";
import { groupByWorkspace, type WorkspaceGroup } from "../sessions/groups.js";
import { filterGroups, filterSessions } from "../sessions/search.js";
import type { SessionRecord } from "../schemas/transcript.js";

interface AppProps {
  sessions: SessionRecord[];
  previewLimit: number;
  onQuit: () => void;
}

function clampIndex(index: number, length: number): number {
  return length === 0 ? 0 : Math.min(index, length - 1);
}

export function App({ sessions, previewLimit, onQuit }: AppProps) {
  const { stdout } = useStdout();
  const rows = stdout?.rows ?? 24;
  const cols = stdout?.columns ?? 80;

  const groups = useMemo(() => groupByWorkspace(sessions), [sessions]);

  const [workspaceIndex, setWorkspaceIndex] = useState(0);
  const [sessionIndex, setSessionIndex] = useState(0);
  const [searchQuery, setSearchQuery] = useState("");
  const [searchMode, setSearchMode] = useState(false);

  const filteredGroups = useMemo(
    () => filterGroups(groups, searchQuery),
    [groups, searchQuery],
  );
  const safeWorkspaceIndex = clampIndex(workspaceIndex, filteredGroups.length);
  const currentGroup: WorkspaceGroup | undefined = filteredGroups[safeWorkspaceIndex];

  const filteredSessions = useMemo(
    () => filterSessions(currentGroup?.sessions ?? [], searchQuery),
    [currentGroup, searchQuery],
  );
  const safeSessionIndex = clampIndex(sessionIndex, filteredSessions.length);
  const selectedSession = filteredSessions[safeSessionIndex] ?? null;

  const { activePanel, setActivePanel } = usePanelFocus(onQuit, !searchMode);

  useEffect(() => {
    setWorkspaceIndex(0);
    setSessionIndex(0);
  }, [searchQuery]);

  useInput((input, key) => {
    if (searchMode) {
      if (key.escape) {
        setSearchMode(false);
        setSearchQuery("");
        return;
      }
      if (key.return) {
        setSearchMode(false);
        return;
      }
      if (key.backspace || key.delete) {
        setSearchQuery((prev) => prev.slice(0, -1));
        return;
      }
      if (input && !key.ctrl && !key.meta && input.length === 1) {
        setSearchQuery((prev) => prev + input);
      }
      return;
    }

    if (input === "/") {
      setSearchMode(true);
      setSearchQuery("");
    }
  });

  const handleWorkspaceChange = useCallback((index: number) => {
    setWorkspaceIndex(index);
    setSessionIndex(0);
  }, []);

  const handleSessionChange = useCallback((index: number) => {
    setSessionIndex(index);
  }, []);

  const handleSessionSelect = useCallback(() => {
    setActivePanel("preview");
  }, [setActivePanel]);

  // two status lines below the panels
  const contentHeight = rows - 4;
  const topLeftHeight = Math.floor(contentHeight / 2);
  const leftWidth = Math.min(Math.floor(cols * 0.33), 50);
  const metaWidth = Math.min(Math.floor(cols * 0.25), 40);
  const workspaceListHeight = topLeftHeight - 3;
  const sessionListHeight = contentHeight - topLeftHeight - 3;
  const previewHeight = contentHeight - 3;

  const navigating = !searchMode;

  return (
    <Box flexDirection="column" height={rows}>
      <Box flexDirection="row" height={contentHeight}>
        <Box flexDirection="column" width={leftWidth}>
          <WorkspaceList
            groups={filteredGroups}
            isActive={navigating && activePanel === "workspaces"}
            selectedIndex={safeWorkspaceIndex}
            onSelectedChange={handleWorkspaceChange}
            height={workspaceListHeight}
          />
          <SessionList
            sessions={filteredSessions}
            isActive={navigating && activePanel === "sessions"}
            selectedIndex={safeSessionIndex}
            onSelectedChange={handleSessionChange}
            onSelect={handleSessionSelect}
            height={sessionListHeight}
          />
        </Box>
        <Box flexDirection="column" width={metaWidth}>
          <SessionMetadataPanel
            session={selectedSession}
            isActive={navigating && activePanel === "preview"}
            height={previewHeight}
          />
        </Box>
        <Box flexDirection="column" flexGrow={1}>
          <PreviewPane
            session={selectedSession}
            limit={previewLimit}
            isActive={navigating && activePanel === "preview"}
            height={previewHeight}
          />
        </Box>
      </Box>
      <StatusBar
        activePanel={activePanel}
        searchMode={searchMode}
        searchQuery={searchQuery}
        selectedSession={selectedSession}
        shownSessions={filteredGroups.reduce((n, group) => n + group.sessions.length, 0)}
        totalSessions={sessions.length}
        previewLimit={previewLimit}
      />
    </Box>
  );
}
