import type { SessionRecord } from "../schemas/transcript.js";
import { groupByWorkspace } from "./groups.js";

export const DEFAULT_LARGEST_COUNT = 5;

export interface WorkspaceCount {
  workspace: string;
  sessions: number;
}

export interface SessionStats {
  sessions: number;
  messages: number;
  toolCalls: number;
  tokens: number;
  codeEdits: number;
  /** Busiest first; ties keep the most recently active first. */
  workspaces: WorkspaceCount[];
  /** By transcript size, largest first. */
  largest: SessionRecord[];
}

export function computeStats(
  sessions: SessionRecord[],
  largestCount: number = DEFAULT_LARGEST_COUNT,
): SessionStats {
  const totals = { messages: 0, toolCalls: 0, tokens: 0, codeEdits: 0 };
  for (const session of sessions) {
    totals.messages += session.messages;
    totals.toolCalls += session.toolCalls;
    totals.tokens += session.totalTokens;
    totals.codeEdits += session.codeEdits;
  }

  const workspaces = groupByWorkspace(sessions)
    .map((group) => ({ workspace: group.workspace, sessions: group.sessions.length }))
    .sort((a, b) => b.sessions - a.sessions);

  const largest = [...sessions].sort((a, b) => b.size - a.size).slice(0, largestCount);

  return { sessions: sessions.length, ...totals, workspaces, largest };
}
