import type { SessionRecord } from "../schemas/transcript.js";

export interface WorkspaceGroup {
  workspace: string;
  sessions: SessionRecord[];
}

/**
 * Group sessions by decoded workspace path. Groups are ordered by their most
 * recent session; sessions inside a group keep newest-first order.
 */
export function groupByWorkspace(sessions: SessionRecord[]): WorkspaceGroup[] {
  const groups = new Map<string, SessionRecord[]>();

  for (const session of sessions) {
    const list = groups.get(session.workspace);
    if (list) {
      list.push(session);
    } else {
      groups.set(session.workspace, [session]);
    }
  }

  const result: WorkspaceGroup[] = [];
  for (const [workspace, list] of groups) {
    list.sort((a, b) => b.modified - a.modified);
    result.push({ workspace, sessions: list });
  }

  result.sort((a, b) => latest(b) - latest(a));
  return result;
}

function latest(group: WorkspaceGroup): number {
  return group.sessions[0]?.modified ?? 0;
}
