import { TranscriptFormat, type SessionRecord } from "../schemas/transcript.js";
import type { WorkspaceGroup } from "./groups.js";

interface SearchFilters {
  freeText: string[];
  format?: TranscriptFormat;
  model?: string;
}

function parseQuery(query: string): SearchFilters {
  const tokens = query
    .toLowerCase()
    .split(/\s+/)
    .map((token) => token.trim())
    .filter(Boolean);

  const filters: SearchFilters = { freeText: [] };

  for (const token of tokens) {
    if (token.startsWith("format:")) {
      const format = TranscriptFormat.safeParse(token.slice("format:".length));
      if (format.success) {
        filters.format = format.data;
        continue;
      }
    }

    if (token.startsWith("model:")) {
      const model = token.slice("model:".length);
      if (model) {
        filters.model = model;
        continue;
      }
    }

    filters.freeText.push(token);
  }

  return filters;
}

function matchesSession(session: SessionRecord, filters: SearchFilters) {
  if (filters.format && session.format !== filters.format) {
    return false;
  }

  if (filters.model && !session.model.toLowerCase().includes(filters.model)) {
    return false;
  }

  if (filters.freeText.length === 0) {
    return true;
  }

  const target = `${session.summary} ${session.workspace} ${session.model} ${session.id}`
    .toLowerCase();
  return filters.freeText.every((token) => target.includes(token));
}

export function filterGroups(groups: WorkspaceGroup[], query: string) {
  if (!query) return groups;
  const filters = parseQuery(query);
  return groups
    .map((group) => ({
      ...group,
      sessions: group.sessions.filter((session) => matchesSession(session, filters)),
    }))
    .filter((group) => group.sessions.length > 0);
}

export function filterSessions(sessions: SessionRecord[], query: string) {
  if (!query) return sessions;
  const filters = parseQuery(query);
  return sessions.filter((session) => matchesSession(session, filters));
}

/** Sessions whose workspace path contains `needle`, ignoring case. */
export function filterByWorkspace(sessions: SessionRecord[], needle: string) {
  const lowered = needle.toLowerCase();
  return sessions.filter((session) => session.workspace.toLowerCase().includes(lowered));
}

/** The first session, in index order, whose id starts with `prefix`. */
export function findSession(
  sessions: SessionRecord[],
  prefix: string,
): SessionRecord | undefined {
  if (!prefix) return undefined;
  return sessions.find((session) => session.id.startsWith(prefix));
}
