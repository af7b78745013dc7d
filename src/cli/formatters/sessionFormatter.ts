import type { SessionRecord } from "../../schemas/transcript.js";
import type { SessionStats } from "../../sessions/stats.js";
import { tildify } from "../../utils/paths.js";

const SHORT_ID_LEN = 8;
const LABEL_WIDTH = 18;

function summaryOf(session: SessionRecord): string {
  return session.summary || "(no summary)";
}

function row(label: string, value: string | number): string {
  return `  ${(label + ":").padEnd(LABEL_WIDTH)}${value}`;
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function formatSessionLine(session: SessionRecord): string {
  return `${session.date}  ${session.id}  ${tildify(session.workspace)}  ${summaryOf(session)}`;
}

/**
 * Header block for `show`, followed by the conversation preview.
 */
export function formatSessionDetail(session: SessionRecord, preview: string[]): string[] {
  return [
    `Session ${session.id}`,
    "",
    row("Workspace", tildify(session.workspace)),
    row("Updated", session.date),
    row("Format", session.format),
    row("Model", session.model || "unknown"),
    row("Messages", session.messages),
    row("Tool calls", session.toolCalls),
    row("Tokens", `~${session.inputTokens} in / ~${session.outputTokens} out`),
    row("Code edits", session.codeEdits),
    row("Summary", summaryOf(session)),
    "",
    "Conversation:",
    ...(preview.length > 0 ? preview : ["  (nothing to preview)"]),
  ];
}

export function formatStats(stats: SessionStats): string[] {
  const lines = [
    "Stats Dashboard",
    "",
    row("Total sessions", stats.sessions),
    row("Total messages", stats.messages),
    row("Total tool calls", stats.toolCalls),
    row("Total tokens", `~${stats.tokens}`),
    row("Code edits", stats.codeEdits),
    row("Workspaces", stats.workspaces.length),
    "",
    "Sessions by Workspace",
  ];
  for (const { workspace, sessions } of stats.workspaces) {
    lines.push(`  ${String(sessions).padStart(4)}  ${tildify(workspace)}`);
  }

  lines.push("", "Largest Sessions");
  for (const session of stats.largest) {
    const size = formatSize(session.size).padStart(9);
    lines.push(`  ${size}  ${session.id.slice(0, SHORT_ID_LEN)}  ${summaryOf(session)}`);
  }
  return lines;
}
