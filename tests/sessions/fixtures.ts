import type { SessionRecord } from "../../src/schemas/transcript.js";

export function session(overrides: Partial<SessionRecord> & { id: string }): SessionRecord {
  return {
    workspace: "/app/alpha",
    folder: "app-alpha",
    format: "jsonl",
    modified: 1_000,
    date: "2026-01-01 10:00",
    size: 100,
    messages: 2,
    toolCalls: 0,
    summary: "",
    transcriptPath: `/tmp/${overrides.id}.jsonl`,
    inputTokens: 1,
    outputTokens: 1,
    totalTokens: 2,
    model: "",
    codeEdits: 0,
    ...overrides,
  };
}
