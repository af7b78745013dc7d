import { ContentPart, TranscriptRecord } from "../schemas/transcript.js";
import type { Transcript } from "./source.js";

export type Role = "user" | "assistant";

export const USER_MARKER = "user:";
export const ASSISTANT_MARKER = "assistant:";
export const TOOL_CALL_MARKER = "[Tool call]";
export const TOOL_RESULT_MARKER = "[Tool result]";

/**
 * What both the scanner and the preview see of a transcript.
 *
 * - `message`: a new turn starts. `role` is undefined for a jsonl line that
 *   isn't JSON, or a record without a role.
 * - `text`: a jsonl text part, under the record's role.
 * - `toolCall`: a tool invocation; `label` is what the preview shows.
 * - `line`: any other txt line, untrimmed, under the active role.
 */
export type TranscriptEvent =
  | { kind: "message"; role: string | undefined }
  | { kind: "text"; role: string | undefined; text: string }
  | { kind: "toolCall"; label: string }
  | { kind: "line"; role: Role | undefined; line: string };

export function* transcriptEvents(
  transcript: Transcript,
): Generator<TranscriptEvent, void, undefined> {
  switch (transcript.format) {
    case "jsonl":
      yield* jsonlEvents(transcript.content);
      return;
    case "txt":
      yield* txtEvents(transcript.content);
      return;
  }
}

function parseJson(line: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(line) };
  } catch {
    return { ok: false };
  }
}

function* jsonlEvents(content: string): Generator<TranscriptEvent, void, undefined> {
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;

    const json = parseJson(line);
    if (!json.ok) {
      yield { kind: "message", role: undefined };
      continue;
    }

    const record = TranscriptRecord.safeParse(json.value);
    const role = record.success ? record.data.role : undefined;
    // counted before anything inside the record is looked at
    yield { kind: "message", role };
    if (!record.success) continue;

    for (const rawPart of record.data.message?.content ?? []) {
      const part = ContentPart.safeParse(rawPart);
      if (!part.success) continue;

      if (part.data.type === "tool_use") {
        const { name } = part.data;
        yield { kind: "toolCall", label: typeof name === "string" && name ? name : "tool_use" };
      } else {
        yield { kind: "text", role, text: part.data.text };
      }
    }
  }
}

function* txtEvents(content: string): Generator<TranscriptEvent, void, undefined> {
  let role: Role | undefined;

  for (const line of content.split(/\r?\n/)) {
    const stripped = line.trim();

    if (stripped === USER_MARKER || stripped === ASSISTANT_MARKER) {
      role = stripped === USER_MARKER ? "user" : "assistant";
      yield { kind: "message", role };
      continue;
    }

    if (stripped.startsWith(TOOL_CALL_MARKER)) {
      yield { kind: "toolCall", label: stripped };
      continue;
    }

    yield { kind: "line", role, line };
  }
}
