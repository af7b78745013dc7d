import { readTranscript, type Transcript } from "./source.js";
import { transcriptEvents, TOOL_RESULT_MARKER, type TranscriptEvent } from "./events.js";
import { cleanText } from "./text.js";

export const PREVIEW_MAX_LINE_LEN = 150;
export const DEFAULT_PREVIEW_LIMIT = 20;
export const TRUNCATED_LINE = "  ... (truncated)";

const MARKER_USER = "▶";
const MARKER_ASSISTANT = "◀";
const MARKER_TOOL = "\u{1f527}";

function roleLine(role: string | undefined, text: string): string {
  const clipped = text.slice(0, PREVIEW_MAX_LINE_LEN);
  if (!role) return `  ${clipped}`;
  const marker = role === "user" ? MARKER_USER : MARKER_ASSISTANT;
  return `  ${marker} [${role}] ${clipped}`;
}

function isQueryTag(stripped: string): boolean {
  return stripped.startsWith("<user_query>") || stripped.startsWith("</user_query>");
}

/**
 * Turn events into display lines, one per qualifying unit. A jsonl record
 * shows at most one text line (its first non-empty text part).
 */
function* displayLines(
  events: Iterable<TranscriptEvent>,
): Generator<string, void, undefined> {
  let recordShownText = false;

  for (const event of events) {
    switch (event.kind) {
      case "message":
        recordShownText = false;
        break;
      case "toolCall":
        yield `  ${MARKER_TOOL} ${event.label.slice(0, PREVIEW_MAX_LINE_LEN)}`;
        break;
      case "text": {
        if (recordShownText) break;
        const cleaned = cleanText(event.text);
        if (!cleaned) break;
        recordShownText = true;
        yield roleLine(event.role, cleaned);
        break;
      }
      case "line": {
        const stripped = event.line.trim();
        if (!stripped || isQueryTag(stripped) || stripped.startsWith(TOOL_RESULT_MARKER)) {
          break;
        }
        const cleaned = cleanText(stripped);
        if (cleaned) yield roleLine(event.role, cleaned);
        break;
      }
    }
  }
}

/**
 * Render at most `limit` lines of a transcript, plus a truncation line when
 * more would have followed.
 */
export function previewLines(
  transcript: Transcript,
  limit: number = DEFAULT_PREVIEW_LIMIT,
): string[] {
  const out: string[] = [];
  for (const line of displayLines(transcriptEvents(transcript))) {
    if (out.length >= limit) {
      out.push(TRUNCATED_LINE);
      break;
    }
    out.push(line);
  }
  return out;
}

export interface LineSink {
  write(chunk: string): unknown;
}

/**
 * Print a transcript preview. Prints nothing when the file can't be read or
 * isn't a transcript.
 */
export function printPreview(
  filePath: string,
  limit: number = DEFAULT_PREVIEW_LIMIT,
  out: LineSink = process.stdout,
): void {
  const read = readTranscript(filePath);
  if (!read.ok) return;
  for (const line of previewLines(read.transcript, limit)) {
    out.write(line + "\n");
  }
}
