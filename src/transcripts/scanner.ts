import { readTranscript, type Transcript } from "./source.js";
import { transcriptEvents } from "./events.js";
import { estimateTokens, toSummary } from "./text.js";
import type { ScanResult } from "../schemas/transcript.js";

const USER_QUERY_RE = /<user_query>\s*([\s\S]*?)\s*<\/user_query>/;

export function emptyScanResult(): ScanResult {
  return {
    summary: "",
    messages: 0,
    toolCalls: 0,
    inputTokens: 0,
    outputTokens: 0,
  };
}

/**
 * Accumulates everything the index needs in one pass over a transcript.
 */
class ScanAccumulator {
  summary = "";
  messages = 0;
  toolCalls = 0;
  private inputChars = 0;
  private outputChars = 0;

  addChars(role: string | undefined, chars: number): void {
    if (role === "user") {
      this.inputChars += chars;
    } else {
      this.outputChars += chars;
    }
  }

  offerSummary(text: string): void {
    if (this.summary) return;
    this.summary = toSummary(text);
  }

  toResult(): ScanResult {
    return {
      summary: this.summary,
      messages: this.messages,
      toolCalls: this.toolCalls,
      inputTokens: estimateTokens(this.inputChars),
      outputTokens: estimateTokens(this.outputChars),
    };
  }
}

/**
 * Derive summary, message count, tool-call count and token estimates from a
 * transcript. Never throws.
 */
export function scanTranscript(transcript: Transcript): ScanResult {
  const acc = new ScanAccumulator();

  // a tagged query in a txt transcript is the summary, full stop
  let summaryFromLines = true;
  if (transcript.format === "txt") {
    const match = USER_QUERY_RE.exec(transcript.content);
    if (match?.[1] !== undefined) {
      acc.offerSummary(match[1]);
      summaryFromLines = false;
    }
  }

  for (const event of transcriptEvents(transcript)) {
    switch (event.kind) {
      case "message":
        acc.messages += 1;
        break;
      case "toolCall":
        acc.toolCalls += 1;
        break;
      case "text":
        acc.addChars(event.role, event.text.length);
        if (event.role === "user") acc.offerSummary(event.text);
        break;
      case "line": {
        // text before the first role marker belongs to nobody
        if (!event.role) break;
        acc.addChars(event.role, event.line.length);
        const stripped = event.line.trim();
        if (
          summaryFromLines &&
          event.role === "user" &&
          stripped &&
          !stripped.startsWith("<")
        ) {
          acc.offerSummary(stripped);
        }
        break;
      }
    }
  }

  return acc.toResult();
}

/** Read and scan a transcript file; unreadable or unsupported files scan as empty. */
export function scanFile(filePath: string): ScanResult {
  const read = readTranscript(filePath);
  if (!read.ok) return emptyScanResult();
  return scanTranscript(read.transcript);
}
