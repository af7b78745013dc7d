import { readFileSync } from "node:fs";
import { extname } from "node:path";
import { TranscriptFormat } from "../schemas/transcript.js";

export interface Transcript {
  format: TranscriptFormat;
  content: string;
}

export type ReadResult =
  | { ok: true; transcript: Transcript }
  | { ok: false; reason: "unsupported-format" | "unreadable"; error?: unknown };

/**
 * `foo.jsonl` -> "jsonl", `foo.txt` -> "txt", anything else -> undefined.
 */
export function formatFromPath(filePath: string): TranscriptFormat | undefined {
  const parsed = TranscriptFormat.safeParse(extname(filePath).slice(1));
  return parsed.success ? parsed.data : undefined;
}

/**
 * Read a transcript file. Invalid UTF-8 sequences come back as U+FFFD rather
 * than failing the read.
 */
export function readTranscript(filePath: string): ReadResult {
  const format = formatFromPath(filePath);
  if (!format) return { ok: false, reason: "unsupported-format" };

  try {
    const content = readFileSync(filePath, "utf-8");
    return { ok: true, transcript: { format, content } };
  } catch (error) {
    return { ok: false, reason: "unreadable", error };
  }
}
