import { z } from "zod";

export const TextPart = z.object({
  type: z.literal("text"),
  text: z.string(),
});

export const ToolUsePart = z.object({
  type: z.literal("tool_use"),
  // the tag alone makes a tool call; `name` is only a label
  name: z.unknown(),
});

export const ContentPart = z.discriminatedUnion("type", [TextPart, ToolUsePart]);

// Only the outer shape is checked here; parts are validated one at a time so
// a single bad part doesn't hide the rest of the record.
export const TranscriptRecord = z.object({
  role: z.string().optional(),
  message: z
    .object({
      content: z.array(z.unknown()).optional(),
    })
    .optional(),
});

export const ScanResult = z.object({
  summary: z.string().max(200),
  messages: z.number().int().nonnegative(),
  toolCalls: z.number().int().nonnegative(),
  inputTokens: z.number().int().nonnegative(),
  outputTokens: z.number().int().nonnegative(),
});

export const TranscriptFormat = z.enum(["jsonl", "txt"]);

export const Attribution = z.object({
  model: z.string(),
  edits: z.number().int().nonnegative(),
});

export const SessionRecord = ScanResult.extend({
  id: z.string(),
  workspace: z.string(),
  folder: z.string(),
  format: TranscriptFormat,
  modified: z.number().int(),
  date: z.string(),
  size: z.number().int().nonnegative(),
  transcriptPath: z.string(),
  totalTokens: z.number().int().nonnegative(),
  model: z.string(),
  codeEdits: z.number().int().nonnegative(),
});

export const SessionIndex = z.array(SessionRecord);

export type TextPart = z.infer<typeof TextPart>;
export type ToolUsePart = z.infer<typeof ToolUsePart>;
export type ContentPart = z.infer<typeof ContentPart>;
export type TranscriptRecord = z.infer<typeof TranscriptRecord>;
export type ScanResult = z.infer<typeof ScanResult>;
export type TranscriptFormat = z.infer<typeof TranscriptFormat>;
export type Attribution = z.infer<typeof Attribution>;
export type SessionRecord = z.infer<typeof SessionRecord>;
