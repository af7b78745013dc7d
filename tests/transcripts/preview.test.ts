import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { previewLines, printPreview, TRUNCATED_LINE } from "../../src/transcripts/preview.js";
import type { Transcript } from "../../src/transcripts/source.js";

function conversation(count: number): Transcript {
  const lines = [];
  for (let i = 0; i < count; i++) {
    const role = i % 2 === 0 ? "user" : "assistant";
    lines.push(JSON.stringify({ role, message: { content: [{ type: "text", text: `message ${i}` }] } }));
  }
  return { format: "jsonl", content: lines.join("\n") + "\n" };
}

function collector() {
  const chunks: string[] = [];
  return { chunks, write: (chunk: string) => chunks.push(chunk) };
}

describe("previewLines", () => {
  it("stops at the limit and marks the truncation", () => {
    expect(previewLines(conversation(5), 3)).toEqual([
      "  ▶ [user] message 0",
      "  ◀ [assistant] message 1",
      "  ▶ [user] message 2",
      TRUNCATED_LINE,
    ]);
  });

  it("adds no marker when everything fits", () => {
    expect(previewLines(conversation(3), 3)).toHaveLength(3);
  });

  it("shows tool invocations and one text line per record", () => {
    const transcript: Transcript = {
      format: "jsonl",
      content: JSON.stringify({
        role: "assistant",
        message: {
          content: [
            { type: "tool_use", name: "read_file" },
            { type: "text", text: "Reading" },
            { type: "text", text: "more text" },
          ],
        },
      }),
    };
    expect(previewLines(transcript)).toEqual(["  \u{1f527} read_file", "  ◀ [assistant] Reading"]);
  });

  it("labels tool calls without a usable name", () => {
    const transcript: Transcript = {
      format: "jsonl",
      content: JSON.stringify({
        role: "assistant",
        message: { content: [{ type: "tool_use", name: null }, { type: "tool_use", name: 7 }] },
      }),
    };
    expect(previewLines(transcript)).toEqual(["  \u{1f527} tool_use", "  \u{1f527} tool_use"]);
  });

  it("labels each line with the role actually present", () => {
    const transcript: Transcript = {
      format: "jsonl",
      content: [
        { role: "system", message: { content: [{ type: "text", text: "be brief" }] } },
        { message: { content: [{ type: "text", text: "no role here" }] } },
      ]
        .map((record) => JSON.stringify(record))
        .join("\n"),
    };
    expect(previewLines(transcript)).toEqual(["  ◀ [system] be brief", "  no role here"]);
  });

  it("leaves txt lines before the first role marker untagged", () => {
    const transcript: Transcript = { format: "txt", content: "preamble\nuser:\nhello\n" };
    expect(previewLines(transcript)).toEqual(["  preamble", "  ▶ [user] hello"]);
  });

  it("skips malformed lines", () => {
    const transcript: Transcript = {
      format: "jsonl",
      content: `not json\n${JSON.stringify({ role: "user", message: { content: [{ type: "text", text: "<b>hi</b>" }] } })}\n`,
    };
    expect(previewLines(transcript)).toEqual(["  ▶ [user] hi"]);
  });

  it("renders txt transcripts by role", () => {
    const transcript: Transcript = { format: "txt", content: "user:\nhello\nassistant:\nworld\n" };
    expect(previewLines(transcript)).toEqual(["  ▶ [user] hello", "  ◀ [assistant] world"]);
  });

  it("skips markers, query tags, tool results and blank lines in txt", () => {
    const transcript: Transcript = {
      format: "txt",
      content:
        "user:\n<user_query>\nfix it\n</user_query>\nassistant:\n[Tool call] read_file x\n[Tool result] read_file\n\ndone\n",
    };
    expect(previewLines(transcript)).toEqual([
      "  ▶ [user] fix it",
      "  \u{1f527} [Tool call] read_file x",
      "  ◀ [assistant] done",
    ]);
  });

  it("cuts long lines to 150 characters", () => {
    const transcript: Transcript = { format: "txt", content: `user:\n${"x".repeat(300)}\n` };
    expect(previewLines(transcript)).toEqual([`  ▶ [user] ${"x".repeat(150)}`]);
  });
});

describe("printPreview", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cursor-recall-preview-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes one line per unit", () => {
    const path = join(dir, "s.jsonl");
    writeFileSync(path, conversation(5).content);
    const out = collector();
    printPreview(path, 3, out);
    expect(out.chunks.join("")).toBe(
      "  ▶ [user] message 0\n  ◀ [assistant] message 1\n  ▶ [user] message 2\n  ... (truncated)\n",
    );
  });

  it("prints nothing for a missing file", () => {
    const out = collector();
    printPreview(join(dir, "missing.jsonl"), 20, out);
    expect(out.chunks).toEqual([]);
  });

  it("prints nothing for an unsupported file", () => {
    const path = join(dir, "notes.md");
    writeFileSync(path, "user:\nhello\n");
    const out = collector();
    printPreview(path, 20, out);
    expect(out.chunks).toEqual([]);
  });
});
