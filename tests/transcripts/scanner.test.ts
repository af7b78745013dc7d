import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { emptyScanResult, scanFile, scanTranscript } from "../../src/transcripts/scanner.js";
import type { Transcript } from "../../src/transcripts/source.js";

function jsonl(...records: unknown[]): Transcript {
  return {
    format: "jsonl",
    content: records.map((r) => (typeof r === "string" ? r : JSON.stringify(r))).join("\n") + "\n",
  };
}

function txt(content: string): Transcript {
  return { format: "txt", content };
}

function textRecord(role: string, ...texts: string[]) {
  return {
    role,
    message: { content: texts.map((text) => ({ type: "text", text })) },
  };
}

describe("scanTranscript (jsonl)", () => {
  it("summarises a basic conversation", () => {
    const result = scanTranscript(
      jsonl(textRecord("user", "hello world"), textRecord("assistant", "hi there, how can I help?")),
    );
    expect(result).toEqual({
      summary: "hello world",
      messages: 2,
      toolCalls: 0,
      inputTokens: 2,
      outputTokens: 6,
    });
  });

  it("counts every tool_use part", () => {
    const result = scanTranscript(
      jsonl(
        textRecord("user", "fix the bug"),
        {
          role: "assistant",
          message: {
            content: [
              { type: "tool_use", name: "read_file" },
              { type: "text", text: "Let me read the file" },
            ],
          },
        },
        {
          role: "assistant",
          message: {
            content: [
              { type: "tool_use", name: "write_file" },
              { type: "tool_use", name: "run_command" },
            ],
          },
        },
      ),
    );
    expect(result.messages).toBe(3);
    expect(result.toolCalls).toBe(3);
    expect(result.outputTokens).toBe(5);
  });

  it("counts tool_use parts whatever their name", () => {
    const result = scanTranscript(
      jsonl(
        { role: "assistant", message: { content: [{ type: "tool_use", name: null }] } },
        { role: "assistant", message: { content: [{ type: "tool_use", name: 3 }] } },
        { role: "assistant", message: { content: [{ type: "tool_use" }] } },
      ),
    );
    expect(result.messages).toBe(3);
    expect(result.toolCalls).toBe(3);
  });

  it("strips tags from the summary but counts the raw text", () => {
    const result = scanTranscript(
      jsonl(textRecord("user", "<user_query>build a REST API</user_query>")),
    );
    expect(result.summary).toBe("build a REST API");
    expect(result.inputTokens).toBe(10);
  });

  it("truncates the summary to 200 characters", () => {
    const result = scanTranscript(jsonl(textRecord("user", "a".repeat(300))));
    expect(result.summary).toBe("a".repeat(200));
  });

  it("counts malformed lines as messages without content", () => {
    const result = scanTranscript(
      jsonl(textRecord("user", "valid"), "this is not json", textRecord("assistant", "reply")),
    );
    expect(result.messages).toBe(3);
    expect(result.summary).toBe("valid");
    expect(result.outputTokens).toBe(1);
  });

  it("counts records with missing or odd content", () => {
    const result = scanTranscript(
      jsonl({ role: "user", message: {} }, { role: "assistant" }, "42", "null", { role: 7 }),
    );
    expect(result.messages).toBe(5);
    expect(result.summary).toBe("");
  });

  it("ignores blank lines when counting messages", () => {
    const result = scanTranscript({ format: "jsonl", content: "oops\n\n{}\n   \n" });
    expect(result.messages).toBe(2);
  });

  it("skips bad parts without dropping the rest of the record", () => {
    const result = scanTranscript(
      jsonl({
        role: "user",
        message: { content: [null, { type: "text" }, { type: "text", text: "ok then" }] },
      }),
    );
    expect(result.messages).toBe(1);
    expect(result.summary).toBe("ok then");
    expect(result.inputTokens).toBe(1);
  });

  it("takes the first user text part as the summary", () => {
    const result = scanTranscript(jsonl(textRecord("user", "first part", " second part")));
    expect(result.summary).toBe("first part");
    expect(result.inputTokens).toBe(5);
  });

  it("passes over blank text when choosing the summary", () => {
    const result = scanTranscript(jsonl(textRecord("user", "   ", "<br/>", "real question")));
    expect(result.summary).toBe("real question");
  });

  it("never takes the summary from assistant text", () => {
    const result = scanTranscript(
      jsonl(textRecord("assistant", "I am ready"), textRecord("user", "now go")),
    );
    expect(result.summary).toBe("now go");
  });

  it("splits input and output tokens with truncating division", () => {
    const result = scanTranscript(
      jsonl(textRecord("user", "a".repeat(83)), textRecord("assistant", "b".repeat(203))),
    );
    expect(result.inputTokens).toBe(20);
    expect(result.outputTokens).toBe(50);
  });
});

describe("scanTranscript (txt)", () => {
  it("uses the user_query tag as the summary", () => {
    const result = scanTranscript(
      txt(
        "user:\n<user_query>\nhelp me debug this\n</user_query>\nassistant:\nSure, let me look at the code.\n",
      ),
    );
    expect(result).toEqual({
      summary: "help me debug this",
      messages: 2,
      toolCalls: 0,
      inputTokens: 10,
      outputTokens: 7,
    });
  });

  it("counts tool calls but not tool results", () => {
    const result = scanTranscript(
      txt(
        "user:\nfix the tests\nassistant:\n[Tool call] read_file a.py\n[Tool result] read_file\ncontent here\n[Tool call] write_file a.py\n",
      ),
    );
    expect(result.toolCalls).toBe(2);
    expect(result.messages).toBe(2);
    expect(result.summary).toBe("fix the tests");
    expect(result.inputTokens).toBe(3);
    expect(result.outputTokens).toBe(8);
  });

  it("counts one call for a call/result pair", () => {
    const result = scanTranscript(
      txt("assistant:\n[Tool call] grep foo\n[Tool result] grep\n"),
    );
    expect(result.toolCalls).toBe(1);
  });

  it("falls back to the first plain user line", () => {
    const result = scanTranscript(txt("user:\n<image>\ndeploy to production\nassistant:\nStarting deployment.\n"));
    expect(result.summary).toBe("deploy to production");
  });

  it("lets the tag win over earlier user lines", () => {
    const result = scanTranscript(
      txt("user:\nfirst line\n<user_query>the real ask</user_query>\n"),
    );
    expect(result.summary).toBe("the real ask");
  });

  it("collapses whitespace inside the tag", () => {
    const result = scanTranscript(txt("user:\n<user_query>\n  one\n  two  \n</user_query>\n"));
    expect(result.summary).toBe("one two");
  });

  it("ignores text before the first role marker", () => {
    const result = scanTranscript(txt("preamble text here\nuser:\nhello there\n"));
    expect(result.inputTokens).toBe(2);
    expect(result.outputTokens).toBe(0);
    expect(result.messages).toBe(1);
  });

  it("handles CRLF line endings", () => {
    const result = scanTranscript(txt("user:\r\nhello\r\n"));
    expect(result.messages).toBe(1);
    expect(result.summary).toBe("hello");
    expect(result.inputTokens).toBe(1);
  });

  it("returns zeros for empty content", () => {
    expect(scanTranscript(txt(""))).toEqual(emptyScanResult());
  });
});

describe("scanFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cursor-recall-scan-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("dispatches on the file extension", () => {
    const path = join(dir, "s.jsonl");
    writeFileSync(path, JSON.stringify(textRecord("user", "from disk")) + "\n");
    expect(scanFile(path).summary).toBe("from disk");
  });

  it("returns the empty result for unknown extensions", () => {
    const path = join(dir, "s.csv");
    writeFileSync(path, "some,csv,data\n");
    expect(scanFile(path)).toEqual(emptyScanResult());
  });

  it("returns the empty result for missing files", () => {
    expect(scanFile(join(dir, "missing.jsonl"))).toEqual(emptyScanResult());
  });

  it("replaces undecodable bytes instead of failing", () => {
    const path = join(dir, "s.jsonl");
    writeFileSync(
      path,
      Buffer.concat([
        Buffer.from('{"role":"user","message":{"content":[{"type":"text","text":"caf'),
        Buffer.from([0xff]),
        Buffer.from('"}]}}\n'),
      ]),
    );
    const result = scanFile(path);
    expect(result.messages).toBe(1);
    expect(result.summary).toBe("caf\uFFFD");
  });
});
