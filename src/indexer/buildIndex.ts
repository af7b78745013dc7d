import {
  chmodSync,
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { basename, dirname, extname, join } from "node:path";
import { PathResolver } from "../resolver/pathResolver.js";
import { scanFile } from "../transcripts/scanner.js";
import { formatFromPath } from "../transcripts/source.js";
import { SessionIndex, type SessionRecord, type TranscriptFormat } from "../schemas/transcript.js";
import type { AttributionMap } from "../attribution/attributionStore.js";
import { ProjectsDirNotFoundError } from "../errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { transcriptsDir } from "../utils/paths.js";
import { formatLocalMinute, unixMsToSeconds } from "../utils/timestamp.js";

export interface BuildIndexOptions {
  attribution?: AttributionMap;
  resolver?: PathResolver;
  logger?: Logger;
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function buildSession(
  filePath: string,
  folder: string,
  workspace: string,
  format: TranscriptFormat,
  attribution: AttributionMap,
): SessionRecord {
  const id = basename(filePath, extname(filePath));
  const stat = statSync(filePath);
  const modified = unixMsToSeconds(stat.mtimeMs);
  const scan = scanFile(filePath);
  const attributed = attribution[id];

  return {
    id,
    workspace,
    folder,
    format,
    modified,
    date: formatLocalMinute(modified),
    size: stat.size,
    messages: scan.messages,
    toolCalls: scan.toolCalls,
    summary: scan.summary,
    transcriptPath: filePath,
    inputTokens: scan.inputTokens,
    outputTokens: scan.outputTokens,
    totalTokens: scan.inputTokens + scan.outputTokens,
    model: attributed?.model ?? "",
    codeEdits: attributed?.edits ?? 0,
  };
}

/**
 * Walk `<projectsDir>/<folder>/agent-transcripts/` and build one record per
 * transcript, newest first. A transcript that can't be read or parsed still
 * gets a record (with zero counts); it never stops the walk.
 */
export function buildIndex(
  projectsDir: string,
  options: BuildIndexOptions = {},
): SessionRecord[] {
  if (!isDirectory(projectsDir)) {
    throw new ProjectsDirNotFoundError(projectsDir);
  }

  const attribution = options.attribution ?? {};
  const resolver = options.resolver ?? new PathResolver();
  const logger = options.logger ?? silentLogger;
  const sessions: SessionRecord[] = [];

  for (const folder of readdirSync(projectsDir).sort()) {
    const dir = transcriptsDir(projectsDir, folder);
    if (!isDirectory(dir)) continue;

    const workspace = resolver.decode(folder);
    // one memo per project
    resolver.reset();
    logger.debug("Scanning project", { folder, workspace });

    for (const file of readdirSync(dir)) {
      const format = formatFromPath(file);
      if (!format) {
        logger.debug("Skipping non-transcript file", { folder, file });
        continue;
      }
      const filePath = join(dir, file);
      try {
        if (!statSync(filePath).isFile()) continue;
        sessions.push(buildSession(filePath, folder, workspace, format, attribution));
      } catch (err) {
        // vanished between readdir and stat
        logger.warn("Skipping transcript", {
          filePath,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  sessions.sort((a, b) => b.modified - a.modified);
  return sessions;
}

/**
 * Write the index as pretty JSON, readable by the owner only.
 */
export function writeIndex(cacheFile: string, sessions: SessionRecord[]): void {
  mkdirSync(dirname(cacheFile), { recursive: true, mode: 0o700 });
  writeFileSync(cacheFile, JSON.stringify(sessions, null, 2) + "\n", {
    encoding: "utf-8",
    mode: 0o600,
  });
  // mode only applies on creation
  chmodSync(cacheFile, 0o600);
}

/**
 * Read a previously written index, or `undefined` when there is no usable
 * cache (missing, unreadable, or not a session index).
 */
export function loadIndex(cacheFile: string): SessionRecord[] | undefined {
  if (!existsSync(cacheFile)) return undefined;
  try {
    const parsed = SessionIndex.safeParse(JSON.parse(readFileSync(cacheFile, "utf-8")));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

/** Like `loadIndex`, with no usable cache reading as empty. */
export function readIndex(cacheFile: string): SessionRecord[] {
  return loadIndex(cacheFile) ?? [];
}
