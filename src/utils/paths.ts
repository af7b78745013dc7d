import { join } from "node:path";
import { homedir } from "node:os";

export const TRANSCRIPTS_DIR_NAME = "agent-transcripts";

export function cursorHome(): string {
  return join(homedir(), ".cursor");
}

export function cursorProjectsDir(): string {
  return join(cursorHome(), "projects");
}

export function attributionDbPath(): string {
  return join(cursorHome(), "ai-tracking", "ai-code-tracking.db");
}

export function cacheDir(): string {
  return process.env.XDG_CACHE_HOME
    ? join(process.env.XDG_CACHE_HOME, "cursor-recall")
    : join(homedir(), ".cache", "cursor-recall");
}

export function sessionCachePath(): string {
  return join(cacheDir(), "sessions.json");
}

/**
 * Directory holding the transcripts of one encoded project folder.
 */
export function transcriptsDir(projectsDir: string, folder: string): string {
  return join(projectsDir, folder, TRANSCRIPTS_DIR_NAME);
}

/**
 * Shorten a path under the home directory to `~/...` for display.
 */
export function tildify(path: string): string {
  const home = homedir();
  if (path === home) return "~";
  return path.startsWith(home + "/") ? "~" + path.slice(home.length) : path;
}
