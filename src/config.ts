import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_PREVIEW_LIMIT } from "./transcripts/preview.js";
import {
  attributionDbPath,
  cursorProjectsDir,
  sessionCachePath,
} from "./utils/paths.js";

export const AppConfig = z.object({
  projectsDir: z.string().min(1),
  cacheFile: z.string().min(1),
  attributionDb: z.string().min(1),
  previewLimit: z.coerce.number().int().positive(),
  logLevel: z.enum(["debug", "info", "warn", "error"]),
});

export type AppConfig = z.infer<typeof AppConfig>;

const ENV_KEYS = {
  projectsDir: "CURSOR_RECALL_PROJECTS_DIR",
  cacheFile: "CURSOR_RECALL_CACHE_FILE",
  attributionDb: "CURSOR_RECALL_ATTRIBUTION_DB",
  previewLimit: "CURSOR_RECALL_PREVIEW_LIMIT",
  logLevel: "CURSOR_RECALL_LOG_LEVEL",
} as const satisfies Record<keyof AppConfig, string>;

type Env = Record<string, string | undefined>;

export function defaultConfig(): AppConfig {
  return {
    projectsDir: cursorProjectsDir(),
    cacheFile: sessionCachePath(),
    attributionDb: attributionDbPath(),
    previewLimit: DEFAULT_PREVIEW_LIMIT,
    logLevel: "info",
  };
}

/**
 * Defaults, overridden by `CURSOR_RECALL_*` environment variables, then by
 * `overrides` (CLI flags). Empty variables count as unset.
 */
export function loadConfig(
  env: Env = process.env,
  overrides: Partial<AppConfig> = {},
): AppConfig {
  const merged: Record<string, unknown> = { ...defaultConfig() };
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value) merged[key] = value;
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const parsed = AppConfig.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}
