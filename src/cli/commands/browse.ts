import type { Command } from "commander";
import type { AppConfig } from "../../config.js";
import { loadIndex } from "../../indexer/buildIndex.js";
import type { SessionRecord } from "../../schemas/transcript.js";
import { launchTui } from "../../tui/index.js";
import type { Logger } from "../../utils/logger.js";
import { resolveConfig, type CliIO } from "../context.js";
import { rebuildIndex } from "./index.js";

interface BrowseOptions {
  cacheFile?: string;
  reindex?: boolean;
}

/**
 * The cached index, or a fresh one when there is no usable cache or a
 * rebuild was asked for. An index with no sessions is still a cache.
 */
export function sessionsForBrowse(
  config: AppConfig,
  logger: Logger,
  reindex = false,
): SessionRecord[] {
  const cached = reindex ? undefined : loadIndex(config.cacheFile);
  if (cached) return cached;
  logger.info("Building session index", { projectsDir: config.projectsDir });
  return rebuildIndex(config, logger);
}

/** Register the browse command */
export function registerBrowseCommand(program: Command, io: CliIO): void {
  program
    .command("browse")
    .description("Browse indexed sessions in the terminal")
    .option("--cache-file <file>", "Index file to read")
    .option("--reindex", "Rebuild the index before browsing")
    .action(async (opts: BrowseOptions) => {
      const { config, logger } = resolveConfig(io, { cacheFile: opts.cacheFile });
      const sessions = sessionsForBrowse(config, logger, opts.reindex);
      await launchTui(sessions, config.previewLimit);
    });
}
