import type { Command } from "commander";
import type { AppConfig } from "../../config.js";
import { loadAttribution } from "../../attribution/attributionStore.js";
import { buildIndex, writeIndex } from "../../indexer/buildIndex.js";
import type { SessionRecord } from "../../schemas/transcript.js";
import type { Logger } from "../../utils/logger.js";
import { resolveConfig, type CliIO } from "../context.js";

interface IndexOptions {
  projectsDir?: string;
  cacheFile?: string;
  attributionDb?: string;
}

/**
 * Scan the projects directory, merge attribution and overwrite the cache.
 */
export function rebuildIndex(config: AppConfig, logger: Logger): SessionRecord[] {
  const attribution = loadAttribution(config.attributionDb, logger);
  const sessions = buildIndex(config.projectsDir, { attribution, logger });
  writeIndex(config.cacheFile, sessions);
  logger.info(`Indexed ${sessions.length} sessions.`, { cacheFile: config.cacheFile });
  return sessions;
}

/** Register the index command */
export function registerIndexCommand(program: Command, io: CliIO): void {
  program
    .command("index")
    .description("Scan Cursor transcripts and write the session index")
    .option("--projects-dir <dir>", "Cursor projects directory")
    .option("--cache-file <file>", "Where to write the index")
    .option("--attribution-db <file>", "Cursor AI tracking database")
    .action((opts: IndexOptions) => {
      const { config, logger } = resolveConfig(io, opts);
      rebuildIndex(config, logger);
    });
}
