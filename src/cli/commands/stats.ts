import type { Command } from "commander";
import { readIndex } from "../../indexer/buildIndex.js";
import { computeStats } from "../../sessions/stats.js";
import { formatStats } from "../formatters/sessionFormatter.js";
import { resolveConfig, type CliIO } from "../context.js";

interface StatsOptions {
  cacheFile?: string;
}

/** Register the stats command */
export function registerStatsCommand(program: Command, io: CliIO): void {
  program
    .command("stats")
    .description("Totals, sessions per workspace and the largest sessions")
    .option("--cache-file <file>", "Index file to read")
    .action((opts: StatsOptions) => {
      const { config } = resolveConfig(io, { cacheFile: opts.cacheFile });
      const sessions = readIndex(config.cacheFile);
      if (sessions.length === 0) {
        io.stdout.write("No sessions indexed. Run `cursor-recall index` first.\n");
        return;
      }
      for (const line of formatStats(computeStats(sessions))) {
        io.stdout.write(line + "\n");
      }
    });
}
