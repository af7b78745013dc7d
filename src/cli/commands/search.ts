import type { Command } from "commander";
import { readIndex } from "../../indexer/buildIndex.js";
import { filterSessions } from "../../sessions/search.js";
import { formatSessionLine } from "../formatters/sessionFormatter.js";
import { resolveConfig, type CliIO } from "../context.js";

interface SearchOptions {
  cacheFile?: string;
}

/** Register the search command */
export function registerSearchCommand(program: Command, io: CliIO): void {
  program
    .command("search")
    .description("Find sessions by summary, workspace, model or id (format:, model: filters)")
    .argument("<query...>", "Search terms")
    .option("--cache-file <file>", "Index file to read")
    .action((terms: string[], opts: SearchOptions) => {
      const { config } = resolveConfig(io, { cacheFile: opts.cacheFile });
      const query = terms.join(" ");
      const matches = filterSessions(readIndex(config.cacheFile), query);

      if (matches.length === 0) {
        io.stdout.write(`No sessions match "${query}"\n`);
        return;
      }
      io.stdout.write(`${matches.length} sessions matching "${query}"\n`);
      for (const session of matches) {
        io.stdout.write(formatSessionLine(session) + "\n");
      }
    });
}
