import { InvalidArgumentError, type Command } from "commander";
import { readIndex } from "../../indexer/buildIndex.js";
import { filterByWorkspace } from "../../sessions/search.js";
import { formatSessionLine } from "../formatters/sessionFormatter.js";
import { resolveConfig, type CliIO } from "../context.js";

interface ListOptions {
  cacheFile?: string;
  json?: boolean;
  limit?: number;
  workspace?: string;
}

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return Number.parseInt(value, 10);
}

/** Register the list command */
export function registerListCommand(program: Command, io: CliIO): void {
  program
    .command("list")
    .description("List indexed sessions, newest first")
    .option("--cache-file <file>", "Index file to read")
    .option("-n, --limit <count>", "Show at most this many sessions", parseCount)
    .option("-w, --workspace <text>", "Only sessions whose workspace path contains text")
    .option("--json", "Print the sessions as JSON")
    .allowExcessArguments(false)
    .action((opts: ListOptions) => {
      const { config } = resolveConfig(io, { cacheFile: opts.cacheFile });
      let sessions = readIndex(config.cacheFile);
      if (opts.workspace !== undefined) {
        sessions = filterByWorkspace(sessions, opts.workspace);
      }
      if (opts.limit !== undefined) {
        sessions = sessions.slice(0, opts.limit);
      }

      if (opts.json) {
        io.stdout.write(JSON.stringify(sessions, null, 2) + "\n");
        return;
      }
      io.stdout.write(`${sessions.length} sessions\n`);
      for (const session of sessions) {
        io.stdout.write(formatSessionLine(session) + "\n");
      }
    });
}
