#!/usr/bin/env node

import { createRequire } from "node:module";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { Command, CommanderError } from "commander";
import { z } from "zod";
import { registerIndexCommand } from "./commands/index.js";
import { registerPreviewCommand } from "./commands/preview.js";
import { registerListCommand } from "./commands/list.js";
import { registerBrowseCommand } from "./commands/browse.js";
import { registerShowCommand } from "./commands/show.js";
import { registerSearchCommand } from "./commands/search.js";
import { registerStatsCommand } from "./commands/stats.js";
import { processIO, type CliIO } from "./context.js";

const require = createRequire(import.meta.url);
const { version } = z.object({ version: z.string() }).parse(require("../../package.json"));

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name("cursor-recall")
    .description("Index, search and preview Cursor agent sessions")
    .version(version)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    });

  registerIndexCommand(program, io);
  registerPreviewCommand(program, io);
  registerListCommand(program, io);
  registerShowCommand(program, io);
  registerSearchCommand(program, io);
  registerStatsCommand(program, io);
  registerBrowseCommand(program, io);

  return program;
}

/**
 * Run the CLI and return the exit code instead of exiting.
 */
export async function run(argv: string[], io: CliIO = processIO): Promise<number> {
  try {
    await createProgram(io).parseAsync(argv, { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.code === "commander.helpDisplayed" || err.code === "commander.version"
        ? 0
        : err.exitCode;
    }
    io.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  process.exitCode = await run(process.argv.slice(2));
}
