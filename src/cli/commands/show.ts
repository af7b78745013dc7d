import type { Command } from "commander";
import { readIndex } from "../../indexer/buildIndex.js";
import { findSession } from "../../sessions/search.js";
import { previewLines } from "../../transcripts/preview.js";
import { readTranscript } from "../../transcripts/source.js";
import { formatSessionDetail } from "../formatters/sessionFormatter.js";
import { resolveConfig, type CliIO } from "../context.js";

interface ShowOptions {
  cacheFile?: string;
}

/** Register the show command */
export function registerShowCommand(program: Command, io: CliIO): void {
  program
    .command("show")
    .description("Show one session's details and a conversation preview")
    .argument("<id-prefix>", "Session id or a prefix of it")
    .option("--cache-file <file>", "Index file to read")
    .action((idPrefix: string, opts: ShowOptions) => {
      const { config, logger } = resolveConfig(io, { cacheFile: opts.cacheFile });
      const session = findSession(readIndex(config.cacheFile), idPrefix);
      if (!session) {
        io.stdout.write(`Session not found: ${idPrefix}\n`);
        return;
      }

      const read = readTranscript(session.transcriptPath);
      if (!read.ok) {
        logger.warn("Could not read transcript", {
          transcriptPath: session.transcriptPath,
          reason: read.reason,
        });
      }
      const preview = read.ok ? previewLines(read.transcript, config.previewLimit) : [];
      for (const line of formatSessionDetail(session, preview)) {
        io.stdout.write(line + "\n");
      }
    });
}
