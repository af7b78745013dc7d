import type { Command } from "commander";
import { printPreview } from "../../transcripts/preview.js";
import { resolveConfig, type CliIO } from "../context.js";

/** Register the preview command */
export function registerPreviewCommand(program: Command, io: CliIO): void {
  program
    .command("preview")
    .description("Print a short excerpt of a transcript")
    .argument("<transcript>", "Path to a .jsonl or .txt transcript")
    .argument("[limit]", "Maximum number of lines")
    .action((transcript: string, limit: string | undefined) => {
      const { config } = resolveConfig(io);
      const parsed = limit === undefined ? NaN : Number.parseInt(limit, 10);
      const effective = Number.isInteger(parsed) && parsed >= 0 ? parsed : config.previewLimit;
      printPreview(transcript, effective, io.stdout);
    });
}
