import { loadConfig, type AppConfig } from "../config.js";
import { Logger, type LogSink } from "../utils/logger.js";

export interface CliIO {
  stdout: LogSink;
  stderr: LogSink;
  env: Record<string, string | undefined>;
}

export const processIO: CliIO = {
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
};

export function resolveConfig(io: CliIO, overrides: Partial<AppConfig> = {}) {
  const config = loadConfig(io.env, overrides);
  const logger = new Logger("cursor-recall", config.logLevel, io.stderr);
  return { config, logger };
}
