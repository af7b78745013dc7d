export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogSink {
  write(chunk: string): unknown;
}

/**
 * JSON-lines logger. Everything goes to stderr so stdout stays usable for
 * preview output and `--json` listings.
 */
export class Logger {
  constructor(
    private readonly context: string,
    private readonly minLevel: LogLevel = "info",
    private readonly sink: LogSink = process.stderr,
  ) {}

  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, this.minLevel, this.sink);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...data,
    };
    this.sink.write(JSON.stringify(entry) + "\n");
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log("debug", msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log("info", msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log("warn", msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log("error", msg, data); }
}

/** A logger that drops everything; the default where callers pass none. */
export const silentLogger = new Logger("silent", "error", { write: () => true });
