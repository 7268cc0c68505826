/**
 * Logger - levelled logging to stderr
 *
 * Every level goes through console.error so stdout stays clean for the
 * MCP JSON-RPC stream.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export class Logger {
  private readonly level: LogLevel;

  constructor(private readonly context: string, level?: LogLevel) {
    const envLevel = process.env.LOG_LEVEL;
    this.level = level ?? (isLogLevel(envLevel) ? envLevel : "info");
  }

  /**
   * Create a logger for a sub-context, e.g. "runner" -> "runner:batch"
   */
  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, this.level);
  }

  debug(message: string, data?: unknown): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.write("error", message, data);
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;

    const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (data === undefined) {
      console.error(line);
    } else {
      console.error(`${line} ${JSON.stringify(data, errorReplacer)}`);
    }
  }
}

export const logger = new Logger("eda");
