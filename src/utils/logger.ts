/**
 * Structured logging utility
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: LogLevel[] = ["error", "warn", "info", "debug"];

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function formatMeta(meta: unknown): string {
  if (meta === undefined) return "";
  if (meta instanceof Error) return meta.message;
  return JSON.stringify(meta);
}

export class Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(config: LoggerConfig = { level: "info" }) {
    this.level = config.level;
    this.prefix = config.prefix || "linesample";
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) <= LEVELS.indexOf(this.level);
  }

  // Every level goes to stderr: stdout carries the sample and echoed input
  private write(label: string, message: string, meta?: unknown): void {
    const suffix = formatMeta(meta);
    process.stderr.write(
      `[${this.prefix}] ${label}: ${message}${suffix ? " " + suffix : ""}\n`,
    );
  }

  error(message: string, meta?: unknown): void {
    if (this.shouldLog("error")) this.write("ERROR", message, meta);
  }

  warn(message: string, meta?: unknown): void {
    if (this.shouldLog("warn")) this.write("WARN", message, meta);
  }

  info(message: string, meta?: unknown): void {
    if (this.shouldLog("info")) this.write("INFO", message, meta);
  }

  debug(message: string, meta?: unknown): void {
    if (this.shouldLog("debug")) this.write("DEBUG", message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

const envLevel = process.env.LOG_LEVEL;

// Default logger instance
export const logger = new Logger({
  level: isLogLevel(envLevel) ? envLevel : "info",
});

// Factory function for custom loggers
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
