/**
 * Structured logging utility
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
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
    this.prefix = config.prefix || "BankFind";
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  // Everything goes to stderr: stdout carries the JSON run report
  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (!this.shouldLog(level)) return;
    const suffix = formatMeta(meta);
    process.stderr.write(
      `[${this.prefix}] ${level.toUpperCase()}: ${message}${suffix ? ` ${suffix}` : ""}\n`,
    );
  }

  error(message: string, meta?: unknown): void {
    this.write("error", message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write("warn", message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write("info", message, meta);
  }

  debug(message: string, meta?: unknown): void {
    this.write("debug", message, meta);
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
