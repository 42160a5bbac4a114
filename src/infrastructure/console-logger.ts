import type { Logger } from "../domain/ports.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Writes every level to stderr; stdout carries command output and the MCP
 * stdio transport.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = "info") {}

  info(msg: string, ...args: unknown[]): void {
    if (this.enabled("info")) console.error(`[INFO] ${msg}`, ...args);
  }

  debug(msg: string, ...args: unknown[]): void {
    if (this.enabled("debug")) console.error(`[DEBUG] ${msg}`, ...args);
  }

  error(msg: string, ...args: unknown[]): void {
    if (this.enabled("error")) console.error(`[ERROR] ${msg}`, ...args);
  }

  warn(msg: string, ...args: unknown[]): void {
    if (this.enabled("warn")) console.error(`[WARN] ${msg}`, ...args);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}
