import type { Logger } from "../domain/ports.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

// stdout carries the dependency list, so everything goes to stderr
export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = "info") {}

  debug(msg: string, ...args: unknown[]): void {
    if (this.enabled("debug")) console.error(`[DEBUG] ${msg}`, ...args);
  }

  info(msg: string, ...args: unknown[]): void {
    if (this.enabled("info")) console.error(`[INFO] ${msg}`, ...args);
  }

  error(msg: string, ...args: unknown[]): void {
    if (this.enabled("error")) console.error(`[ERROR] ${msg}`, ...args);
  }

  warn(msg: string, ...args: unknown[]): void {
    if (this.enabled("warn")) console.error(`[WARN] ${msg}`, ...args);
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }
}
