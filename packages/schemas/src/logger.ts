import type { Logger, LogLevel } from "./types.js";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const v = value?.trim().toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") return v;
  if (v === "true" || v === "1") return "debug";
  return fallback;
}

export class ConsoleLogger implements Logger {
  private prefix: string;
  private minRank: number;

  constructor(scope: string, level: LogLevel = "info") {
    // biome-ignore lint/suspicious/noControlCharactersInRegex: strips control chars from the scope
    const safeScope = scope.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 128);
    this.prefix = `[${safeScope}]`;
    this.minRank = LEVEL_RANK[level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.minRank > LEVEL_RANK.debug) return;
    console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.minRank > LEVEL_RANK.info) return;
    console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.minRank > LEVEL_RANK.warn) return;
    console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
