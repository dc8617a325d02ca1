import { parseLogLevel } from "@gridswarm/schemas";
import type { LogLevel } from "@gridswarm/schemas";

export interface GridswarmConfig {
  rootUrl: string;
  apiKey: string;
  anthropicApiKey?: string;
  recordingsDir: string;
  concurrency: number;
  timeoutMs: number;
  /** Per-session in-memory history; unset keeps every record. */
  historyLimit?: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Invalid ${key}: "${raw}" (must be a positive integer)`);
  }
  return n;
}

/** Read settings from the environment; `.env` is loaded by the entry point. */
export function loadConfig(env: Env = process.env): GridswarmConfig {
  let rootUrl = env.ARENA_ROOT_URL?.trim();
  if (!rootUrl) {
    const scheme = env.SCHEME?.trim() || "http";
    const host = env.HOST?.trim() || "localhost";
    const port = positiveInt(env, "PORT", 8001);
    if (port > 65535) throw new Error(`Invalid PORT: "${port}" (must be 1–65535)`);
    rootUrl = `${scheme}://${host}:${port}`;
  }
  const config: GridswarmConfig = {
    rootUrl: rootUrl.replace(/\/+$/, ""),
    apiKey: env.ARENA_API_KEY?.trim() ?? "",
    recordingsDir: env.GRIDSWARM_RECORDINGS_DIR?.trim() || "recordings",
    concurrency: positiveInt(env, "GRIDSWARM_CONCURRENCY", 4),
    timeoutMs: positiveInt(env, "GRIDSWARM_TIMEOUT_MS", 10_000),
    logLevel: parseLogLevel(env.DEBUG, "info"),
  };
  if (env.GRIDSWARM_HISTORY_LIMIT?.trim()) config.historyLimit = positiveInt(env, "GRIDSWARM_HISTORY_LIMIT", 1);
  const anthropicKey = env.ANTHROPIC_API_KEY?.trim();
  if (anthropicKey) config.anthropicApiKey = anthropicKey;
  return config;
}
