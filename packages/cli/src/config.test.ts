import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      rootUrl: "http://localhost:8001",
      apiKey: "",
      recordingsDir: "recordings",
      concurrency: 4,
      timeoutMs: 10_000,
      logLevel: "info",
    });
  });

  it("builds the root URL from its parts", () => {
    const config = loadConfig({ SCHEME: "https", HOST: "arena.test", PORT: "443" });
    expect(config.rootUrl).toBe("https://arena.test:443");
  });

  it("prefers an explicit root URL", () => {
    const config = loadConfig({ ARENA_ROOT_URL: "https://arena.test/", HOST: "ignored" });
    expect(config.rootUrl).toBe("https://arena.test");
  });

  it("reads keys, limits and the log level", () => {
    const config = loadConfig({
      ARENA_API_KEY: "test-key",
      ANTHROPIC_API_KEY: "test-secret",
      GRIDSWARM_RECORDINGS_DIR: "out",
      GRIDSWARM_CONCURRENCY: "8",
      GRIDSWARM_TIMEOUT_MS: "2500",
      GRIDSWARM_HISTORY_LIMIT: "20",
      DEBUG: "true",
    });
    expect(config).toMatchObject({
      apiKey: "test-key",
      anthropicApiKey: "test-secret",
      recordingsDir: "out",
      concurrency: 8,
      timeoutMs: 2500,
      historyLimit: 20,
      logLevel: "debug",
    });
  });

  it("rejects invalid numbers", () => {
    expect(() => loadConfig({ GRIDSWARM_CONCURRENCY: "0" })).toThrow(
      'Invalid GRIDSWARM_CONCURRENCY: "0" (must be a positive integer)',
    );
    expect(() => loadConfig({ GRIDSWARM_TIMEOUT_MS: "soon" })).toThrow('Invalid GRIDSWARM_TIMEOUT_MS: "soon"');
    expect(() => loadConfig({ GRIDSWARM_HISTORY_LIMIT: "-3" })).toThrow('Invalid GRIDSWARM_HISTORY_LIMIT: "-3"');
    expect(() => loadConfig({ PORT: "70000" })).toThrow('Invalid PORT: "70000"');
  });
});
