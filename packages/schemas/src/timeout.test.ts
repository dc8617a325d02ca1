import { describe, it, expect } from "vitest";
import { sleep } from "./timeout.js";

describe("sleep", () => {
  it("waits at least the requested time", async () => {
    const start = Date.now();
    await sleep(30);
    expect(Date.now() - start).toBeGreaterThanOrEqual(25);
  });

  it("resolves immediately for non-positive durations", async () => {
    const start = Date.now();
    await sleep(0);
    expect(Date.now() - start).toBeLessThan(20);
  });

  it("resolves early when the signal aborts", async () => {
    const controller = new AbortController();
    const start = Date.now();
    const pending = sleep(5000, controller.signal);
    setTimeout(() => controller.abort(), 10);
    await pending;
    expect(Date.now() - start).toBeLessThan(1000);
  });

  it("does not wait when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const start = Date.now();
    await sleep(5000, controller.signal);
    expect(Date.now() - start).toBeLessThan(20);
  });
});
