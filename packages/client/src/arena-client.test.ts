import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  AuthError,
  CapacityError,
  TransientNetworkError,
  ValidationError,
  complex,
  reset,
  simple,
} from "@gridswarm/schemas";
import { ArenaClient, parseScorecard } from "./arena-client.js";

const mockFetch = vi.fn();

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function frameReply(overrides: Record<string, unknown> = {}) {
  return {
    game_id: "locksmith",
    guid: "inst-1",
    frame: [[[0, 1], [2, 3]]],
    state: "NOT_FINISHED",
    score: 0,
    ...overrides,
  };
}

function lastRequest(): { url: string; init: RequestInit; body: Record<string, unknown> | undefined } {
  const call = mockFetch.mock.calls[mockFetch.mock.calls.length - 1];
  if (!call) throw new Error("fetch was not called");
  const [url, init] = call as [string, RequestInit];
  const body = typeof init.body === "string" ? (JSON.parse(init.body) as Record<string, unknown>) : undefined;
  return { url, init, body };
}

describe("ArenaClient", () => {
  let client: ArenaClient;
  const sleep = vi.fn(async (_ms: number) => {});

  beforeEach(() => {
    mockFetch.mockReset();
    sleep.mockClear();
    vi.stubGlobal("fetch", mockFetch);
    client = new ArenaClient({ rootUrl: "http://arena.test/", apiKey: "test-key", sleep, maxAttempts: 3 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("request headers", () => {
    it("sends the API key on every request", async () => {
      mockFetch.mockResolvedValueOnce(json([{ game_id: "locksmith", title: "Locksmith" }]));
      await client.listGames();
      const { url, init } = lastRequest();
      expect(url).toBe("http://arena.test/api/games");
      expect(init.method).toBe("GET");
      expect(init.headers).toEqual({ "X-API-Key": "test-key", Accept: "application/json" });
    });
  });

  describe("listGames", () => {
    it("returns game infos, defaulting the title to the id", async () => {
      mockFetch.mockResolvedValueOnce(json([{ game_id: "a", title: "Alpha" }, { game_id: "b" }]));
      await expect(client.listGames()).resolves.toEqual([
        { game_id: "a", title: "Alpha" },
        { game_id: "b", title: "b" },
      ]);
    });

    it("rejects a malformed list", async () => {
      mockFetch.mockResolvedValueOnce(json({ games: [] }));
      await expect(client.listGames()).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("scorecards", () => {
    it("opens a card with source url and tags", async () => {
      mockFetch.mockResolvedValueOnce(json({ card_id: "card-9" }));
      await expect(client.openScorecard("https://example.test/run", ["nightly"])).resolves.toBe("card-9");
      const { url, body } = lastRequest();
      expect(url).toBe("http://arena.test/api/scorecard/open");
      expect(body).toEqual({ source_url: "https://example.test/run", tags: ["nightly"] });
    });

    it("closes a card and normalizes the summary", async () => {
      mockFetch.mockResolvedValueOnce(json({
        card_id: "card-9",
        won: 1,
        played: 2,
        total_actions: 12,
        score: 3,
        games: {
          locksmith: { total_plays: 2, total_actions: 12, scores: [3, 0], states: ["WIN", "GAME_OVER"], actions: [5, 7] },
        },
      }));
      const summary = await client.closeScorecard("card-9");
      expect(lastRequest().body).toEqual({ card_id: "card-9" });
      expect(summary.games.locksmith).toEqual({
        game_id: "locksmith",
        total_plays: 2,
        total_actions: 12,
        scores: [3, 0],
        states: ["WIN", "GAME_OVER"],
        actions: [5, 7],
        outcomes: [],
        failures: 0,
      });
    });

    it("reads a single game's card", async () => {
      mockFetch.mockResolvedValueOnce(json({ card_id: "c 1", won: 0, played: 0, total_actions: 0, score: 0 }));
      const summary = await client.getScorecard("c 1", "locksmith");
      expect(lastRequest().url).toBe("http://arena.test/api/scorecard/c%201/locksmith");
      expect(summary.games).toEqual({});
    });

    it("surfaces an unknown card as a validation error", async () => {
      mockFetch.mockResolvedValueOnce(json({ error: "card not found" }, 404));
      await expect(client.getScorecard("missing")).rejects.toThrow("card not found");
    });
  });

  describe("dispatch", () => {
    it("RESET carries card and omits guid for a fresh instance", async () => {
      mockFetch.mockResolvedValueOnce(json(frameReply()));
      const record = await client.dispatch(reset(), "locksmith", undefined, "card-1");
      const { url, body } = lastRequest();
      expect(url).toBe("http://arena.test/api/cmd/RESET");
      expect(body).toEqual({ game_id: "locksmith", card_id: "card-1" });
      expect(record).toEqual({
        game_id: "locksmith",
        instance_id: "inst-1",
        frames: [[[0, 1], [2, 3]]],
        state: "NOT_FINISHED",
        score: 0,
        action: { id: "RESET" },
      });
    });

    it("simple actions carry the guid but not the card", async () => {
      mockFetch.mockResolvedValueOnce(json(frameReply()));
      await client.dispatch(simple(1), "locksmith", "inst-1", "card-1");
      expect(lastRequest().body).toEqual({ game_id: "locksmith", guid: "inst-1" });
    });

    it("ACTION6 carries coordinates and reasoning verbatim", async () => {
      mockFetch.mockResolvedValueOnce(json(frameReply({ frame: [[[1]], [[2]]], score: 1 })));
      const reasoning = { desired_action: "6", my_reason: "RNG said so!" };
      const record = await client.dispatch(complex(12, 40, reasoning), "locksmith", "inst-1");
      expect(lastRequest().body).toEqual({ game_id: "locksmith", guid: "inst-1", x: 12, y: 40, reasoning });
      expect(record.frames).toHaveLength(2);
      expect(record.action).toEqual({ id: "ACTION6", x: 12, y: 40, reasoning });
    });

    it("keeps full_reset when the service sets it", async () => {
      mockFetch.mockResolvedValueOnce(json(frameReply({ full_reset: true })));
      const record = await client.dispatch(reset(), "locksmith", "inst-1");
      expect(record.full_reset).toBe(true);
    });

    it("rejects an invalid action without sending a request", async () => {
      await expect(client.dispatch({ id: "ACTION6", x: 70, y: 0 }, "locksmith", "inst-1")).rejects.toBeInstanceOf(ValidationError);
      await expect(client.dispatch(simple(2), "locksmith")).rejects.toThrow("ACTION2 requires an instance id");
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it("rejects a reply that fails the frame schema", async () => {
      mockFetch.mockResolvedValueOnce(json(frameReply({ score: 300 })));
      await expect(client.dispatch(reset(), "locksmith")).rejects.toThrow("Malformed RESET response");
    });

    it("treats a 200 carrying an error as a validation error", async () => {
      mockFetch.mockResolvedValueOnce(json({ error: "game not started" }));
      await expect(client.dispatch(simple(1), "locksmith", "inst-1")).rejects.toBeInstanceOf(ValidationError);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });
  });

  describe("error classification", () => {
    it("does not retry authentication failures", async () => {
      mockFetch.mockResolvedValue(json({ error: "invalid api key" }, 401));
      const err = await client.listGames().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(AuthError);
      expect((err as AuthError).fatalTo).toBe("batch");
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it("maps the instance cap to a capacity error without retrying", async () => {
      mockFetch.mockResolvedValue(json({ error: "too many instances for this key" }, 429));
      const err = await client.dispatch(reset(), "locksmith").catch((e: unknown) => e);
      expect(err).toBeInstanceOf(CapacityError);
      expect((err as CapacityError).status).toBe(429);
      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("maps 409 to a capacity error", async () => {
      mockFetch.mockResolvedValueOnce(json({ error: "busy" }, 409));
      await expect(client.dispatch(reset(), "locksmith")).rejects.toBeInstanceOf(CapacityError);
    });

    it("retries 5xx with backoff and then succeeds", async () => {
      mockFetch
        .mockResolvedValueOnce(json({ error: "upstream" }, 503))
        .mockResolvedValueOnce(json({ error: "slow down" }, 429))
        .mockResolvedValueOnce(json(frameReply()));
      const record = await client.dispatch(reset(), "locksmith");
      expect(record.instance_id).toBe("inst-1");
      expect(mockFetch).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledTimes(2);
    });

    it("gives up after the attempt ceiling", async () => {
      mockFetch.mockResolvedValue(json({ error: "down" }, 500));
      const err = await client.listGames().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(TransientNetworkError);
      expect((err as TransientNetworkError).attempts).toBe(3);
      expect((err as TransientNetworkError).fatalTo).toBe("unit");
      expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it("retries network failures", async () => {
      mockFetch
        .mockRejectedValueOnce(new TypeError("fetch failed"))
        .mockResolvedValueOnce(json([]));
      await expect(client.listGames()).resolves.toEqual([]);
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it("treats a timeout as transient", async () => {
      const slowClient = new ArenaClient({ rootUrl: "http://arena.test", apiKey: "test-key", timeoutMs: 20, maxAttempts: 2, sleep });
      mockFetch.mockImplementation((_url: string, init: RequestInit) => new Promise((_resolve, reject) => {
        init.signal?.addEventListener("abort", () => {
          const abort = new Error("This operation was aborted");
          abort.name = "AbortError";
          reject(abort);
        });
      }));
      const err = await slowClient.listGames().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(TransientNetworkError);
      expect((err as Error).message).toContain("Request timed out after 20ms");
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it("rejects non-JSON bodies", async () => {
      mockFetch.mockResolvedValueOnce(new Response("<html>", { status: 200 }));
      await expect(client.listGames()).rejects.toThrow("response is not JSON");
    });
  });
});

describe("parseScorecard", () => {
  it("keeps source url, tags and failure counts", () => {
    const summary = parseScorecard({
      card_id: "c",
      won: 0,
      played: 1,
      total_actions: 3,
      score: 0,
      source_url: "https://example.test",
      tags: ["a", "b"],
      games: { g: { total_plays: 1, total_actions: 3, scores: [], states: [], actions: [], failures: 1 } },
    });
    expect(summary.source_url).toBe("https://example.test");
    expect(summary.tags).toEqual(["a", "b"]);
    expect(summary.games.g?.failures).toBe(1);
  });
});
