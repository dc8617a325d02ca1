import { describe, it, expect } from "vitest";
import { ValidationError, reset, simple } from "@gridswarm/schemas";
import { InMemoryArena } from "./in-memory-arena.js";

describe("InMemoryArena", () => {
  const games = [{ game_id: "locksmith", title: "Locksmith" }];

  it("tracks plays on the card it was reset into", async () => {
    const arena = new InMemoryArena({
      games,
      scripts: { locksmith: (_a, inst) => (inst.actions === 2 ? { state: "WIN", score: 2 } : undefined) },
    });
    const card = await arena.openScorecard("https://example.test", ["ci"]);
    const first = await arena.dispatch(reset(), "locksmith", undefined, card);
    await arena.dispatch(simple(1), "locksmith", first.instance_id);
    await arena.dispatch(simple(1), "locksmith", first.instance_id);
    await arena.dispatch(reset(), "locksmith", first.instance_id, card);

    const summary = await arena.closeScorecard(card);
    expect(summary).toMatchObject({ card_id: card, won: 1, played: 2, total_actions: 2, score: 2, tags: ["ci"] });
    expect(summary.games.locksmith?.states).toEqual(["WIN", "NOT_FINISHED"]);
    expect(summary.games.locksmith?.actions).toEqual([2, 0]);
    expect(arena.openCards).toEqual([]);
  });

  it("rejects closing a card twice and reading an unknown one", async () => {
    const arena = new InMemoryArena({ games });
    const card = await arena.openScorecard();
    await arena.closeScorecard(card);
    await expect(arena.closeScorecard(card)).rejects.toThrow(`card ${card} is already closed`);
    await expect(arena.getScorecard("nope")).rejects.toBeInstanceOf(ValidationError);
  });

  it("rejects actions on an instance that was never reset", async () => {
    const arena = new InMemoryArena({ games });
    await expect(arena.dispatch(simple(1), "locksmith", "ghost")).rejects.toThrow("unknown instance ghost");
  });

  it("counts overlapping dispatches", async () => {
    const arena = new InMemoryArena({ games, latencyMs: 5 });
    await Promise.all([
      arena.dispatch(reset(), "locksmith"),
      arena.dispatch(reset(), "locksmith"),
      arena.dispatch(reset(), "locksmith"),
    ]);
    expect(arena.maxInFlight).toBe(3);
  });

  it("limits totals to the requested game", async () => {
    const arena = new InMemoryArena({
      games: [...games, { game_id: "maze", title: "Maze" }],
      scripts: { locksmith: () => ({ state: "WIN", score: 1 }) },
    });
    const card = await arena.openScorecard();
    const lock = await arena.dispatch(reset(), "locksmith", undefined, card);
    await arena.dispatch(simple(5), "locksmith", lock.instance_id);
    const maze = await arena.dispatch(reset(), "maze", undefined, card);
    await arena.dispatch(simple(1), "maze", maze.instance_id);
    await arena.dispatch(simple(2), "maze", maze.instance_id);

    const whole = await arena.getScorecard(card);
    expect(whole).toMatchObject({ won: 1, played: 2, total_actions: 3, score: 1 });

    const one = await arena.getScorecard(card, "maze");
    expect(one).toMatchObject({ won: 0, played: 1, total_actions: 2, score: 0 });
    expect(Object.keys(one.games)).toEqual(["maze"]);
  });
});
