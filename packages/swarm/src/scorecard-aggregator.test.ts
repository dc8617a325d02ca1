import { describe, it, expect } from "vitest";
import type { PlayOutcome } from "@gridswarm/schemas";
import { ScorecardAggregator } from "./scorecard-aggregator.js";

function play(overrides: Partial<PlayOutcome>): PlayOutcome {
  return {
    unit_id: "u",
    game_id: "locksmith",
    policy: "random",
    status: "WIN",
    state: "WIN",
    score: 1,
    actions: 10,
    ...overrides,
  };
}

describe("ScorecardAggregator", () => {
  it("appends one entry per play in the order added", () => {
    const agg = new ScorecardAggregator("card-1", { tags: ["ci"] });
    agg.add(play({ score: 2, actions: 12 }));
    agg.add(play({ status: "GAME_OVER", state: "GAME_OVER", score: 0, actions: 7 }));
    agg.add(play({ score: 3, actions: 20 }));
    const summary = agg.summary();
    expect(summary).toMatchObject({ card_id: "card-1", played: 3, won: 2, total_actions: 39, score: 3, tags: ["ci"] });
    expect(summary.games.locksmith).toEqual({
      game_id: "locksmith",
      total_plays: 3,
      total_actions: 39,
      scores: [2, 0, 3],
      states: ["WIN", "GAME_OVER", "WIN"],
      actions: [12, 7, 20],
      outcomes: ["WIN", "GAME_OVER", "WIN"],
      failures: 0,
    });
  });

  it("orders the lists by play index rather than arrival", () => {
    const agg = new ScorecardAggregator("card-1");
    agg.add(play({ unit_id: "locksmith#2", score: 3, actions: 20 }), 2);
    agg.add(play({ unit_id: "locksmith#0", score: 2, actions: 12 }), 0);
    agg.add(play({ unit_id: "locksmith#1", status: "GAME_OVER", state: "GAME_OVER", score: 0, actions: 7 }), 1);
    expect(agg.plays.map((p) => p.unit_id)).toEqual(["locksmith#0", "locksmith#1", "locksmith#2"]);
    const game = agg.summary().games.locksmith;
    expect(game?.scores).toEqual([2, 0, 3]);
    expect(game?.states).toEqual(["WIN", "GAME_OVER", "WIN"]);
    expect(game?.actions).toEqual([12, 7, 20]);
  });

  it("leaves gaps for plays that never ran", () => {
    const agg = new ScorecardAggregator("card-1");
    agg.add(play({ unit_id: "locksmith#2" }), 2);
    expect(agg.plays.map((p) => p.unit_id)).toEqual(["locksmith#2"]);
    expect(agg.summary().played).toBe(1);
  });

  it("refuses a second outcome for the same play", () => {
    const agg = new ScorecardAggregator("card-1");
    agg.add(play({}), 0);
    expect(() => agg.add(play({}), 0)).toThrow("Play 0 was already recorded");
  });

  it("keeps a local ceiling apart from a server loss", () => {
    const agg = new ScorecardAggregator("card-1");
    agg.add(play({ status: "LOCAL_CEILING", state: "NOT_FINISHED", score: 0, actions: 80 }));
    const game = agg.summary().games.locksmith;
    expect(game?.states).toEqual(["NOT_FINISHED"]);
    expect(game?.outcomes).toEqual(["LOCAL_CEILING"]);
  });

  it("counts a crashed play without inventing its result", () => {
    const agg = new ScorecardAggregator("card-1");
    agg.add(play({ status: "FAILED", state: "NOT_FINISHED", score: 0, actions: 4, error: { code: "TRANSIENT", message: "down" } }));
    const summary = agg.summary();
    expect(summary.played).toBe(1);
    expect(summary.won).toBe(0);
    expect(summary.total_actions).toBe(4);
    expect(summary.games.locksmith).toMatchObject({ total_plays: 1, failures: 1, scores: [], states: [], actions: [] });
    expect(agg.plays).toHaveLength(1);
  });

  it("sums the best score of each game", () => {
    const agg = new ScorecardAggregator("card-1");
    agg.add(play({ game_id: "a", score: 2 }));
    agg.add(play({ game_id: "a", score: 5 }));
    agg.add(play({ game_id: "b", score: 1, status: "POLICY_DONE", state: "NOT_FINISHED" }));
    expect(agg.summary().score).toBe(6);
    expect(agg.summary().won).toBe(2);
  });

  it("hands out copies", () => {
    const agg = new ScorecardAggregator("card-1");
    agg.add(play({}));
    agg.summary().games.locksmith?.scores.push(99);
    expect(agg.summary().games.locksmith?.scores).toEqual([1]);
  });
});
