import { describe, it, expect } from "vitest";
import { ValidationError, complex, simple } from "@gridswarm/schemas";
import type { SessionRecord } from "@gridswarm/schemas";
import { ScriptedPolicy, parseScript } from "./scripted.js";

function step(state: SessionRecord["state"]): SessionRecord {
  return { game_id: "locksmith", instance_id: "locksmith-1", frames: [[[0]]], state, score: 0, action: { id: "RESET" } };
}

describe("ScriptedPolicy", () => {
  it("inserts a RESET before the first move", () => {
    const policy = new ScriptedPolicy([simple(1), complex(2, 3)]);
    expect(policy.chooseAction([], null)).toEqual({ id: "RESET" });
    expect(policy.isDone([], null)).toBe(false);
    expect(policy.chooseAction([], step("NOT_FINISHED"))).toEqual({ id: "ACTION1" });
    expect(policy.chooseAction([], step("NOT_FINISHED"))).toEqual({ id: "ACTION6", x: 2, y: 3 });
    expect(policy.isDone([], step("NOT_FINISHED"))).toBe(true);
  });

  it("resets again after a game over", () => {
    const policy = new ScriptedPolicy([simple(4), simple(2)]);
    expect(policy.chooseAction([], null)).toEqual({ id: "RESET" });
    expect(policy.chooseAction([], step("NOT_FINISHED"))).toEqual({ id: "ACTION4" });
    expect(policy.chooseAction([], step("GAME_OVER"))).toEqual({ id: "RESET" });
    expect(policy.chooseAction([], step("NOT_FINISHED"))).toEqual({ id: "ACTION2" });
  });

  it("stops early on a win", () => {
    const policy = new ScriptedPolicy([simple(1), simple(2)]);
    expect(policy.isDone([], step("WIN"))).toBe(true);
  });

  it("rejects an empty script", () => {
    expect(() => new ScriptedPolicy([])).toThrow(ValidationError);
  });

  it("hands out copies of its actions", () => {
    const script = [simple(1, { note: "first" })];
    const policy = new ScriptedPolicy(script, { name: "sampler", maxActions: 5 });
    const action = policy.chooseAction([], step("NOT_FINISHED"));
    action.reasoning = "changed";
    expect(script[0]?.reasoning).toEqual({ note: "first" });
    expect(policy.name).toBe("sampler");
    expect(policy.maxActions).toBe(5);
  });
});

describe("parseScript", () => {
  it("parses names and coordinates", () => {
    expect(parseScript("RESET, action1 ACTION6:12:40")).toEqual([
      { id: "RESET" },
      { id: "ACTION1" },
      { id: "ACTION6", x: 12, y: 40 },
    ]);
  });

  it("rejects unknown actions and bad coordinates", () => {
    expect(() => parseScript("ACTION9")).toThrow('Unknown action "ACTION9"');
    expect(() => parseScript("ACTION6:64:0")).toThrow(ValidationError);
    expect(() => parseScript("ACTION6")).toThrow(ValidationError);
  });
});
