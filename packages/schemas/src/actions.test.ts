import { describe, it, expect } from "vitest";
import {
  reset,
  simple,
  complex,
  isSimpleAction,
  isComplexAction,
  assertValidAction,
  actionFromName,
  sameAction,
  describeAction,
} from "./actions.js";
import { ValidationError } from "./errors.js";
import type { GameAction } from "./types.js";

describe("action constructors", () => {
  it("builds RESET without an annotation by default", () => {
    expect(reset()).toEqual({ id: "RESET" });
  });

  it("maps simple(n) onto ACTIONn", () => {
    expect(simple(1)).toEqual({ id: "ACTION1" });
    expect(simple(5, "go")).toEqual({ id: "ACTION5", reasoning: "go" });
  });

  it("builds ACTION6 with coordinates", () => {
    expect(complex(0, 63)).toEqual({ id: "ACTION6", x: 0, y: 63 });
  });

  it("keeps structured reasoning verbatim", () => {
    const reasoning = { desired_action: "6", notes: ["a", 1, null, { deep: true }] };
    const action = complex(10, 20, reasoning);
    expect(action.reasoning).toEqual(reasoning);
  });

  it("rejects out-of-range coordinates", () => {
    expect(() => complex(64, 0)).toThrow(ValidationError);
    expect(() => complex(0, -1)).toThrow("coordinates must be integers in [0, 63]");
    expect(() => complex(1.5, 2)).toThrow(ValidationError);
  });
});

describe("action predicates", () => {
  it("classifies simple and complex actions", () => {
    expect(isSimpleAction(simple(3))).toBe(true);
    expect(isSimpleAction(reset())).toBe(false);
    expect(isComplexAction(complex(1, 1))).toBe(true);
    expect(isComplexAction(simple(3))).toBe(false);
  });

  it("assertValidAction rejects unknown ids", () => {
    const bogus = { id: "ACTION7" } as unknown as GameAction;
    expect(() => assertValidAction(bogus)).toThrow('Unknown action "ACTION7"');
  });
});

describe("actionFromName", () => {
  it("parses names case-insensitively", () => {
    expect(actionFromName("action4")).toEqual({ id: "ACTION4" });
    expect(actionFromName(" reset ")).toEqual({ id: "RESET" });
  });

  it("accepts numeric-string coordinates", () => {
    expect(actionFromName("ACTION6", { x: "12", y: 7 })).toEqual({ id: "ACTION6", x: 12, y: 7 });
  });

  it("attaches reasoning", () => {
    expect(actionFromName("ACTION1", {}, { why: "left" })).toEqual({ id: "ACTION1", reasoning: { why: "left" } });
  });

  it("rejects missing coordinates and unknown names", () => {
    expect(() => actionFromName("ACTION6", { x: 1 })).toThrow(ValidationError);
    expect(() => actionFromName("JUMP")).toThrow('Unknown action "JUMP"');
  });
});

describe("sameAction / describeAction", () => {
  it("compares id, coordinates and reasoning", () => {
    expect(sameAction(complex(1, 2, "a"), complex(1, 2, "a"))).toBe(true);
    expect(sameAction(complex(1, 2), complex(2, 1))).toBe(false);
    expect(sameAction(simple(1, "a"), simple(1, "b"))).toBe(false);
    expect(sameAction(simple(1), reset())).toBe(false);
  });

  it("renders coordinates for ACTION6", () => {
    expect(describeAction(complex(3, 4))).toBe("ACTION6(3,4)");
    expect(describeAction(reset())).toBe("RESET");
  });
});
