import { ValidationError, actionFromName, reset } from "@gridswarm/schemas";
import type { DecisionPolicy, GameAction, SessionRecord } from "@gridswarm/schemas";

export interface ScriptedPolicyOptions {
  name?: string;
  maxActions?: number;
}

/** Plays a fixed list of actions, inserting a RESET whenever the game is not running. */
export class ScriptedPolicy implements DecisionPolicy {
  readonly name: string;
  readonly maxActions: number;
  private script: GameAction[];
  private cursor = 0;

  constructor(script: readonly GameAction[], options: ScriptedPolicyOptions = {}) {
    if (script.length === 0) throw new ValidationError("A scripted policy needs at least one action");
    this.script = script.map((action) => structuredClone(action));
    this.name = options.name ?? "scripted";
    this.maxActions = options.maxActions ?? Math.max(200, this.script.length * 2);
  }

  chooseAction(_history: readonly SessionRecord[], latest: SessionRecord | null): GameAction {
    const next = this.script[this.cursor];
    if (!next) throw new Error("Script exhausted");
    const running = latest !== null && latest.state === "NOT_FINISHED";
    if (!running && next.id !== "RESET") return reset();
    this.cursor++;
    return structuredClone(next);
  }

  isDone(_history: readonly SessionRecord[], latest: SessionRecord | null): boolean {
    return this.cursor >= this.script.length || latest?.state === "WIN";
  }
}

/**
 * Parse `"RESET, ACTION1, ACTION6:12:40"` into actions. Coordinates follow the
 * action name, separated by colons.
 */
export function parseScript(text: string): GameAction[] {
  return text
    .split(/[,\s]+/)
    .filter((token) => token !== "")
    .map((token) => {
      const [name = "", x, y] = token.split(":");
      return actionFromName(name, x !== undefined || y !== undefined ? { x, y } : {});
    });
}
