import { complex, reset, simple } from "@gridswarm/schemas";
import type { DecisionPolicy, GameAction, SessionRecord } from "@gridswarm/schemas";

export interface RandomPolicyOptions {
  /** Uniform in [0, 1); injectable for deterministic runs. */
  random?: () => number;
  maxActions?: number;
}

const MOVES = [1, 2, 3, 4, 5, 6] as const;

/** Picks a random non-RESET action; resets when the game is not running. Stops on a win. */
export class RandomPolicy implements DecisionPolicy {
  readonly name = "random";
  readonly maxActions: number;
  private random: () => number;

  constructor(options: RandomPolicyOptions = {}) {
    this.random = options.random ?? Math.random;
    this.maxActions = options.maxActions ?? 100;
  }

  chooseAction(_history: readonly SessionRecord[], latest: SessionRecord | null): GameAction {
    if (latest === null || latest.state === "NOT_PLAYED" || latest.state === "GAME_OVER") {
      return reset();
    }
    const move = MOVES[this.pick(MOVES.length)] ?? 1;
    if (move === 6) {
      const x = this.pick(64);
      const y = this.pick(64);
      return complex(x, y, { desired_action: "ACTION6", reason: `random click at (${x}, ${y})` });
    }
    return simple(move, { desired_action: `ACTION${move}`, reason: "random choice" });
  }

  isDone(_history: readonly SessionRecord[], latest: SessionRecord | null): boolean {
    return latest?.state === "WIN";
  }

  private pick(n: number): number {
    return Math.min(n - 1, Math.floor(this.random() * n));
  }
}
