import { ValidationError, describeAction, sameAction } from "@gridswarm/schemas";
import type { ActionDispatcher, GameAction, SessionRecord } from "@gridswarm/schemas";

/**
 * Offline dispatcher that answers from a recording. Each proposed action must
 * match the recorded one exactly, annotation included.
 */
export class ReplayClient implements ActionDispatcher {
  private steps: SessionRecord[];
  private cursor = 0;

  constructor(steps: readonly SessionRecord[]) {
    this.steps = steps.map((step) => structuredClone(step));
  }

  get position(): number {
    return this.cursor;
  }

  get exhausted(): boolean {
    return this.cursor >= this.steps.length;
  }

  /** Instance and card ids are not checked; the recorded response carries its own. */
  async dispatch(action: GameAction, gameId: string, _instanceId?: string, _cardId?: string): Promise<SessionRecord> {
    const expected = this.steps[this.cursor];
    if (!expected) {
      throw new ValidationError(`Replay diverged: no recorded step left for ${describeAction(action)}`);
    }
    if (expected.game_id !== gameId) {
      throw new ValidationError(`Replay diverged at step ${this.cursor + 1}: recorded game ${expected.game_id}, got ${gameId}`);
    }
    if (!sameAction(action, expected.action)) {
      throw new ValidationError(
        `Replay diverged at step ${this.cursor + 1}: recorded ${describeAction(expected.action)}, got ${describeAction(action)}`,
      );
    }
    this.cursor++;
    return structuredClone(expected);
  }
}
