import { describeAction, silentLogger, sleep } from "@gridswarm/schemas";
import type { DecisionPolicy, GameAction, Logger, SessionRecord } from "@gridswarm/schemas";
import { readRecording, recordedSteps } from "./recorder.js";
import { parseRecordingFileName } from "./recording-name.js";

export interface PlaybackOptions {
  /** Pause before each proposed action. */
  delayMs?: number;
  name?: string;
  logger?: Logger;
}

/**
 * Decision policy that proposes the actions of a recording, in order and
 * with their annotations, then reports itself done.
 */
export class PlaybackPolicy implements DecisionPolicy {
  readonly name: string;
  readonly isPlayback = true;
  readonly maxActions: number;
  /** Game the recording was made on, when known. */
  readonly gameId?: string;

  private actions: GameAction[];
  private cursor = 0;
  private delayMs: number;
  private logger: Logger;

  constructor(steps: readonly SessionRecord[], options: PlaybackOptions = {}) {
    this.actions = steps.map((step) => structuredClone(step.action));
    this.gameId = steps[0]?.game_id;
    this.maxActions = Math.max(1, this.actions.length);
    this.name = options.name ?? "playback";
    this.delayMs = options.delayMs ?? 0;
    this.logger = options.logger ?? silentLogger;
  }

  static async fromFile(path: string, options: PlaybackOptions = {}): Promise<PlaybackPolicy> {
    const steps = recordedSteps(await readRecording(path, options.logger));
    const parsed = parseRecordingFileName(path);
    return new PlaybackPolicy(steps, { name: parsed ? `playback.${parsed.policy}` : undefined, ...options });
  }

  get remaining(): number {
    return this.actions.length - this.cursor;
  }

  /** Rewind for another identical pass. */
  reset(): void {
    this.cursor = 0;
  }

  async chooseAction(): Promise<GameAction> {
    const action = this.actions[this.cursor];
    if (!action) throw new Error(`Recording exhausted after ${this.actions.length} actions`);
    if (this.delayMs > 0) await sleep(this.delayMs);
    this.cursor++;
    this.logger.debug(`playback ${this.cursor}/${this.actions.length}: ${describeAction(action)}`);
    return structuredClone(action);
  }

  isDone(): boolean {
    return this.cursor >= this.actions.length;
  }
}
