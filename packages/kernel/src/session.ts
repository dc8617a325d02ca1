import {
  ProtocolViolation,
  assertValidAction,
  describeAction,
  silentLogger,
} from "@gridswarm/schemas";
import type {
  ActionDispatcher,
  GameAction,
  LifecycleState,
  Logger,
  SessionRecord,
} from "@gridswarm/schemas";

/** Where a session forwards each successful step. */
export interface RecordSink {
  record(record: SessionRecord): Promise<void>;
}

export interface GameSessionConfig {
  gameId: string;
  client: ActionDispatcher;
  /** Card the first RESET attaches this instance to. */
  cardId?: string;
  /** Caller-assigned instance id; omitted, the server assigns one on RESET. */
  instanceId?: string;
  maxActions: number;
  recorder?: RecordSink;
  logger?: Logger;
  /** Keep only the most recent N records in memory; the recorder holds the rest. */
  historyLimit?: number;
  now?: () => number;
}

const RESET_ONLY_STATES: ReadonlySet<LifecycleState> = new Set(["NOT_PLAYED", "WIN", "GAME_OVER"]);

/**
 * Protocol state for one (game, instance) pair. Owned by a single worker;
 * every mutation happens inside `apply`.
 */
export class GameSession {
  readonly gameId: string;
  readonly maxActions: number;

  private client: ActionDispatcher;
  private cardId?: string;
  private currentInstanceId?: string;
  private recorder?: RecordSink;
  private logger: Logger;
  private historyLimit: number;
  private now: () => number;

  private records: SessionRecord[] = [];
  private currentState: LifecycleState = "NOT_PLAYED";
  private currentScore = 0;
  private applied = 0;
  private playActions = 0;
  private startedAt?: number;
  private applying = false;

  constructor(config: GameSessionConfig) {
    if (!Number.isInteger(config.maxActions) || config.maxActions < 1) {
      throw new RangeError(`maxActions must be a positive integer (got ${config.maxActions})`);
    }
    this.gameId = config.gameId;
    this.client = config.client;
    this.cardId = config.cardId;
    this.currentInstanceId = config.instanceId;
    this.maxActions = config.maxActions;
    this.recorder = config.recorder;
    this.logger = config.logger ?? silentLogger;
    this.historyLimit = config.historyLimit ?? Infinity;
    this.now = config.now ?? Date.now;
  }

  get state(): LifecycleState {
    return this.currentState;
  }

  get score(): number {
    return this.currentScore;
  }

  /** Successful applies over the life of this session. */
  get actionCounter(): number {
    return this.applied;
  }

  /** Non-RESET actions since the most recent RESET. */
  get playActionCount(): number {
    return this.playActions;
  }

  get history(): readonly SessionRecord[] {
    return this.records;
  }

  get latest(): SessionRecord | null {
    return this.records[this.records.length - 1] ?? null;
  }

  get instanceId(): string | undefined {
    return this.currentInstanceId;
  }

  get ceilingReached(): boolean {
    return this.applied >= this.maxActions;
  }

  get elapsedMs(): number {
    return this.startedAt === undefined ? 0 : this.now() - this.startedAt;
  }

  /** Average successful applies per second since the first one was issued. */
  get fps(): number {
    const seconds = this.elapsedMs / 1000;
    return seconds > 0 ? this.applied / seconds : 0;
  }

  async apply(action: GameAction): Promise<SessionRecord> {
    if (this.applying) {
      throw new ProtocolViolation(`${this.gameId}: apply called while another action is in flight`);
    }
    if (this.ceilingReached) {
      throw new ProtocolViolation(
        `${this.gameId}: local action ceiling of ${this.maxActions} reached; no further actions are sent`,
      );
    }
    if (action.id !== "RESET" && RESET_ONLY_STATES.has(this.currentState)) {
      throw new ProtocolViolation(
        `${this.gameId}: ${describeAction(action)} is not allowed in state ${this.currentState}; RESET first`,
      );
    }
    assertValidAction(action);

    this.applying = true;
    let record: SessionRecord;
    try {
      this.startedAt ??= this.now();
      const cardId = action.id === "RESET" ? this.cardId : undefined;
      record = await this.client.dispatch(action, this.gameId, this.currentInstanceId, cardId);
    } finally {
      this.applying = false;
    }

    this.checkResponse(action, record);

    this.records.push(record);
    if (this.records.length > this.historyLimit) this.records.shift();
    this.currentInstanceId = record.instance_id;
    this.currentState = record.state;
    this.currentScore = record.score;
    this.applied += 1;
    this.playActions = action.id === "RESET" ? 0 : this.playActions + 1;

    this.logger.debug(`${describeAction(action)} → ${record.state}`, {
      instance_id: record.instance_id,
      score: record.score,
      frames: record.frames.length,
    });

    if (this.recorder) await this.recorder.record(record);
    return record;
  }

  private checkResponse(action: GameAction, record: SessionRecord): void {
    if (record.game_id !== this.gameId) {
      throw new ProtocolViolation(`${this.gameId}: response belongs to game ${record.game_id}`);
    }
    if (record.state === "NOT_PLAYED") {
      throw new ProtocolViolation(`${this.gameId}: ${describeAction(action)} left the instance in NOT_PLAYED`);
    }
    if (action.id === "RESET" && record.score !== 0) {
      throw new ProtocolViolation(`${this.gameId}: RESET returned score ${record.score}, expected 0`);
    }
    if (this.currentInstanceId !== undefined && record.instance_id !== this.currentInstanceId && action.id !== "RESET") {
      throw new ProtocolViolation(
        `${this.gameId}: response for instance ${record.instance_id}, expected ${this.currentInstanceId}`,
      );
    }
  }
}
