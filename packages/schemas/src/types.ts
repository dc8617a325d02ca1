/**
 * gridswarm core types
 *
 * Canonical data models shared by the transport, the session engine, the
 * recorder and the swarm. Wire-facing names stay snake_case, matching what the
 * game service sends and what recordings persist.
 */

// ─── JSON ───────────────────────────────────────────────────────────

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

// ─── Actions ────────────────────────────────────────────────────────

export type SimpleActionId = "ACTION1" | "ACTION2" | "ACTION3" | "ACTION4" | "ACTION5";
export type ComplexActionId = "ACTION6";
export type ActionId = "RESET" | SimpleActionId | ComplexActionId;

export interface ResetAction {
  id: "RESET";
  reasoning?: JsonValue;
}

export interface SimpleAction {
  id: SimpleActionId;
  reasoning?: JsonValue;
}

export interface ComplexAction {
  id: ComplexActionId;
  x: number;
  y: number;
  reasoning?: JsonValue;
}

export type GameAction = ResetAction | SimpleAction | ComplexAction;

// ─── Frames & lifecycle ─────────────────────────────────────────────

/** Rows of cells, each cell an integer in [0, 15]. */
export type Grid = number[][];

export type LifecycleState = "NOT_PLAYED" | "NOT_FINISHED" | "WIN" | "GAME_OVER";

export interface SessionRecord {
  game_id: string;
  instance_id: string;
  /** One or more grids; intermediate states the server chose to reveal come first. */
  frames: Grid[];
  state: LifecycleState;
  score: number;
  action: GameAction;
  full_reset?: boolean;
}

export interface GameInfo {
  game_id: string;
  title: string;
}

// ─── Scorecard ──────────────────────────────────────────────────────

export type PlayStatus =
  | "WIN"
  | "GAME_OVER"
  | "LOCAL_CEILING"
  | "POLICY_DONE"
  | "ABORTED"
  | "FAILED";

/** Status of a play that contributed an entry to the per-game lists. */
export type CompletedPlayStatus = Exclude<PlayStatus, "FAILED">;

export interface GameScorecard {
  game_id: string;
  total_plays: number;
  total_actions: number;
  scores: number[];
  states: LifecycleState[];
  actions: number[];
  outcomes: CompletedPlayStatus[];
  failures: number;
}

export interface ScorecardSummary {
  card_id: string;
  won: number;
  played: number;
  total_actions: number;
  score: number;
  source_url?: string;
  tags?: string[];
  games: Record<string, GameScorecard>;
}

export interface ScorecardConfig {
  sourceUrl?: string;
  tags?: string[];
}

// ─── Transport contract ─────────────────────────────────────────────

export interface ActionDispatcher {
  dispatch(
    action: GameAction,
    gameId: string,
    instanceId?: string,
    cardId?: string,
  ): Promise<SessionRecord>;
}

export interface GameClient extends ActionDispatcher {
  listGames(): Promise<GameInfo[]>;
  openScorecard(sourceUrl?: string, tags?: string[]): Promise<string>;
  closeScorecard(cardId: string): Promise<ScorecardSummary>;
  getScorecard(cardId: string, gameId?: string): Promise<ScorecardSummary>;
}

// ─── Logging ────────────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

// ─── Decision policy ────────────────────────────────────────────────

export interface PolicyContext {
  game_id: string;
  card_id: string;
  logger: Logger;
  /** Append a free-form entry to this unit's recording. No-op when not recording. */
  annotate(entry: Record<string, unknown>): Promise<void>;
}

export interface PlayOutcome {
  unit_id: string;
  game_id: string;
  instance_id?: string;
  policy: string;
  status: PlayStatus;
  state: LifecycleState;
  score: number;
  actions: number;
  error?: { code: string; message: string };
  recording?: string;
}

export interface DecisionPolicy {
  readonly name: string;
  /** Default local action ceiling for plays driven by this policy. */
  readonly maxActions?: number;
  /** Playback policies drive actions from a recording and are never re-recorded. */
  readonly isPlayback?: boolean;
  chooseAction(
    history: readonly SessionRecord[],
    latest: SessionRecord | null,
  ): GameAction | Promise<GameAction>;
  isDone(history: readonly SessionRecord[], latest: SessionRecord | null): boolean;
  prepare?(ctx: PolicyContext): void | Promise<void>;
  cleanup?(ctx: PolicyContext, outcome: PlayOutcome): void | Promise<void>;
}

export interface PolicyFactoryContext {
  game_id: string;
  card_id: string;
  index: number;
}

export type PolicyFactory = (ctx: PolicyFactoryContext) => DecisionPolicy;

// ─── Batch result ───────────────────────────────────────────────────

export interface AggregateSummary {
  card_id: string;
  /** Client-side view built from unit outcomes, in play order per game. */
  scorecard: ScorecardSummary;
  /** Summary the service returned when the card was closed. */
  server: ScorecardSummary | null;
  plays: PlayOutcome[];
  max_in_flight: number;
  /** Batch-fatal error that stopped the run early. */
  error?: { code: string; message: string };
}

// ─── Recording ──────────────────────────────────────────────────────

export interface RecordingEntry<T = unknown> {
  timestamp: string;
  data: T;
}
