import {
  ValidationError,
  assertValidAction,
  sleep,
} from "@gridswarm/schemas";
import type {
  GameAction,
  GameClient,
  GameInfo,
  GameScorecard,
  Grid,
  LifecycleState,
  ScorecardSummary,
  SessionRecord,
} from "@gridswarm/schemas";

/** What a scripted game does with one action on one instance. */
export interface ArenaStep {
  state?: LifecycleState;
  score?: number;
  frames?: Grid[];
  full_reset?: boolean;
}

export interface ArenaInstanceView {
  game_id: string;
  instance_id: string;
  state: LifecycleState;
  score: number;
  /** Non-RESET actions in the current play. */
  actions: number;
}

export type ArenaScript = (action: GameAction, instance: ArenaInstanceView) => ArenaStep | undefined;

export interface InMemoryArenaConfig {
  games?: GameInfo[];
  /** Per-game behaviour; games without a script stay NOT_FINISHED at score 0. */
  scripts?: Record<string, ArenaScript>;
  /** Simulated round-trip time of every dispatch. */
  latencyMs?: number;
  /** Reject with this error instead of answering. */
  failWith?: (action: GameAction, gameId: string, instanceId: string | undefined) => Error | undefined;
}

interface InstanceState extends ArenaInstanceView {
  card_id?: string;
  /** Index of the current play in the card's list, if attached. */
  play?: number;
}

interface CardPlay {
  game_id: string;
  state: LifecycleState;
  score: number;
  actions: number;
}

interface CardState {
  closed: boolean;
  source_url?: string;
  tags?: string[];
  plays: CardPlay[];
}

const BLANK_FRAME: Grid = [[0, 0], [0, 0]];

/**
 * In-process stand-in for the game service. Keeps instances and scorecards in
 * memory and tracks how many dispatches overlap.
 */
export class InMemoryArena implements GameClient {
  readonly dispatched: Array<{ action: GameAction; game_id: string; instance_id?: string; card_id?: string }> = [];

  private games: GameInfo[];
  private scripts: Record<string, ArenaScript>;
  private latencyMs: number;
  private failWith?: InMemoryArenaConfig["failWith"];
  private instances = new Map<string, InstanceState>();
  private cards = new Map<string, CardState>();
  private nextInstance = 1;
  private nextCard = 1;
  private inFlight = 0;
  private peak = 0;

  constructor(config: InMemoryArenaConfig = {}) {
    this.games = config.games ?? [];
    this.scripts = config.scripts ?? {};
    this.latencyMs = config.latencyMs ?? 0;
    this.failWith = config.failWith;
  }

  /** Highest number of dispatches that were in flight at the same time. */
  get maxInFlight(): number {
    return this.peak;
  }

  get openCards(): string[] {
    return [...this.cards.entries()].filter(([, card]) => !card.closed).map(([id]) => id);
  }

  async listGames(): Promise<GameInfo[]> {
    return this.games.map((g) => ({ ...g }));
  }

  async openScorecard(sourceUrl?: string, tags?: string[]): Promise<string> {
    const cardId = `card-${this.nextCard++}`;
    this.cards.set(cardId, { closed: false, source_url: sourceUrl, tags, plays: [] });
    return cardId;
  }

  async closeScorecard(cardId: string): Promise<ScorecardSummary> {
    const card = this.requireCard(cardId);
    if (card.closed) throw new ValidationError(`card ${cardId} is already closed`, 400);
    card.closed = true;
    return summarize(cardId, card);
  }

  async getScorecard(cardId: string, gameId?: string): Promise<ScorecardSummary> {
    return summarize(cardId, this.requireCard(cardId), gameId);
  }

  async dispatch(action: GameAction, gameId: string, instanceId?: string, cardId?: string): Promise<SessionRecord> {
    assertValidAction(action);
    this.dispatched.push({ action, game_id: gameId, instance_id: instanceId, card_id: cardId });
    this.inFlight++;
    this.peak = Math.max(this.peak, this.inFlight);
    try {
      if (this.latencyMs > 0) await sleep(this.latencyMs);
      const injected = this.failWith?.(action, gameId, instanceId);
      if (injected) throw injected;
      return this.step(action, gameId, instanceId, cardId);
    } finally {
      this.inFlight--;
    }
  }

  private step(action: GameAction, gameId: string, instanceId?: string, cardId?: string): SessionRecord {
    if (!this.games.some((g) => g.game_id === gameId)) {
      throw new ValidationError(`unknown game ${gameId}`, 404);
    }
    let instance = instanceId !== undefined ? this.instances.get(instanceId) : undefined;

    if (action.id === "RESET") {
      if (!instance) {
        const id = instanceId ?? `${gameId}-${this.nextInstance++}`;
        instance = { game_id: gameId, instance_id: id, state: "NOT_PLAYED", score: 0, actions: 0 };
        this.instances.set(id, instance);
      }
      if (cardId !== undefined) {
        const card = this.requireCard(cardId);
        if (card.closed) throw new ValidationError(`card ${cardId} is closed`, 400);
        instance.card_id = cardId;
      }
      instance.state = "NOT_FINISHED";
      instance.score = 0;
      instance.actions = 0;
      const card = instance.card_id !== undefined ? this.cards.get(instance.card_id) : undefined;
      if (card) {
        instance.play = card.plays.length;
        card.plays.push({ game_id: gameId, state: "NOT_FINISHED", score: 0, actions: 0 });
      }
    } else {
      if (!instance || instance.game_id !== gameId) {
        throw new ValidationError(`unknown instance ${String(instanceId)}`, 404);
      }
      if (instance.state !== "NOT_FINISHED") {
        throw new ValidationError(`instance ${instance.instance_id} is ${instance.state}; RESET first`, 400);
      }
      instance.actions++;
    }

    const script = this.scripts[gameId];
    const outcome = action.id === "RESET" ? undefined : script?.(action, { ...instance });
    if (outcome?.state !== undefined) instance.state = outcome.state;
    if (outcome?.score !== undefined) instance.score = outcome.score;
    this.syncPlay(instance);

    const record: SessionRecord = {
      game_id: gameId,
      instance_id: instance.instance_id,
      frames: outcome?.frames ?? [BLANK_FRAME.map((row) => [...row])],
      state: instance.state,
      score: instance.score,
      action: structuredClone(action),
    };
    if (outcome?.full_reset !== undefined) record.full_reset = outcome.full_reset;
    return record;
  }

  private syncPlay(instance: InstanceState): void {
    if (instance.card_id === undefined || instance.play === undefined) return;
    const play = this.cards.get(instance.card_id)?.plays[instance.play];
    if (!play) return;
    play.state = instance.state;
    play.score = instance.score;
    play.actions = instance.actions;
  }

  private requireCard(cardId: string): CardState {
    const card = this.cards.get(cardId);
    if (!card) throw new ValidationError(`card ${cardId} not found`, 404);
    return card;
  }
}

/** Totals cover only the plays of `gameId` when one is given. */
function summarize(cardId: string, card: CardState, gameId?: string): ScorecardSummary {
  const games: Record<string, GameScorecard> = {};
  for (const play of card.plays) {
    if (gameId !== undefined && play.game_id !== gameId) continue;
    const entry = games[play.game_id] ??= {
      game_id: play.game_id,
      total_plays: 0,
      total_actions: 0,
      scores: [],
      states: [],
      actions: [],
      outcomes: [],
      failures: 0,
    };
    entry.total_plays++;
    entry.total_actions += play.actions;
    entry.scores.push(play.score);
    entry.states.push(play.state);
    entry.actions.push(play.actions);
  }
  const all = Object.values(games);
  const summary: ScorecardSummary = {
    card_id: cardId,
    won: all.reduce((n, g) => n + g.states.filter((s) => s === "WIN").length, 0),
    played: all.reduce((n, g) => n + g.total_plays, 0),
    total_actions: all.reduce((n, g) => n + g.total_actions, 0),
    score: all.reduce((n, g) => n + Math.max(0, ...g.scores), 0),
    games,
  };
  if (card.source_url !== undefined) summary.source_url = card.source_url;
  if (card.tags !== undefined) summary.tags = card.tags;
  return summary;
}
