import type {
  GameScorecard,
  PlayOutcome,
  ScorecardConfig,
  ScorecardSummary,
} from "@gridswarm/schemas";

/**
 * Client-side view of one scorecard, built from unit outcomes as they arrive.
 * Owned by the orchestrator; `add` is synchronous so concurrent units never
 * interleave inside an update. Outcomes are kept at their play index, so the
 * per-game lists follow launch order whatever order the plays finish in.
 */
export class ScorecardAggregator {
  readonly cardId: string;
  private config: ScorecardConfig;
  private slots: (PlayOutcome | undefined)[] = [];

  constructor(cardId: string, config: ScorecardConfig = {}) {
    this.cardId = cardId;
    this.config = config;
  }

  /** Store `outcome` at play `index`; without one it takes the next free slot. */
  add(outcome: PlayOutcome, index?: number): void {
    const slot = index ?? this.slots.length;
    if (!Number.isInteger(slot) || slot < 0) {
      throw new RangeError(`Play index must be a non-negative integer (got ${slot})`);
    }
    if (this.slots[slot] !== undefined) {
      throw new RangeError(`Play ${slot} was already recorded`);
    }
    this.slots[slot] = outcome;
  }

  /** Outcomes in play order. */
  get plays(): PlayOutcome[] {
    return this.slots.filter((outcome): outcome is PlayOutcome => outcome !== undefined);
  }

  summary(): ScorecardSummary {
    const games: Record<string, GameScorecard> = {};
    for (const outcome of this.plays) {
      const entry = games[outcome.game_id] ??= {
        game_id: outcome.game_id,
        total_plays: 0,
        total_actions: 0,
        scores: [],
        states: [],
        actions: [],
        outcomes: [],
        failures: 0,
      };
      entry.total_plays++;
      entry.total_actions += outcome.actions;
      if (outcome.status === "FAILED") {
        // a crashed play has no trustworthy final state
        entry.failures++;
        continue;
      }
      entry.scores.push(outcome.score);
      entry.states.push(outcome.state);
      entry.actions.push(outcome.actions);
      entry.outcomes.push(outcome.status);
    }

    let won = 0;
    let played = 0;
    let totalActions = 0;
    let score = 0;
    for (const entry of Object.values(games)) {
      won += entry.states.filter((s) => s === "WIN").length;
      played += entry.total_plays;
      totalActions += entry.total_actions;
      score += entry.scores.length > 0 ? Math.max(...entry.scores) : 0;
    }
    const summary: ScorecardSummary = {
      card_id: this.cardId,
      won,
      played,
      total_actions: totalActions,
      score,
      games,
    };
    if (this.config.sourceUrl !== undefined) summary.source_url = this.config.sourceUrl;
    if (this.config.tags !== undefined) summary.tags = [...this.config.tags];
    return summary;
  }
}
