import {
  AuthError,
  ScorecardError,
  describeError,
  isBatchFatal,
  silentLogger,
} from "@gridswarm/schemas";
import type {
  AggregateSummary,
  GameClient,
  Logger,
  PlayOutcome,
  PolicyContext,
  PolicyFactory,
  ScorecardConfig,
  ScorecardSummary,
} from "@gridswarm/schemas";
import { GameSession, runPlay } from "@gridswarm/kernel";
import { Recorder } from "@gridswarm/recorder";
import { ConcurrencyLimiter } from "./concurrency.js";
import { ScorecardAggregator } from "./scorecard-aggregator.js";

export const DEFAULT_MAX_ACTIONS = 80;

export interface SwarmOrchestratorConfig {
  client: GameClient;
  logger?: Logger;
  recordingsDir?: string;
  /** Write one recording per unit. Playback policies are never recorded. */
  record?: boolean;
  fsync?: boolean;
  /** Append the server's per-game scorecard to each unit's recording when it ends. */
  snapshotScorecards?: boolean;
  /** Records each session keeps in memory for its policy; unbounded when omitted. */
  historyLimit?: number;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Overrides every policy's own ceiling. */
  maxActions?: number;
  /** Caller-assigned instance ids, by unit index. */
  instanceIds?: readonly (string | undefined)[];
}

interface UnitResult {
  outcome: PlayOutcome;
  fatal?: unknown;
}

/**
 * Runs many (session, policy) units against one scorecard. The card is opened
 * before the first unit and closed once every launched unit has settled.
 */
export class SwarmOrchestrator {
  private client: GameClient;
  private logger: Logger;
  private recordingsDir: string;
  private record: boolean;
  private fsync: boolean;
  private snapshotScorecards: boolean;
  private historyLimit: number | undefined;

  constructor(config: SwarmOrchestratorConfig) {
    this.client = config.client;
    this.logger = config.logger ?? silentLogger;
    this.recordingsDir = config.recordingsDir ?? "recordings";
    this.record = config.record ?? true;
    this.fsync = config.fsync ?? false;
    this.snapshotScorecards = config.snapshotScorecards ?? true;
    if (config.historyLimit !== undefined && (!Number.isInteger(config.historyLimit) || config.historyLimit < 1)) {
      throw new RangeError(`historyLimit must be a positive integer (got ${config.historyLimit})`);
    }
    this.historyLimit = config.historyLimit;
  }

  async run(
    games: readonly string[],
    policyFactory: PolicyFactory,
    concurrencyLimit: number,
    cardConfig: ScorecardConfig = {},
    options: RunOptions = {},
  ): Promise<AggregateSummary> {
    const limiter = new ConcurrencyLimiter(concurrencyLimit);
    if (options.maxActions !== undefined && (!Number.isInteger(options.maxActions) || options.maxActions < 1)) {
      throw new RangeError(`maxActions must be a positive integer (got ${options.maxActions})`);
    }

    let cardId: string;
    try {
      cardId = await this.client.openScorecard(cardConfig.sourceUrl, cardConfig.tags);
    } catch (err) {
      if (err instanceof AuthError) throw err;
      throw new ScorecardError(`Could not open a scorecard: ${describeError(err).message}`, { cause: err });
    }
    this.logger.info(`Opened scorecard ${cardId} for ${games.length} plays, ${concurrencyLimit} at a time`);

    const aggregator = new ScorecardAggregator(cardId, cardConfig);
    const controller = new AbortController();
    const onExternalAbort = () => controller.abort();
    if (options.signal?.aborted) controller.abort();
    else options.signal?.addEventListener("abort", onExternalAbort, { once: true });

    let fatal: unknown;
    let skipped = 0;

    const units = games.map((gameId, index) =>
      limiter.run(async () => {
        if (controller.signal.aborted) {
          skipped++;
          return;
        }
        let result: UnitResult;
        try {
          result = await this.runUnit(gameId, index, cardId, policyFactory, controller.signal, options);
        } catch (err) {
          // the unit could not be set up; it still counts as a failed play
          const error = describeError(err);
          this.logger.error(`${gameId}#${index}: could not start: ${error.message}`);
          result = {
            outcome: {
              unit_id: `${gameId}#${index}`,
              game_id: gameId,
              policy: "unknown",
              status: "FAILED",
              state: "NOT_PLAYED",
              score: 0,
              actions: 0,
              error,
            },
            fatal: isBatchFatal(err) ? err : undefined,
          };
        }
        aggregator.add(result.outcome, index);
        if (result.fatal !== undefined && fatal === undefined) {
          fatal = result.fatal;
          this.logger.error(`Aborting batch: ${describeError(result.fatal).message}`);
          controller.abort();
        }
      }),
    );

    try {
      await Promise.all(units);
    } finally {
      options.signal?.removeEventListener("abort", onExternalAbort);
    }
    if (skipped > 0) this.logger.warn(`${skipped} of ${games.length} plays were not started`);

    let server: ScorecardSummary | null = null;
    try {
      server = await this.client.closeScorecard(cardId);
      this.logger.info(`Closed scorecard ${cardId}`);
    } catch (err) {
      if (fatal === undefined) {
        if (err instanceof AuthError) throw err;
        throw new ScorecardError(`Could not close scorecard ${cardId}: ${describeError(err).message}`, { cause: err });
      }
      this.logger.error(`Could not close scorecard ${cardId}`, { error: describeError(err).message });
    }

    const summary: AggregateSummary = {
      card_id: cardId,
      scorecard: aggregator.summary(),
      server,
      plays: aggregator.plays,
      max_in_flight: limiter.maxInFlight,
    };
    if (fatal !== undefined) summary.error = describeError(fatal);
    return summary;
  }

  private async runUnit(
    gameId: string,
    index: number,
    cardId: string,
    policyFactory: PolicyFactory,
    signal: AbortSignal,
    options: RunOptions,
  ): Promise<UnitResult> {
    const unitId = `${gameId}#${index}`;
    const policy = policyFactory({ game_id: gameId, card_id: cardId, index });

    const maxActions = options.maxActions ?? policy.maxActions ?? DEFAULT_MAX_ACTIONS;
    const instanceId = options.instanceIds?.[index];
    const recorder = this.record && !policy.isPlayback
      ? new Recorder({
          dir: this.recordingsDir,
          gameId,
          policy: policy.name,
          maxActions,
          instanceId,
          fsync: this.fsync,
          logger: this.logger,
        })
      : undefined;
    const session = new GameSession({
      gameId,
      client: this.client,
      cardId,
      instanceId,
      maxActions,
      recorder,
      logger: this.logger,
      historyLimit: this.historyLimit,
    });
    const context: PolicyContext = {
      game_id: gameId,
      card_id: cardId,
      logger: this.logger,
      annotate: async (entry) => {
        await recorder?.note(entry);
      },
    };

    let result: UnitResult;
    try {
      result = { outcome: await runPlay({ unitId, session, policy, context, logger: this.logger, signal }) };
    } catch (err) {
      const outcome: PlayOutcome = {
        unit_id: unitId,
        game_id: gameId,
        policy: policy.name,
        status: "FAILED",
        state: session.state,
        score: session.score,
        actions: session.actionCounter,
        error: describeError(err),
      };
      if (session.instanceId !== undefined) outcome.instance_id = session.instanceId;
      result = { outcome, fatal: err };
    }

    if (recorder) {
      if (this.snapshotScorecards && result.fatal === undefined && session.actionCounter > 0) {
        try {
          const scorecard = await this.client.getScorecard(cardId, gameId);
          await recorder.note({ scorecard });
        } catch (err) {
          this.logger.warn(`${unitId}: could not snapshot the scorecard`, { error: describeError(err).message });
        }
      }
      try {
        await recorder.close();
      } catch (err) {
        this.logger.warn(`${unitId}: could not close the recording`, { error: describeError(err).message });
      }
      if (recorder.path !== undefined) result.outcome.recording = recorder.path;
    }

    this.logger.info(`${unitId} finished: ${result.outcome.status}`, {
      state: result.outcome.state,
      score: result.outcome.score,
      actions: result.outcome.actions,
    });
    return result;
  }
}
