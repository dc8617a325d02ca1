import { ValidationError, silentLogger } from "@gridswarm/schemas";
import type {
  AggregateSummary,
  GameAction,
  GameClient,
  GameInfo,
  Logger,
  PlayOutcome,
  ScorecardSummary,
} from "@gridswarm/schemas";
import { GameSession, runPlay } from "@gridswarm/kernel";
import {
  PlaybackPolicy,
  ReplayClient,
  parseRecordingFileName,
  readRecording,
  recordedSteps,
} from "@gridswarm/recorder";
import { SwarmOrchestrator } from "@gridswarm/swarm";
import { createPolicyFactory } from "@gridswarm/policies";
import type { CreateMessage } from "@gridswarm/policies";

/** Games whose id starts with one of the prefixes; every game when none are given. */
export function selectGames(games: readonly GameInfo[], prefixes: readonly string[]): string[] {
  const ids = games.map((game) => game.game_id);
  if (prefixes.length === 0) return ids;
  return ids.filter((id) => prefixes.some((prefix) => id.startsWith(prefix)));
}

export function splitList(value: string | undefined): string[] {
  return (value ?? "").split(",").map((part) => part.trim()).filter((part) => part !== "");
}

export interface BatchOptions {
  client: GameClient;
  policy: string;
  gamePrefixes?: readonly string[];
  concurrency: number;
  maxActions?: number;
  tags?: string[];
  sourceUrl?: string;
  record: boolean;
  recordingsDir: string;
  historyLimit?: number;
  script?: readonly GameAction[];
  apiKey?: string;
  model?: string;
  createMessage?: CreateMessage;
  logger?: Logger;
  signal?: AbortSignal;
}

/** List and filter games, then play each one once with the named policy. */
export async function runBatch(options: BatchOptions): Promise<AggregateSummary> {
  const logger = options.logger ?? silentLogger;
  const listed = await options.client.listGames();
  let games = selectGames(listed, options.gamePrefixes ?? []);

  const recording = parseRecordingFileName(options.policy);
  if (recording) {
    // a recording only plays back on its own game
    games = games.includes(recording.game_id) || listed.length === 0 ? [recording.game_id] : [];
  }
  if (games.length === 0) {
    throw new ValidationError(`No games to play (${listed.length} listed, prefixes: ${(options.gamePrefixes ?? []).join(", ") || "none"})`);
  }
  logger.info(`Playing ${games.length} game(s) with ${options.policy}`, { games });

  const factory = await createPolicyFactory(options.policy, {
    apiKey: options.apiKey,
    model: options.model,
    createMessage: options.createMessage,
    script: options.script,
    logger,
    recordingsDir: options.recordingsDir,
  });
  const orchestrator = new SwarmOrchestrator({
    client: options.client,
    logger,
    recordingsDir: options.recordingsDir,
    record: options.record,
    historyLimit: options.historyLimit,
  });
  return orchestrator.run(
    games,
    factory,
    options.concurrency,
    { sourceUrl: options.sourceUrl, tags: options.tags },
    { signal: options.signal, maxActions: options.maxActions },
  );
}

export function formatScorecard(card: ScorecardSummary): string[] {
  const lines = [
    `Scorecard ${card.card_id}: won ${card.won}/${card.played}, score ${card.score}, ${card.total_actions} actions`,
  ];
  for (const game of Object.values(card.games)) {
    const failures = game.failures > 0 ? `, ${game.failures} failed` : "";
    lines.push(
      `  ${game.game_id}: ${game.total_plays} play(s), scores [${game.scores.join(", ")}], states [${game.states.join(", ")}]${failures}`,
    );
  }
  return lines;
}

export function formatSummary(summary: AggregateSummary): string[] {
  const lines = summary.plays.map(formatPlay);
  lines.push(...formatScorecard(summary.server ?? summary.scorecard));
  if (summary.error) lines.push(`Batch stopped: ${summary.error.code}: ${summary.error.message}`);
  return lines;
}

function formatPlay(play: PlayOutcome): string {
  const error = play.error ? ` (${play.error.message})` : "";
  return `${play.unit_id} ${play.policy}: ${play.status}, state ${play.state}, score ${play.score}, ${play.actions} actions${error}`;
}

export interface ReplayResult {
  outcome: PlayOutcome;
  replayed: number;
  recorded: number;
}

/**
 * Reproduce a recording offline: its actions are proposed by a playback
 * policy and answered by the recorded responses.
 */
export async function replayRecording(path: string, logger: Logger = silentLogger): Promise<ReplayResult> {
  const steps = recordedSteps(await readRecording(path, logger));
  const first = steps[0];
  if (!first) throw new ValidationError(`Recording ${path} holds no actions`);

  const replay = new ReplayClient(steps);
  const policy = new PlaybackPolicy(steps, { name: "replay", logger });
  const session = new GameSession({ gameId: first.game_id, client: replay, maxActions: steps.length, logger });
  const outcome = await runPlay({
    unitId: `${first.game_id}#replay`,
    session,
    policy,
    logger,
    context: { game_id: first.game_id, card_id: "offline", logger, annotate: async () => {} },
  });
  if (outcome.status !== "FAILED" && !replay.exhausted) {
    logger.warn(`Replay stopped at step ${replay.position} of ${steps.length}`);
  }
  return { outcome, replayed: replay.position, recorded: steps.length };
}
