import { AuthError, describeAction, describeError, silentLogger } from "@gridswarm/schemas";
import type {
  DecisionPolicy,
  Logger,
  PlayOutcome,
  PlayStatus,
  PolicyContext,
} from "@gridswarm/schemas";
import type { GameSession } from "./session.js";

export interface RunPlayOptions {
  unitId: string;
  session: GameSession;
  policy: DecisionPolicy;
  context: PolicyContext;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Drive one session with one policy until the policy is done, the local
 * ceiling is hit, the batch is aborted or something throws. The policy's
 * cleanup hook runs exactly once on every path. An AuthError is rethrown
 * after cleanup; every other failure becomes a FAILED outcome.
 */
export async function runPlay(options: RunPlayOptions): Promise<PlayOutcome> {
  const { unitId, session, policy, context, signal } = options;
  const logger = options.logger ?? silentLogger;
  let status: PlayStatus;
  let error: PlayOutcome["error"];
  let fatal: unknown;

  try {
    await policy.prepare?.(context);
    status = await loop(session, policy, logger, signal);
  } catch (err) {
    status = "FAILED";
    error = describeError(err);
    if (err instanceof AuthError) fatal = err;
    logger.error(`${session.gameId} failed after ${session.actionCounter} actions: ${error.message}`, { code: error.code });
    try {
      await context.annotate({ error, actions: session.actionCounter });
    } catch (annotateErr) {
      logger.warn("Could not write the failure to the recording", { error: describeError(annotateErr).message });
    }
  }

  const outcome: PlayOutcome = {
    unit_id: unitId,
    game_id: session.gameId,
    policy: policy.name,
    status,
    state: session.state,
    score: session.score,
    actions: session.actionCounter,
  };
  if (session.instanceId !== undefined) outcome.instance_id = session.instanceId;
  if (error) outcome.error = error;

  try {
    await policy.cleanup?.(context, outcome);
  } catch (cleanupErr) {
    logger.warn(`Cleanup of ${policy.name} failed`, { error: describeError(cleanupErr).message });
  }

  if (fatal !== undefined) throw fatal;
  return outcome;
}

async function loop(
  session: GameSession,
  policy: DecisionPolicy,
  logger: Logger,
  signal: AbortSignal | undefined,
): Promise<PlayStatus> {
  for (;;) {
    if (signal?.aborted) return "ABORTED";
    if (policy.isDone(session.history, session.latest)) {
      const state = session.state;
      return state === "WIN" || state === "GAME_OVER" ? state : "POLICY_DONE";
    }
    if (session.ceilingReached) {
      logger.info(`${session.gameId} reached the local ceiling of ${session.maxActions} actions`);
      return "LOCAL_CEILING";
    }
    const action = await policy.chooseAction(session.history, session.latest);
    // the batch may have been cancelled while the policy was thinking
    if (signal?.aborted) return "ABORTED";
    await session.apply(action);
    logger.info(
      `${session.gameId} - ${describeAction(action)}: count ${session.playActionCount}, score ${session.score}, avg fps ${session.fps.toFixed(2)}`,
    );
  }
}
