import {
  AuthError,
  CapacityError,
  TransientNetworkError,
  ValidationError,
  assertValidAction,
  isComplexAction,
  silentLogger,
  validateFrameResponseData,
  validateGameListData,
  validateOpenScorecardData,
  validateScorecardData,
} from "@gridswarm/schemas";
import type {
  GameAction,
  GameClient,
  GameInfo,
  GameScorecard,
  LifecycleState,
  Logger,
  ScorecardSummary,
  SessionRecord,
} from "@gridswarm/schemas";
import { withRetry, DEFAULT_MAX_ATTEMPTS, DEFAULT_BASE_DELAY_MS, DEFAULT_MAX_DELAY_MS } from "./retry.js";

export interface ArenaClientConfig {
  rootUrl: string;
  apiKey: string;
  /** Per-request timeout; expiry counts as a transient failure. */
  timeoutMs?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const CAPACITY_PATTERN = /instance limit|too many (concurrent )?instances|max(imum)? (concurrent )?instances/i;

/** Authenticated client for the game service's REST surface. */
export class ArenaClient implements GameClient {
  private rootUrl: string;
  private apiKey: string;
  private timeoutMs: number;
  private maxAttempts: number;
  private baseDelayMs: number;
  private maxDelayMs: number;
  private logger: Logger;
  private sleep?: (ms: number) => Promise<void>;

  constructor(config: ArenaClientConfig) {
    this.rootUrl = config.rootUrl.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.maxAttempts = config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.baseDelayMs = config.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.maxDelayMs = config.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.logger = config.logger ?? silentLogger;
    this.sleep = config.sleep;
  }

  async listGames(): Promise<GameInfo[]> {
    const data = await this.request("GET", "/api/games");
    const check = validateGameListData(data);
    if (!check.valid || !Array.isArray(data)) {
      throw new ValidationError(`Malformed game list: ${check.errors.join(", ")}`);
    }
    return data.map((g: { game_id: string; title?: string }) => ({ game_id: g.game_id, title: g.title ?? g.game_id }));
  }

  async openScorecard(sourceUrl?: string, tags?: string[]): Promise<string> {
    const body: Record<string, unknown> = {};
    if (sourceUrl) body.source_url = sourceUrl;
    if (tags && tags.length > 0) body.tags = tags;
    const data = await this.request("POST", "/api/scorecard/open", body);
    const check = validateOpenScorecardData(data);
    if (!check.valid || !isRecord(data) || typeof data.card_id !== "string") {
      throw new ValidationError(`Malformed scorecard open response: ${check.errors.join(", ")}`);
    }
    return data.card_id;
  }

  async closeScorecard(cardId: string): Promise<ScorecardSummary> {
    const data = await this.request("POST", "/api/scorecard/close", { card_id: cardId });
    return parseScorecard(data);
  }

  async getScorecard(cardId: string, gameId?: string): Promise<ScorecardSummary> {
    const path = gameId
      ? `/api/scorecard/${encodeURIComponent(cardId)}/${encodeURIComponent(gameId)}`
      : `/api/scorecard/${encodeURIComponent(cardId)}`;
    const data = await this.request("GET", path);
    return parseScorecard(data);
  }

  async dispatch(action: GameAction, gameId: string, instanceId?: string, cardId?: string): Promise<SessionRecord> {
    assertValidAction(action);
    if (action.id !== "RESET" && !instanceId) {
      throw new ValidationError(`${action.id} requires an instance id`);
    }
    const body: Record<string, unknown> = { game_id: gameId };
    if (action.id === "RESET" && cardId) body.card_id = cardId;
    if (instanceId) body.guid = instanceId;
    if (isComplexAction(action)) {
      body.x = action.x;
      body.y = action.y;
    }
    if (action.reasoning !== undefined) body.reasoning = action.reasoning;

    const data = await this.request("POST", `/api/cmd/${action.id}`, body);
    const check = validateFrameResponseData(data);
    if (!check.valid || !isFrameResponse(data)) {
      throw new ValidationError(`Malformed ${action.id} response: ${check.errors.join(", ")}`);
    }
    const record: SessionRecord = {
      game_id: data.game_id,
      instance_id: data.guid,
      frames: data.frame,
      state: data.state,
      score: data.score,
      action: cloneAction(action),
    };
    if (data.full_reset !== undefined) record.full_reset = data.full_reset;
    return record;
  }

  private async request(method: "GET" | "POST", path: string, body?: Record<string, unknown>): Promise<unknown> {
    const url = `${this.rootUrl}${path}`;
    return withRetry(() => this.send(method, url, body), {
      maxAttempts: this.maxAttempts,
      baseDelayMs: this.baseDelayMs,
      maxDelayMs: this.maxDelayMs,
      sleep: this.sleep,
      onRetry: (err, attempt, delayMs) => {
        this.logger.warn(`${method} ${path} failed, retry ${attempt}/${this.maxAttempts - 1} in ${delayMs}ms`, {
          error: err instanceof Error ? err.message : String(err),
        });
      },
    });
  }

  private async send(method: "GET" | "POST", url: string, body?: Record<string, unknown>): Promise<unknown> {
    const headers: Record<string, string> = {
      "X-API-Key": this.apiKey,
      Accept: "application/json",
    };
    if (body !== undefined) headers["Content-Type"] = "application/json";

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });
      text = await response.text();
    } catch (err) {
      const isAbort = err instanceof Error && err.name === "AbortError";
      const message = isAbort
        ? `Request timed out after ${this.timeoutMs}ms`
        : err instanceof Error ? err.message : String(err);
      throw new TransientNetworkError(`${method} ${url}: ${message}`, { status: isAbort ? 408 : 0, cause: err });
    } finally {
      clearTimeout(timer);
    }

    const payload = parseJson(text);
    const serverError = isRecord(payload) && payload.error !== undefined ? stringifyError(payload.error) : undefined;

    if (!response.ok) {
      throw classifyFailure(method, url, response.status, serverError ?? (text.slice(0, 200) || response.statusText));
    }
    if (serverError !== undefined) {
      // The service reports rejected commands as 200 with an `error` field.
      if (CAPACITY_PATTERN.test(serverError)) {
        throw new CapacityError(`${method} ${url}: ${serverError}`, response.status);
      }
      throw new ValidationError(`${method} ${url}: ${serverError}`, response.status);
    }
    if (payload === undefined) {
      throw new ValidationError(`${method} ${url}: response is not JSON`, response.status);
    }
    return payload;
  }
}

function classifyFailure(method: string, url: string, status: number, detail: string): Error {
  const message = `${method} ${url} → ${status}: ${detail}`;
  if (status === 401 || status === 403) return new AuthError(message, status);
  if (status === 409 || CAPACITY_PATTERN.test(detail)) return new CapacityError(message, status);
  if (status === 408 || status === 425 || status === 429 || status >= 500) {
    return new TransientNetworkError(message, { status });
  }
  return new ValidationError(message, status);
}

interface FrameResponse {
  game_id: string;
  guid: string;
  frame: number[][][];
  state: LifecycleState;
  score: number;
  full_reset?: boolean;
}

function isFrameResponse(data: unknown): data is FrameResponse {
  return isRecord(data) && typeof data.game_id === "string" && typeof data.guid === "string" && Array.isArray(data.frame);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
  if (text.trim() === "") return undefined;
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}

function stringifyError(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function cloneAction(action: GameAction): GameAction {
  // reasoning is copied verbatim, detached from the caller's object
  return structuredClone(action);
}

/** Normalize a service scorecard into the client-side summary shape. */
export function parseScorecard(data: unknown): ScorecardSummary {
  const check = validateScorecardData(data);
  if (!check.valid || !isRecord(data)) {
    throw new ValidationError(`Malformed scorecard: ${check.errors.join(", ")}`);
  }
  const games: Record<string, GameScorecard> = {};
  const rawGames = isRecord(data.games) ? data.games : {};
  for (const [gameId, raw] of Object.entries(rawGames)) {
    if (!isRecord(raw)) continue;
    games[gameId] = {
      game_id: typeof raw.game_id === "string" ? raw.game_id : gameId,
      total_plays: Number(raw.total_plays),
      total_actions: Number(raw.total_actions),
      scores: numberList(raw.scores),
      states: stateList(raw.states),
      actions: numberList(raw.actions),
      outcomes: [],
      failures: typeof raw.failures === "number" ? raw.failures : 0,
    };
  }
  const summary: ScorecardSummary = {
    card_id: String(data.card_id),
    won: Number(data.won),
    played: Number(data.played),
    total_actions: Number(data.total_actions),
    score: Number(data.score),
    games,
  };
  if (typeof data.source_url === "string") summary.source_url = data.source_url;
  if (Array.isArray(data.tags)) summary.tags = data.tags.filter((t): t is string => typeof t === "string");
  return summary;
}

function numberList(value: unknown): number[] {
  return Array.isArray(value) ? value.filter((v): v is number => typeof v === "number") : [];
}

const STATES: readonly string[] = ["NOT_PLAYED", "NOT_FINISHED", "WIN", "GAME_OVER"];

function stateList(value: unknown): LifecycleState[] {
  return Array.isArray(value)
    ? value.filter((v): v is LifecycleState => typeof v === "string" && STATES.includes(v))
    : [];
}
