/**
 * Error taxonomy for driving game sessions.
 *
 * `fatalTo` tells the orchestrator how far a failure reaches: a "batch" error
 * stops every unit, a "unit" error ends only the play that raised it.
 */

export type GameErrorCode =
  | "AUTH"
  | "VALIDATION"
  | "PROTOCOL_VIOLATION"
  | "TRANSIENT"
  | "CAPACITY"
  | "SCORECARD";

export type FailureScope = "batch" | "unit";

export class GameClientError extends Error {
  readonly code: GameErrorCode;
  readonly fatalTo: FailureScope;
  readonly status?: number;

  constructor(code: GameErrorCode, message: string, options?: { fatalTo?: FailureScope; status?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "GameClientError";
    this.code = code;
    this.fatalTo = options?.fatalTo ?? "unit";
    this.status = options?.status;
  }
}

/** Missing or rejected API key. Never retried; aborts the whole batch. */
export class AuthError extends GameClientError {
  constructor(message: string, status?: number) {
    super("AUTH", message, { fatalTo: "batch", status });
    this.name = "AuthError";
  }
}

/** Malformed action or response. Never retried. */
export class ValidationError extends GameClientError {
  constructor(message: string, status?: number, code: GameErrorCode = "VALIDATION") {
    super(code, message, { status });
    this.name = "ValidationError";
  }
}

/** An action the session protocol forbids in the current state. No request is sent. */
export class ProtocolViolation extends ValidationError {
  constructor(message: string) {
    super(message, undefined, "PROTOCOL_VIOLATION");
    this.name = "ProtocolViolation";
  }
}

/** Timeout, 5xx, rate limit or network failure, after retries ran out. */
export class TransientNetworkError extends GameClientError {
  readonly attempts: number;

  constructor(message: string, options?: { status?: number; attempts?: number; cause?: unknown }) {
    super("TRANSIENT", message, { status: options?.status, cause: options?.cause });
    this.name = "TransientNetworkError";
    this.attempts = options?.attempts ?? 1;
  }
}

/** The service refused a new instance because the per-key concurrency cap is reached. */
export class CapacityError extends GameClientError {
  constructor(message: string, status?: number) {
    super("CAPACITY", message, { status });
    this.name = "CapacityError";
  }
}

/** Opening, reading or closing the scorecard failed. */
export class ScorecardError extends GameClientError {
  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super("SCORECARD", message, { fatalTo: "batch", status: options?.status, cause: options?.cause });
    this.name = "ScorecardError";
  }
}

export function isBatchFatal(err: unknown): boolean {
  return err instanceof GameClientError && err.fatalTo === "batch";
}

export function describeError(err: unknown): { code: string; message: string } {
  if (err instanceof GameClientError) return { code: err.code, message: err.message };
  if (err instanceof Error) return { code: err.name, message: err.message };
  return { code: "UNKNOWN", message: String(err) };
}
