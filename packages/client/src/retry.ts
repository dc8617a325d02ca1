import { GameClientError, TransientNetworkError, sleep } from "@gridswarm/schemas";

export interface RetryOptions {
  /** Total attempts, including the first. */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Injected for tests; defaults to a real timer. */
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export const DEFAULT_MAX_ATTEMPTS = 4;
export const DEFAULT_BASE_DELAY_MS = 250;
export const DEFAULT_MAX_DELAY_MS = 4000;

export function isTransientError(err: unknown): boolean {
  if (err instanceof TransientNetworkError) return true;
  // classified failures (auth, validation, capacity) are final whatever their status
  if (err instanceof GameClientError) return false;
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();
  if (msg.includes("econnreset") || msg.includes("econnrefused") || msg.includes("etimedout") || msg.includes("fetch failed") || msg.includes("socket hang up")) return true;
  // HTTP 5xx or 429 from SDK errors
  if ("status" in err && typeof err.status === "number") {
    return err.status === 429 || err.status >= 500;
  }
  return false;
}

/** Exponential backoff with jitter in [50%, 100%] of the capped delay. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number, random: () => number = Math.random): number {
  const capped = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt));
  return Math.round(capped * (0.5 + random() * 0.5));
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const wait = options.sleep ?? ((ms: number) => sleep(ms));
  let lastError: unknown;
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt < maxAttempts - 1 && isTransientError(err)) {
        const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs, options.random);
        options.onRetry?.(err, attempt + 1, delay);
        await wait(delay);
        continue;
      }
      break;
    }
  }
  if (lastError instanceof TransientNetworkError) {
    throw new TransientNetworkError(`${lastError.message} (gave up after ${maxAttempts} attempts)`, {
      status: lastError.status,
      attempts: maxAttempts,
      cause: lastError,
    });
  }
  throw lastError;
}
