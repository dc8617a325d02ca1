export { ArenaClient, parseScorecard } from "./arena-client.js";
export type { ArenaClientConfig } from "./arena-client.js";
export {
  withRetry,
  isTransientError,
  backoffDelay,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
} from "./retry.js";
export type { RetryOptions } from "./retry.js";
