export { SwarmOrchestrator, DEFAULT_MAX_ACTIONS } from "./orchestrator.js";
export type { SwarmOrchestratorConfig, RunOptions } from "./orchestrator.js";
export { ConcurrencyLimiter } from "./concurrency.js";
export { ScorecardAggregator } from "./scorecard-aggregator.js";
