export type {
  JsonPrimitive,
  JsonValue,
  SimpleActionId,
  ComplexActionId,
  ActionId,
  ResetAction,
  SimpleAction,
  ComplexAction,
  GameAction,
  Grid,
  LifecycleState,
  SessionRecord,
  GameInfo,
  PlayStatus,
  CompletedPlayStatus,
  GameScorecard,
  ScorecardSummary,
  ScorecardConfig,
  ActionDispatcher,
  GameClient,
  LogLevel,
  Logger,
  PolicyContext,
  PlayOutcome,
  DecisionPolicy,
  PolicyFactoryContext,
  PolicyFactory,
  AggregateSummary,
  RecordingEntry,
} from "./types.js";
export {
  ACTION_IDS,
  SIMPLE_ACTION_IDS,
  COORDINATE_MIN,
  COORDINATE_MAX,
  reset,
  simple,
  complex,
  isActionId,
  isSimpleAction,
  isComplexAction,
  assertValidAction,
  actionFromName,
  sameAction,
  describeAction,
} from "./actions.js";
export {
  GameClientError,
  AuthError,
  ValidationError,
  ProtocolViolation,
  TransientNetworkError,
  CapacityError,
  ScorecardError,
  isBatchFatal,
  describeError,
} from "./errors.js";
export type { GameErrorCode, FailureScope } from "./errors.js";
export {
  validateActionData,
  validateSessionRecordData,
  validateFrameResponseData,
  validateScorecardData,
  validateOpenScorecardData,
  validateGameListData,
  validateRecordingEntryData,
  isGameAction,
  isSessionRecord,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { sleep } from "./timeout.js";
export { ConsoleLogger, parseLogLevel, silentLogger } from "./logger.js";
