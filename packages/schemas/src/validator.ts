import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { GameActionSchema, SessionRecordSchema, FrameResponseSchema } from "./game-action.schema.js";
import { ScorecardSchema, OpenScorecardResponseSchema, GameListSchema } from "./scorecard.schema.js";
import { RecordingEntrySchema } from "./recording-entry.schema.js";
import type { GameAction, SessionRecord } from "./types.js";

// Both packages are CommonJS; under NodeNext the default import is module.exports
// and the class / plugin sit on its `.default`.
const ajv = new Ajv.default({ allErrors: true, strict: false });
addFormats.default(ajv);

const validateAction = ajv.compile(GameActionSchema);
const validateSessionRecord = ajv.compile(SessionRecordSchema);
const validateFrameResponse = ajv.compile(FrameResponseSchema);
const validateScorecard = ajv.compile(ScorecardSchema);
const validateOpenScorecard = ajv.compile(OpenScorecardResponseSchema);
const validateGameList = ajv.compile(GameListSchema);
const validateRecordingEntry = ajv.compile(RecordingEntrySchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

function run(validate: ValidateFunction, data: unknown): ValidationResult {
  const valid = validate(data);
  return toResult(valid, validate.errors);
}

export function validateActionData(data: unknown): ValidationResult {
  return run(validateAction, data);
}

export function validateSessionRecordData(data: unknown): ValidationResult {
  return run(validateSessionRecord, data);
}

export function validateFrameResponseData(data: unknown): ValidationResult {
  return run(validateFrameResponse, data);
}

export function validateScorecardData(data: unknown): ValidationResult {
  return run(validateScorecard, data);
}

export function validateOpenScorecardData(data: unknown): ValidationResult {
  return run(validateOpenScorecard, data);
}

export function validateGameListData(data: unknown): ValidationResult {
  return run(validateGameList, data);
}

export function validateRecordingEntryData(data: unknown): ValidationResult {
  return run(validateRecordingEntry, data);
}

export function isGameAction(data: unknown): data is GameAction {
  return validateAction(data);
}

export function isSessionRecord(data: unknown): data is SessionRecord {
  return validateSessionRecord(data);
}
