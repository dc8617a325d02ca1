import type {
  ActionId,
  ComplexAction,
  GameAction,
  JsonValue,
  ResetAction,
  SimpleAction,
  SimpleActionId,
} from "./types.js";
import { ValidationError } from "./errors.js";

export const ACTION_IDS: readonly ActionId[] = [
  "RESET", "ACTION1", "ACTION2", "ACTION3", "ACTION4", "ACTION5", "ACTION6",
];

export const SIMPLE_ACTION_IDS: readonly SimpleActionId[] = [
  "ACTION1", "ACTION2", "ACTION3", "ACTION4", "ACTION5",
];

export const COORDINATE_MIN = 0;
export const COORDINATE_MAX = 63;

export function reset(reasoning?: JsonValue): ResetAction {
  return reasoning === undefined ? { id: "RESET" } : { id: "RESET", reasoning };
}

/** `simple(3)` is ACTION3. */
export function simple(n: 1 | 2 | 3 | 4 | 5, reasoning?: JsonValue): SimpleAction {
  const id = `ACTION${n}` as const;
  return reasoning === undefined ? { id } : { id, reasoning };
}

export function complex(x: number, y: number, reasoning?: JsonValue): ComplexAction {
  const action: ComplexAction = { id: "ACTION6", x, y };
  if (reasoning !== undefined) action.reasoning = reasoning;
  assertValidAction(action);
  return action;
}

export function isActionId(value: unknown): value is ActionId {
  return typeof value === "string" && (ACTION_IDS as readonly string[]).includes(value);
}

export function isSimpleAction(action: GameAction): action is SimpleAction {
  return (SIMPLE_ACTION_IDS as readonly string[]).includes(action.id);
}

export function isComplexAction(action: GameAction): action is ComplexAction {
  return action.id === "ACTION6";
}

function isCoordinate(value: unknown): value is number {
  return typeof value === "number"
    && Number.isInteger(value)
    && value >= COORDINATE_MIN
    && value <= COORDINATE_MAX;
}

export function assertValidAction(action: GameAction): void {
  if (!isActionId(action.id)) {
    throw new ValidationError(`Unknown action "${String(action.id)}"`);
  }
  if (isComplexAction(action)) {
    if (!isCoordinate(action.x) || !isCoordinate(action.y)) {
      throw new ValidationError(
        `${action.id} coordinates must be integers in [${COORDINATE_MIN}, ${COORDINATE_MAX}] (got x=${String(action.x)}, y=${String(action.y)})`,
      );
    }
  }
}

/**
 * Build an action from its wire name and loosely-typed arguments, as produced
 * by a model tool call or a recording. Coordinates may arrive as numeric strings.
 */
export function actionFromName(name: string, data: Record<string, unknown> = {}, reasoning?: JsonValue): GameAction {
  const id = name.trim().toUpperCase();
  if (!isActionId(id)) {
    throw new ValidationError(`Unknown action "${name}"`);
  }
  const action: GameAction = id === "ACTION6"
    ? { id, x: toCoordinate(data.x), y: toCoordinate(data.y) }
    : { id };
  if (reasoning !== undefined) action.reasoning = reasoning;
  assertValidAction(action);
  return action;
}

function toCoordinate(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return Number.NaN;
}

/** Two actions are the same if id, coordinates and annotation all match. */
export function sameAction(a: GameAction, b: GameAction): boolean {
  if (a.id !== b.id) return false;
  if (isComplexAction(a) && isComplexAction(b) && (a.x !== b.x || a.y !== b.y)) return false;
  return JSON.stringify(a.reasoning ?? null) === JSON.stringify(b.reasoning ?? null);
}

export function describeAction(action: GameAction): string {
  return isComplexAction(action) ? `${action.id}(${action.x},${action.y})` : action.id;
}
