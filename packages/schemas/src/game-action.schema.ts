export const GridSchema = {
  type: "array",
  items: {
    type: "array",
    items: { type: "integer", minimum: 0, maximum: 15 },
  },
} as const;

export const GameActionSchema = {
  type: "object",
  required: ["id"],
  properties: {
    id: {
      type: "string",
      enum: ["RESET", "ACTION1", "ACTION2", "ACTION3", "ACTION4", "ACTION5", "ACTION6"],
    },
    x: { type: "integer", minimum: 0, maximum: 63 },
    y: { type: "integer", minimum: 0, maximum: 63 },
    reasoning: {},
  },
  if: { properties: { id: { const: "ACTION6" } } },
  then: { required: ["x", "y"] },
  additionalProperties: false,
} as const;

const LIFECYCLE_STATES = ["NOT_PLAYED", "NOT_FINISHED", "WIN", "GAME_OVER"] as const;

/** A SessionRecord as persisted in recordings. */
export const SessionRecordSchema = {
  type: "object",
  required: ["game_id", "instance_id", "frames", "state", "score", "action"],
  properties: {
    game_id: { type: "string", minLength: 1 },
    instance_id: { type: "string", minLength: 1 },
    frames: { type: "array", minItems: 1, items: GridSchema },
    state: { type: "string", enum: LIFECYCLE_STATES },
    score: { type: "integer", minimum: 0, maximum: 254 },
    action: GameActionSchema,
    full_reset: { type: "boolean" },
  },
  additionalProperties: false,
} as const;

/** The service's reply to /api/cmd/*. Extra fields are tolerated. */
export const FrameResponseSchema = {
  type: "object",
  required: ["game_id", "guid", "frame", "state", "score"],
  properties: {
    game_id: { type: "string", minLength: 1 },
    guid: { type: "string", minLength: 1 },
    frame: { type: "array", minItems: 1, items: GridSchema },
    state: { type: "string", enum: LIFECYCLE_STATES },
    score: { type: "integer", minimum: 0, maximum: 254 },
    full_reset: { type: "boolean" },
  },
} as const;
