const GameScorecardSchema = {
  type: "object",
  required: ["total_plays", "total_actions", "scores", "states", "actions"],
  properties: {
    game_id: { type: "string" },
    total_plays: { type: "integer", minimum: 0 },
    total_actions: { type: "integer", minimum: 0 },
    scores: { type: "array", items: { type: "integer", minimum: 0 } },
    states: {
      type: "array",
      items: { type: "string", enum: ["NOT_PLAYED", "NOT_FINISHED", "WIN", "GAME_OVER"] },
    },
    actions: { type: "array", items: { type: "integer", minimum: 0 } },
    outcomes: { type: "array", items: { type: "string" } },
    failures: { type: "integer", minimum: 0 },
  },
} as const;

export const ScorecardSchema = {
  type: "object",
  required: ["card_id", "won", "played", "total_actions", "score"],
  properties: {
    card_id: { type: "string", minLength: 1 },
    won: { type: "integer", minimum: 0 },
    played: { type: "integer", minimum: 0 },
    total_actions: { type: "integer", minimum: 0 },
    score: { type: "integer", minimum: 0 },
    source_url: { type: "string" },
    tags: { type: "array", items: { type: "string" } },
    games: { type: "object", additionalProperties: GameScorecardSchema },
  },
} as const;

export const OpenScorecardResponseSchema = {
  type: "object",
  required: ["card_id"],
  properties: {
    card_id: { type: "string", minLength: 1 },
  },
} as const;

export const GameListSchema = {
  type: "array",
  items: {
    type: "object",
    required: ["game_id"],
    properties: {
      game_id: { type: "string", minLength: 1 },
      title: { type: "string" },
    },
  },
} as const;
