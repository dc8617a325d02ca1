export const RecordingEntrySchema = {
  type: "object",
  required: ["timestamp", "data"],
  properties: {
    timestamp: { type: "string", format: "date-time" },
    data: {},
  },
  additionalProperties: false,
} as const;
