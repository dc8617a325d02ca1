import type { SessionRecord } from "@gridswarm/schemas";

export const SYSTEM_PROMPT = `# CONTEXT:
You are an agent playing a turn-based grid game. Your objective is to reach WIN
and avoid GAME_OVER while using as few actions as possible.

One action produces one frame. A frame is one or more sequential grids. Each grid
is a matrix of up to 64 by 64 cells holding integers from 0 to 15.

# TURN:
Call exactly one action tool per turn.`;

export const OBSERVE_PROMPT =
  "Reply with a few sentences of plain-text strategy observation about the frame to inform your next action.";

export const ACTION_PROMPT = "Choose the next action by calling exactly one tool.";

export const GUIDED_PROMPT = `# GUIDANCE:
- Start by probing each simple action once and note which cells change.
- Track which objects move with your input and which stay fixed.
- A score increase means a level was cleared; the next frame starts a new layout.
- When a frame burst arrives, the last grid is the current state.
- After GAME_OVER, call RESET and avoid the sequence that lost.`;

export interface ActionTool {
  name: string;
  description: string;
  input_schema: {
    type: "object";
    properties: Record<string, { type: "string"; description: string }>;
    required: string[];
  };
}

const NO_INPUT: ActionTool["input_schema"] = { type: "object", properties: {}, required: [] };

export const ACTION_TOOLS: ActionTool[] = [
  {
    name: "RESET",
    description: "Start or restart the game. Required before playing and after GAME_OVER.",
    input_schema: NO_INPUT,
  },
  { name: "ACTION1", description: "Simple input action 1 (A, Left).", input_schema: NO_INPUT },
  { name: "ACTION2", description: "Simple input action 2 (D, Right).", input_schema: NO_INPUT },
  { name: "ACTION3", description: "Simple input action 3 (W, Up).", input_schema: NO_INPUT },
  { name: "ACTION4", description: "Simple input action 4 (S, Down).", input_schema: NO_INPUT },
  { name: "ACTION5", description: "Simple input action 5 (Enter, Space).", input_schema: NO_INPUT },
  {
    name: "ACTION6",
    description: "Complex input action 6: click the cell at (x, y).",
    input_schema: {
      type: "object",
      properties: {
        x: { type: "string", description: "Column, an integer from 0 to 63" },
        y: { type: "string", description: "Row, an integer from 0 to 63" },
      },
      required: ["x", "y"],
    },
  },
];

/** Render the latest step as the text the model sees. */
export function formatFrame(record: SessionRecord): string {
  const grids = record.frames
    .map((grid, i) => [`Grid ${i}:`, ...grid.map((row) => `  [${row.join(", ")}]`)].join("\n"))
    .join("\n\n");
  return `# State:\n${record.state}\n\n# Score:\n${record.score}\n\n# Frame:\n${grids}`;
}
