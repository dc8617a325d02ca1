export { RandomPolicy } from "./random.js";
export type { RandomPolicyOptions } from "./random.js";
export { ScriptedPolicy, parseScript } from "./scripted.js";
export type { ScriptedPolicyOptions } from "./scripted.js";
export { LlmPolicy, anthropicMessages, trimWindow } from "./llm.js";
export type { CreateMessage, LlmPolicyConfig, ModelReply, ReplyBlock } from "./llm.js";
export {
  SYSTEM_PROMPT,
  OBSERVE_PROMPT,
  ACTION_PROMPT,
  GUIDED_PROMPT,
  ACTION_TOOLS,
  formatFrame,
} from "./prompts.js";
export type { ActionTool } from "./prompts.js";
export { availablePolicies, createPolicyFactory, DEFAULT_MODEL } from "./registry.js";
export type { PolicyOptions } from "./registry.js";
