import { join } from "node:path";
import { ValidationError, silentLogger } from "@gridswarm/schemas";
import type { GameAction, Logger, PolicyFactory, SessionRecord } from "@gridswarm/schemas";
import {
  PlaybackPolicy,
  isRecordingFileName,
  parseRecordingFileName,
  readRecording,
  recordedSteps,
} from "@gridswarm/recorder";
import { RandomPolicy } from "./random.js";
import { ScriptedPolicy } from "./scripted.js";
import { LlmPolicy, anthropicMessages } from "./llm.js";
import type { CreateMessage, LlmPolicyConfig } from "./llm.js";
import { GUIDED_PROMPT } from "./prompts.js";

export const DEFAULT_MODEL = "claude-sonnet-4-6";

type LlmVariant = Pick<LlmPolicyConfig, "maxActions" | "observe" | "thinkingBudget" | "guidance">;

const LLM_VARIANTS: Record<string, LlmVariant> = {
  llm: { maxActions: 80, observe: true },
  fastllm: { maxActions: 100, observe: false },
  reasoningllm: { maxActions: 50, observe: false, thinkingBudget: 4096 },
  guidedllm: { maxActions: 200, observe: false, thinkingBudget: 4096, guidance: GUIDED_PROMPT },
};

export interface PolicyOptions {
  apiKey?: string;
  model?: string;
  /** Stands in for the Anthropic client. */
  createMessage?: CreateMessage;
  /** Actions for the scripted policy. */
  script?: readonly GameAction[];
  random?: () => number;
  logger?: Logger;
  playbackDelayMs?: number;
  /** Where bare recording names are looked up. */
  recordingsDir?: string;
}

export function availablePolicies(): string[] {
  return ["random", "scripted", ...Object.keys(LLM_VARIANTS)];
}

/**
 * Resolve a policy name to a factory producing one fresh policy per unit.
 * A name ending in `.recording.jsonl` plays that recording back.
 */
export async function createPolicyFactory(name: string, options: PolicyOptions = {}): Promise<PolicyFactory> {
  const logger = options.logger ?? silentLogger;

  if (isRecordingFileName(name)) {
    const path = name.includes("/") ? name : join(options.recordingsDir ?? "recordings", name);
    const steps: SessionRecord[] = recordedSteps(await readRecording(path, logger));
    if (steps.length === 0) throw new ValidationError(`Recording ${path} holds no actions`);
    const parsed = parseRecordingFileName(path);
    const policyName = parsed ? `playback.${parsed.policy}` : "playback";
    return () => new PlaybackPolicy(steps, { name: policyName, delayMs: options.playbackDelayMs, logger });
  }

  if (name === "random") {
    return () => new RandomPolicy({ random: options.random });
  }

  if (name === "scripted") {
    const script = options.script;
    if (!script || script.length === 0) {
      throw new ValidationError("The scripted policy needs a script of actions");
    }
    return () => new ScriptedPolicy(script);
  }

  const variant = LLM_VARIANTS[name];
  if (variant) {
    const createMessage = options.createMessage ?? (options.apiKey ? anthropicMessages(options.apiKey) : undefined);
    if (!createMessage) {
      throw new ValidationError(`ANTHROPIC_API_KEY is required for the ${name} policy`);
    }
    const model = options.model ?? DEFAULT_MODEL;
    return () => new LlmPolicy({ ...variant, name, model, createMessage });
  }

  throw new ValidationError(`Unknown policy "${name}"; available: ${availablePolicies().join(", ")}`);
}
