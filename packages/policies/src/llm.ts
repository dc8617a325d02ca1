import type Anthropic from "@anthropic-ai/sdk";
import { withRetry } from "@gridswarm/client";
import type { RetryOptions } from "@gridswarm/client";
import { ValidationError, actionFromName, describeError, reset, silentLogger } from "@gridswarm/schemas";
import type {
  DecisionPolicy,
  GameAction,
  JsonValue,
  Logger,
  PlayOutcome,
  PolicyContext,
  SessionRecord,
} from "@gridswarm/schemas";
import {
  ACTION_PROMPT,
  ACTION_TOOLS,
  OBSERVE_PROMPT,
  SYSTEM_PROMPT,
  formatFrame,
} from "./prompts.js";

type MessageParam = Anthropic.MessageParam;
type ContentBlockParam = Exclude<MessageParam["content"], string>[number];
type MessageRequest = Anthropic.MessageCreateParamsNonStreaming;

/** The parts of a Messages API reply the policy reads. */
export interface ReplyBlock {
  type: string;
  text?: string;
  thinking?: string;
  signature?: string;
  id?: string;
  name?: string;
  input?: unknown;
}

export interface ModelReply {
  content: ReplyBlock[];
  usage: { input_tokens: number; output_tokens: number };
}

export type CreateMessage = (request: MessageRequest) => Promise<ModelReply>;

/**
 * Messages API caller backed by the Anthropic SDK. The SDK is loaded on the
 * first call so that policies without a model never import it.
 */
export function anthropicMessages(apiKey: string): CreateMessage {
  let clientPromise: Promise<Anthropic> | null = null;
  return async (request) => {
    if (!clientPromise) {
      clientPromise = import("@anthropic-ai/sdk").then(
        ({ default: AnthropicClient }) => new AnthropicClient({ apiKey, maxRetries: 0 }),
      ).catch((err: unknown) => {
        clientPromise = null;
        throw err;
      });
    }
    const client = await clientPromise;
    return client.messages.create(request);
  };
}

export interface LlmPolicyConfig {
  name: string;
  model: string;
  maxActions: number;
  createMessage: CreateMessage;
  /** Ask for a plain-text observation before each action and keep it as the action's reasoning. */
  observe?: boolean;
  /** Messages kept in the conversation window. */
  messageLimit?: number;
  /** Extended thinking budget; enables thinking when set. */
  thinkingBudget?: number;
  /** Extra system prompt text. */
  guidance?: string;
  maxTokens?: number;
  retry?: RetryOptions;
}

const DEFAULT_MESSAGE_LIMIT = 10;

/**
 * Model-backed policy on the Anthropic Messages API. Each game action is a
 * tool; the model picks one per turn and sees the resulting frame as the
 * tool result of its previous call.
 */
export class LlmPolicy implements DecisionPolicy {
  readonly name: string;
  readonly maxActions: number;

  private config: LlmPolicyConfig;
  private system: string;
  private messages: MessageParam[] = [];
  private pendingToolUseId?: string;
  private usage = { input_tokens: 0, output_tokens: 0, calls: 0 };
  private logger: Logger = silentLogger;

  constructor(config: LlmPolicyConfig) {
    this.config = config;
    this.name = config.name;
    this.maxActions = config.maxActions;
    this.system = config.guidance ? `${SYSTEM_PROMPT}\n\n${config.guidance}` : SYSTEM_PROMPT;
  }

  prepare(ctx: PolicyContext): void {
    this.logger = ctx.logger;
    this.messages = [];
    this.pendingToolUseId = undefined;
    this.usage = { input_tokens: 0, output_tokens: 0, calls: 0 };
  }

  async cleanup(ctx: PolicyContext, outcome: PlayOutcome): Promise<void> {
    await ctx.annotate({
      policy: this.name,
      model: this.config.model,
      status: outcome.status,
      usage: { ...this.usage },
      prompts: { system: this.system, window: this.messages },
    });
  }

  isDone(_history: readonly SessionRecord[], latest: SessionRecord | null): boolean {
    return latest?.state === "WIN";
  }

  async chooseAction(_history: readonly SessionRecord[], latest: SessionRecord | null): Promise<GameAction> {
    if (latest === null || latest.state === "NOT_PLAYED") return reset();

    this.pushFrame(latest);
    let observation: string | undefined;
    if (this.config.observe) {
      const reply = await this.call(false);
      observation = textOf(reply);
      this.messages.push({ role: "assistant", content: observation || "(no observation)" });
      this.messages.push({ role: "user", content: ACTION_PROMPT });
    }

    const reply = await this.call(true);
    const toolUse = reply.content.find((block) => block.type === "tool_use");
    if (!toolUse || !toolUse.id || !toolUse.name) {
      throw new ValidationError(`${this.name}: the model did not call an action tool`);
    }
    this.messages.push({ role: "assistant", content: echoBlocks(reply.content, toolUse) });
    this.pendingToolUseId = toolUse.id;

    const reasoning: Record<string, JsonValue> = { model: this.config.model };
    if (observation) reasoning.observation = observation;
    const thinking = thinkingOf(reply);
    if (thinking) reasoning.thinking = thinking;
    const text = textOf(reply);
    if (text) reasoning.text = text;

    const input = isRecord(toolUse.input) ? toolUse.input : {};
    const action = actionFromName(toolUse.name, input, reasoning);
    this.logger.debug(`${this.name} chose ${action.id}`, { tool_use_id: toolUse.id });
    return action;
  }

  private pushFrame(latest: SessionRecord): void {
    const prompt = this.config.observe ? OBSERVE_PROMPT : ACTION_PROMPT;
    const frame = formatFrame(latest);
    const content: ContentBlockParam[] = this.pendingToolUseId
      ? [{ type: "tool_result", tool_use_id: this.pendingToolUseId, content: frame }, { type: "text", text: prompt }]
      : [{ type: "text", text: frame }, { type: "text", text: prompt }];
    this.pendingToolUseId = undefined;
    this.messages.push({ role: "user", content });
    this.messages = trimWindow(this.messages, this.config.messageLimit ?? DEFAULT_MESSAGE_LIMIT);
  }

  private async call(withTools: boolean): Promise<ModelReply> {
    const budget = this.config.thinkingBudget;
    const request: MessageRequest = {
      model: this.config.model,
      max_tokens: this.config.maxTokens ?? (budget ? budget + 2048 : 1024),
      system: this.system,
      messages: [...this.messages],
    };
    if (withTools) {
      request.tools = ACTION_TOOLS;
      // extended thinking only allows automatic tool choice
      request.tool_choice = budget ? { type: "auto" } : { type: "any" };
    }
    if (budget) request.thinking = { type: "enabled", budget_tokens: budget };

    const reply = await withRetry(() => this.config.createMessage(request), {
      ...this.config.retry,
      onRetry: (err, attempt, delayMs) => {
        this.logger.warn(`${this.name}: model call failed, retry ${attempt} in ${delayMs}ms`, {
          error: describeError(err).message,
        });
      },
    });
    this.usage.calls++;
    this.usage.input_tokens += reply.usage.input_tokens;
    this.usage.output_tokens += reply.usage.output_tokens;
    return reply;
  }
}

/**
 * Keep the last `limit` messages. The window always opens with a user turn,
 * and a tool result at its start, whose tool call fell out, becomes plain text.
 */
export function trimWindow(messages: readonly MessageParam[], limit: number): MessageParam[] {
  let window = messages.slice(Math.max(0, messages.length - limit));
  while (window.length > 0 && window[0]?.role === "assistant") window = window.slice(1);
  const first = window[0];
  if (first && typeof first.content !== "string") {
    window = [{ role: "user", content: first.content.map(detachToolResult) }, ...window.slice(1)];
  }
  return window;
}

function detachToolResult(block: ContentBlockParam): ContentBlockParam {
  if (block.type !== "tool_result") return block;
  const text = typeof block.content === "string"
    ? block.content
    : (block.content ?? []).map((part) => (part.type === "text" ? part.text : "")).join("\n");
  return { type: "text", text };
}

/** The assistant turn to keep: thinking, text and the one tool call acted on. */
function echoBlocks(blocks: readonly ReplyBlock[], toolUse: ReplyBlock): ContentBlockParam[] {
  const echoed: ContentBlockParam[] = [];
  for (const block of blocks) {
    if (block.type === "thinking" && block.thinking !== undefined && block.signature !== undefined) {
      echoed.push({ type: "thinking", thinking: block.thinking, signature: block.signature });
    } else if (block.type === "text" && block.text) {
      echoed.push({ type: "text", text: block.text });
    }
  }
  echoed.push({ type: "tool_use", id: toolUse.id ?? "", name: toolUse.name ?? "", input: toolUse.input ?? {} });
  return echoed;
}

function textOf(reply: ModelReply): string {
  return reply.content
    .filter((block) => block.type === "text" && block.text)
    .map((block) => block.text ?? "")
    .join("\n")
    .trim();
}

function thinkingOf(reply: ModelReply): string {
  return reply.content
    .filter((block) => block.type === "thinking" && block.thinking)
    .map((block) => block.thinking ?? "")
    .join("\n")
    .trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
