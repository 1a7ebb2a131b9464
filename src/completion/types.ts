/**
 * Completion capability contract
 *
 * The core depends only on this interface, never on a model name or transport.
 */

import type { ToolSpec } from "../tools/types.js";

/**
 * A tool request made by the model
 */
export interface ToolCallRequest {
  callId: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * One turn of conversation state
 */
export type ConversationTurn =
  | { role: "user"; content: string }
  | { role: "assistant"; text: string; toolCall?: ToolCallRequest }
  | { role: "tool"; callId: string; name: string; content: string; isError: boolean };

/**
 * What the model asked for next. Which tool name is terminal is not decided here.
 */
export type ModelAction =
  | { type: "tool_call"; call: ToolCallRequest }
  | { type: "final_answer"; text: string };

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionRequest {
  system?: string;
  conversation: ConversationTurn[];
  /** Empty for non-tool requests (paraphrase, critic) */
  tools: ToolSpec[];
  /** Overrides the provider's default model */
  model?: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface CompletionResponse {
  action: ModelAction;
  /** Free text the model produced alongside the action */
  text: string;
  usage: TokenUsage;
  model: string;
}

export interface CompletionProvider {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Parse a JSON array or object out of a model text reply.
 * Tolerates surrounding prose and code fences. Returns undefined when nothing parses.
 */
export function parseJsonReply(text: string, expect: "array" | "object"): unknown {
  const trimmed = text.trim();
  const direct = tryParse(trimmed);
  if (direct.ok) {
    return direct.value;
  }

  const [open, close] = expect === "array" ? ["[", "]"] : ["{", "}"];
  const start = trimmed.indexOf(open);
  const end = trimmed.lastIndexOf(close);
  if (start === -1 || end <= start) {
    return undefined;
  }

  const extracted = tryParse(trimmed.slice(start, end + 1));
  return extracted.ok ? extracted.value : undefined;
}
