/**
 * Anthropic Messages API completion provider
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ToolSpec } from "../tools/types.js";
import type {
  CompletionProvider,
  CompletionRequest,
  CompletionResponse,
  ConversationTurn,
  ModelAction,
} from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toAnthropicTool(spec: ToolSpec): Anthropic.Tool {
  return {
    name: spec.name,
    description: spec.description,
    input_schema: spec.inputSchema,
  };
}

function toContentBlocks(turn: ConversationTurn): Anthropic.ContentBlockParam[] {
  switch (turn.role) {
    case "user":
      return [{ type: "text", text: turn.content }];

    case "assistant": {
      const blocks: Anthropic.ContentBlockParam[] = [];
      if (turn.text) {
        blocks.push({ type: "text", text: turn.text });
      }
      if (turn.toolCall) {
        blocks.push({
          type: "tool_use",
          id: turn.toolCall.callId,
          name: turn.toolCall.name,
          input: turn.toolCall.arguments,
        });
      }
      return blocks;
    }

    case "tool":
      return [
        {
          type: "tool_result",
          tool_use_id: turn.callId,
          content: turn.content,
          is_error: turn.isError,
        },
      ];
  }
}

/**
 * Convert conversation turns to Messages API messages.
 * Tool results travel as user content; consecutive same-role turns are merged.
 */
export function toAnthropicMessages(conversation: ConversationTurn[]): Anthropic.MessageParam[] {
  const messages: Array<{ role: "user" | "assistant"; content: Anthropic.ContentBlockParam[] }> =
    [];

  for (const turn of conversation) {
    const role = turn.role === "assistant" ? "assistant" : "user";
    const blocks = toContentBlocks(turn);
    if (blocks.length === 0) continue;

    const last = messages[messages.length - 1];
    if (last && last.role === role) {
      last.content.push(...blocks);
    } else {
      messages.push({ role, content: blocks });
    }
  }

  return messages;
}

/**
 * Reduce a Messages API response to a single next action.
 * Only the first tool_use block is honoured; parallel tool use is disabled on request.
 */
export function toModelAction(content: Anthropic.ContentBlock[]): { action: ModelAction; text: string } {
  const textParts: string[] = [];
  let action: ModelAction | null = null;

  for (const block of content) {
    if (block.type === "text") {
      if (block.text.trim()) textParts.push(block.text.trim());
    } else if (block.type === "tool_use" && action === null) {
      action = {
        type: "tool_call",
        call: {
          callId: block.id,
          name: block.name,
          arguments: isRecord(block.input) ? block.input : {},
        },
      };
    }
  }

  const text = textParts.join("\n\n");
  return { action: action ?? { type: "final_answer", text }, text };
}

export interface AnthropicProviderOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
}

/**
 * CompletionProvider backed by the Anthropic SDK
 */
export class AnthropicCompletionProvider implements CompletionProvider {
  private client: Anthropic;
  private model: string;
  private maxTokens: number;

  constructor(options: AnthropicProviderOptions) {
    // Retries and timeouts are owned by the orchestrator
    this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
    this.model = options.model;
    this.maxTokens = options.maxTokens;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const model = request.model ?? this.model;
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model,
      max_tokens: request.maxTokens ?? this.maxTokens,
      messages: toAnthropicMessages(request.conversation),
    };

    if (request.system) {
      params.system = request.system;
    }
    if (request.temperature !== undefined) {
      params.temperature = request.temperature;
    }
    if (request.tools.length > 0) {
      params.tools = request.tools.map(toAnthropicTool);
      params.tool_choice = { type: "auto", disable_parallel_tool_use: true };
    }

    const response = await this.client.messages.create(params, { signal: request.signal });
    const { action, text } = toModelAction(response.content);

    return {
      action,
      text,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      model: response.model,
    };
  }
}
