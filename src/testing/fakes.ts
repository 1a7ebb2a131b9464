/**
 * Test doubles shared by the test suites
 */

import { vi } from "vitest";
import type {
  CompletionProvider,
  CompletionRequest,
  CompletionResponse,
} from "../completion/types.js";
import type { Issue } from "../issues/types.js";
import type { CasetrailLogger } from "../runtime/logger.js";
import type { ToolCollaborator, ToolResult } from "../tools/types.js";
import { TERMINAL_TOOL_NAME } from "../tools/types.js";

export type ScriptStep =
  | CompletionResponse
  | Error
  | ((request: CompletionRequest) => CompletionResponse | Promise<CompletionResponse>);

const USAGE = { inputTokens: 100, outputTokens: 20 };

export function toolCallResponse(
  name: string,
  args: Record<string, unknown>,
  callId = `call_${name}`,
  text = "",
): CompletionResponse {
  return {
    action: { type: "tool_call", call: { callId, name, arguments: args } },
    text,
    usage: USAGE,
    model: "test-model",
  };
}

export function submitResponse(output: Record<string, unknown>, text = ""): CompletionResponse {
  return toolCallResponse(TERMINAL_TOOL_NAME, output, "call_submit", text);
}

export function textResponse(text: string): CompletionResponse {
  return { action: { type: "final_answer", text }, text, usage: USAGE, model: "test-model" };
}

/**
 * Provider that replays a fixed script, one step per call. Calls past the
 * end of the script reuse the last step.
 */
export class ScriptedCompletionProvider implements CompletionProvider {
  readonly requests: CompletionRequest[] = [];
  private index = 0;

  constructor(private readonly steps: ScriptStep[]) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    const step = this.steps[Math.min(this.index, this.steps.length - 1)];
    this.index++;

    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === "function") {
      return step(request);
    }
    return step;
  }
}

/**
 * Provider that routes requests by system prompt, for tests where the
 * investigation, critic and paraphrase calls interleave
 */
export class RoutingCompletionProvider implements CompletionProvider {
  readonly requests: CompletionRequest[] = [];

  constructor(
    private readonly route: (request: CompletionRequest) => CompletionResponse | Promise<CompletionResponse>,
  ) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    return this.route(request);
  }
}

export function createMockLogger(): CasetrailLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    tool: vi.fn(),
    flush: vi.fn(async () => {}),
  };
}

export function staticCollaborator(result: ToolResult): ToolCollaborator & { calls: number } {
  const collaborator = {
    calls: 0,
    async invoke(): Promise<ToolResult> {
      collaborator.calls++;
      return structuredClone(result);
    },
  };
  return collaborator;
}

export function sampleIssue(overrides: Partial<Issue> = {}): Issue {
  return {
    issueId: "ISS-100",
    customerId: "CUS-1",
    rawMessage:
      "A $15,000 wire came into my account 4 days ago and I still can't use it. The app now says my account is restricted. What is going on?",
    channel: "chat",
    urgency: "high",
    status: "open",
    ...overrides,
  };
}

export function unauthorizedTradeIssue(overrides: Partial<Issue> = {}): Issue {
  return {
    issueId: "ISS-101",
    customerId: "CUS-2",
    rawMessage:
      "Someone logged into my account from a country I have never been to, and 90 minutes later an $8,400 sell order went through. I did not place that order.",
    channel: "phone_transcript",
    urgency: "critical",
    status: "open",
    ...overrides,
  };
}

export const AML_HOLD_OUTPUT = {
  issue_type: "WIRE_DELAY",
  root_cause:
    "The $15,000 inbound wire received 4 days ago is held for AML review, and the account is restricted with code AML_REVIEW until the review clears.",
  resolution: "Explained that the review is routine and the funds are released when it clears, expected within 2 business days.",
  resolution_type: "AUTO_RESOLVED",
  next_steps: ["Monitor the wire for release"],
  confidence_score: 0.88,
  escalate: false,
  policy_flags: ["AML_REVIEW_TRIGGERED"],
};

export const UNAUTHORIZED_TRADE_OUTPUT = {
  issue_type: "UNAUTH_TRADE",
  root_cause: "Login from an unrecognized country 90 minutes before an $8,400 sell order the customer did not place.",
  resolution: "Referred to the security team for an unauthorized trading investigation.",
  resolution_type: "ESCALATED",
  next_steps: ["Freeze trading", "Contact customer"],
  confidence_score: 0.9,
  escalate: false,
  policy_flags: [],
};
