/**
 * Investigation core - limits, run trace model, and per-run context
 */

import crypto from "node:crypto";
import type { ConversationTurn, TokenUsage } from "../completion/types.js";
import type { Issue } from "../issues/types.js";
import type { StructuredOutput } from "./terminal.js";

/** Hard cap on completion round trips per investigation */
export const MAX_TURNS = 15;

/**
 * Hard limits for an investigation
 */
export interface InvestigationLimits {
  maxTurns: number;
  completionTimeoutMs: number;
  toolTimeoutMs: number;
  maxToolResultBytes: number;
}

/**
 * Default limits
 */
export const DEFAULT_LIMITS: InvestigationLimits = {
  maxTurns: MAX_TURNS,
  completionTimeoutMs: 120_000,
  toolTimeoutMs: 15_000,
  maxToolResultBytes: 16_384,
};

/**
 * Fill in defaults. A configured turn budget can only lower `MAX_TURNS`.
 */
export function resolveLimits(limits?: Partial<InvestigationLimits>): InvestigationLimits {
  const merged = { ...DEFAULT_LIMITS, ...limits };
  return { ...merged, maxTurns: Math.min(merged.maxTurns, MAX_TURNS) };
}

export type RunStatus = "running" | "completed" | "escalated" | "failed";

/**
 * One dispatched tool call. The terminal tool never produces one.
 */
export interface ToolCallRecord {
  turn: number;
  tool: string;
  argsDigest: string;
  latencyMs: number;
  cacheHit: boolean;
  resultSummary: string;
  isError: boolean;
}

/**
 * Reasoning trail entry
 */
export interface ReasoningEntry {
  timestamp: string;
  turn: number;
  type: "assistant" | "tool_call" | "terminal" | "nudge" | "policy" | "critic" | "error";
  message: string;
  data?: Record<string, unknown>;
}

/**
 * What the policy evaluator changed
 */
export interface PolicyOutcome {
  matchedRules: string[];
  flagsAdded: string[];
  forcedEscalation: boolean;
}

/**
 * Independent review of the verdict. Never alters the verdict.
 */
export interface CriticVerdict {
  agrees: boolean;
  notes: string;
  model: string;
  /** False when the review call failed and the fallback was used */
  available: boolean;
}

export interface TokenTotals {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Audit record of one investigation
 */
export interface RunTrace {
  traceId: string;
  issueId: string;
  customerId: string;
  isReplay: boolean;
  startedAt: string;
  completedAt: string | null;
  durationMs: number | null;
  status: RunStatus;
  toolCalls: ToolCallRecord[];
  reasoning: ReasoningEntry[];
  structuredOutput: StructuredOutput | null;
  policy: PolicyOutcome | null;
  tokenUsage: TokenTotals;
  turns: number;
  model: string | null;
  error: { code: string; message: string } | null;
  critic: CriticVerdict | null;
}

/**
 * State owned by one in-flight investigation
 */
export interface InvestigationContext {
  trace: RunTrace;
  limits: InvestigationLimits;
  conversation: ConversationTurn[];
  startTime: number;
}

/**
 * Create a new investigation context with a `running` trace
 */
export function createInvestigationContext(
  issue: Issue,
  options: { isReplay?: boolean; limits?: Partial<InvestigationLimits> } = {},
): InvestigationContext {
  const startTime = Date.now();
  return {
    trace: {
      traceId: crypto.randomUUID(),
      issueId: issue.issueId,
      customerId: issue.customerId,
      isReplay: options.isReplay ?? false,
      startedAt: new Date(startTime).toISOString(),
      completedAt: null,
      durationMs: null,
      status: "running",
      toolCalls: [],
      reasoning: [],
      structuredOutput: null,
      policy: null,
      tokenUsage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
      turns: 0,
      model: null,
      error: null,
      critic: null,
    },
    limits: resolveLimits(options.limits),
    conversation: [],
    startTime,
  };
}

/**
 * Append to the reasoning trail
 */
export function logEntry(
  ctx: InvestigationContext,
  type: ReasoningEntry["type"],
  message: string,
  data?: Record<string, unknown>,
): void {
  ctx.trace.reasoning.push({
    timestamp: new Date().toISOString(),
    turn: ctx.trace.turns,
    type,
    message,
    ...(data ? { data } : {}),
  });
}

/**
 * Start the next turn. Returns false once the budget is spent.
 */
export function beginTurn(ctx: InvestigationContext): boolean {
  if (ctx.trace.turns >= ctx.limits.maxTurns) {
    return false;
  }
  ctx.trace.turns++;
  return true;
}

/**
 * Append a frozen tool call record
 */
export function recordToolCall(ctx: InvestigationContext, record: ToolCallRecord): void {
  ctx.trace.toolCalls.push(Object.freeze({ ...record }));
}

export function addUsage(ctx: InvestigationContext, usage: TokenUsage, model: string): void {
  const totals = ctx.trace.tokenUsage;
  totals.inputTokens += usage.inputTokens;
  totals.outputTokens += usage.outputTokens;
  totals.totalTokens = totals.inputTokens + totals.outputTokens;
  ctx.trace.model = model;
}

/**
 * Move the trace out of `running` and freeze it
 */
export function finalizeTrace(
  ctx: InvestigationContext,
  status: Exclude<RunStatus, "running">,
  error?: { code: string; message: string },
): RunTrace {
  const completedAt = Date.now();
  ctx.trace.status = status;
  ctx.trace.completedAt = new Date(completedAt).toISOString();
  ctx.trace.durationMs = completedAt - ctx.startTime;
  if (error) {
    ctx.trace.error = error;
  }
  return deepFreeze(ctx.trace);
}

/**
 * Recursively freeze a plain data value
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

/**
 * Truncate output to max bytes
 */
export function truncateOutput(output: string, maxBytes: number): string {
  if (Buffer.byteLength(output) <= maxBytes) {
    return output;
  }

  // Binary search for the right length
  let low = 0;
  let high = output.length;

  while (low < high) {
    const mid = Math.floor((low + high + 1) / 2);
    if (Buffer.byteLength(output.slice(0, mid)) <= maxBytes - 20) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }

  return output.slice(0, low) + "\n[TRUNCATED]";
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Race a task against a timer. The task's signal is aborted when the timer fires.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Format a run trace as markdown
 */
export function formatRunLog(trace: RunTrace): string {
  const lines: string[] = [
    `# Run Log: ${trace.traceId}`,
    "",
    `**Issue:** ${trace.issueId} (customer ${trace.customerId})`,
    `**Status:** ${trace.status}${trace.isReplay ? " (replay)" : ""}`,
    `**Started:** ${trace.startedAt}`,
    `**Duration:** ${trace.durationMs ?? "-"}ms`,
    `**Turns:** ${trace.turns}`,
    `**Tool Calls:** ${trace.toolCalls.length}`,
    `**Tokens:** ${trace.tokenUsage.totalTokens}`,
  ];

  if (trace.error) {
    lines.push(`**Error:** [${trace.error.code}] ${trace.error.message}`);
  }

  const output = trace.structuredOutput;
  if (output) {
    lines.push(
      "",
      "## Resolution",
      "",
      `- Type: ${output.issue_type}`,
      `- Resolution: ${output.resolution_type}`,
      `- Confidence: ${output.confidence_score}`,
      `- Escalate: ${output.escalate}${output.escalation_priority ? ` (${output.escalation_priority})` : ""}`,
      `- Flags: ${output.policy_flags.length > 0 ? output.policy_flags.join(", ") : "none"}`,
    );
  }

  if (trace.toolCalls.length > 0) {
    lines.push("", "## Tool Calls", "");
    for (const call of trace.toolCalls) {
      const hit = call.cacheHit ? " (cache)" : "";
      lines.push(
        `- \`${call.turn}\` ${call.tool} [${call.argsDigest}] ${call.latencyMs}ms${hit}: ${call.resultSummary}`,
      );
    }
  }

  if (trace.critic) {
    lines.push(
      "",
      "## Critic",
      "",
      `${trace.critic.agrees ? "Agrees" : "Disagrees"} (${trace.critic.model}): ${trace.critic.notes}`,
    );
  }

  lines.push("", "## Log", "");
  for (const entry of trace.reasoning) {
    const time = entry.timestamp.split("T")[1];
    const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : "";
    lines.push(`- \`${time}\` [${entry.type}] ${entry.message}${dataStr}`);
  }

  return lines.join("\n");
}
