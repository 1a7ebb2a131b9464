/**
 * Investigator - the turn-bounded tool-use loop
 */

import type { CompletionProvider, CompletionResponse } from "../completion/types.js";
import {
  CompletionCapabilityError,
  InvalidInputError,
  InvestigationError,
  ToolDispatchError,
  errorMessage,
} from "../errors.js";
import type { Issue, IssueSource, IssueStatus } from "../issues/types.js";
import { MAX_TURNS_EXCEEDED, type PolicyEvaluator } from "../policy/evaluator.js";
import type { CasetrailLogger } from "../runtime/logger.js";
import type { RunStore } from "../store/run-store.js";
import type { ToolDispatcher } from "../tools/dispatcher.js";
import { isToolError, type ToolCatalog, type ToolSpec } from "../tools/types.js";
import type { CriticReviewer } from "./critic.js";
import {
  type InvestigationContext,
  type InvestigationLimits,
  type RunStatus,
  type RunTrace,
  type ToolCallRecord,
  addUsage,
  beginTurn,
  createInvestigationContext,
  finalizeTrace,
  logEntry,
  recordToolCall,
  truncateOutput,
  withTimeout,
} from "./core.js";
import { INVESTIGATION_SYSTEM_PROMPT, TERMINAL_NUDGE, buildIssueContext } from "./prompts.js";
import { SUBMIT_RESOLUTION_SPEC, type StructuredOutput, resolveNextAction } from "./terminal.js";

/**
 * Events published while an investigation runs
 */
export type InvestigationEvent =
  | { type: "run.started"; traceId: string; issueId: string; isReplay: boolean }
  | { type: "run.tool_call"; traceId: string; issueId: string; record: ToolCallRecord }
  | { type: "run.completed"; traceId: string; issueId: string; status: RunStatus; trace: RunTrace };

export type InvestigationEventHandler = (event: InvestigationEvent) => void;

export interface InvestigatorOptions {
  provider: CompletionProvider;
  catalog: ToolCatalog;
  dispatcher: ToolDispatcher;
  policy: PolicyEvaluator;
  store: RunStore;
  logger: CasetrailLogger;
  /** Receives status transitions for primary runs */
  issues?: IssueSource;
  critic?: CriticReviewer;
  limits?: Partial<InvestigationLimits>;
  /** Model id passed to the provider; the provider default applies when unset */
  model?: string;
}

export interface RunOptions {
  /** Replay runs skip the critic and never touch issue status */
  isReplay?: boolean;
  /** Run the critic; defaults to true for primary runs */
  review?: boolean;
}

/**
 * Output synthesized when the turn budget runs out
 */
export function maxTurnsOutput(): StructuredOutput {
  return {
    issue_type: "GENERAL",
    root_cause: "Investigation did not reach a conclusion within the allowed turns.",
    resolution: "Escalating for human review.",
    resolution_type: "ESCALATED",
    next_steps: ["Human agent to review the investigation trace and complete it manually."],
    confidence_score: 0,
    escalate: true,
    escalation_priority: "MEDIUM",
    policy_flags: [MAX_TURNS_EXCEEDED],
  };
}

export class Investigator {
  private readonly provider: CompletionProvider;
  private readonly catalog: ToolCatalog;
  private readonly dispatcher: ToolDispatcher;
  private readonly policy: PolicyEvaluator;
  private readonly store: RunStore;
  private readonly logger: CasetrailLogger;
  private readonly issues?: IssueSource;
  private readonly critic?: CriticReviewer;
  private readonly limits?: Partial<InvestigationLimits>;
  private readonly model?: string;
  private readonly handlers = new Set<InvestigationEventHandler>();

  constructor(options: InvestigatorOptions) {
    this.provider = options.provider;
    this.catalog = options.catalog;
    this.dispatcher = options.dispatcher;
    this.policy = options.policy;
    this.store = options.store;
    this.logger = options.logger;
    this.issues = options.issues;
    this.critic = options.critic;
    this.limits = options.limits;
    this.model = options.model;
  }

  /**
   * Subscribe to investigation events. Returns an unsubscribe function.
   */
  onEvent(handler: InvestigationEventHandler): () => void {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  /**
   * Investigate one issue. Failures end in a `failed` trace; only bad input throws.
   */
  async run(issue: Issue, options: RunOptions = {}): Promise<RunTrace> {
    validateIssue(issue);

    const isReplay = options.isReplay ?? false;
    const ctx = createInvestigationContext(issue, { isReplay, limits: this.limits });
    const { traceId } = ctx.trace;

    await this.store.createTrace(ctx.trace);
    this.logger.info(`Starting investigation of ${issue.issueId}`, { traceId, isReplay });
    this.emit({ type: "run.started", traceId, issueId: issue.issueId, isReplay });

    if (!isReplay) {
      await this.transitionIssue(issue.issueId, "investigating");
    }

    ctx.conversation.push({ role: "user", content: buildIssueContext(issue) });
    const tools: ToolSpec[] = [...this.catalog.specs(), SUBMIT_RESOLUTION_SPEC];

    let submitted: StructuredOutput | null;
    try {
      submitted = await this.loop(ctx, tools);
    } catch (error) {
      return this.fail(ctx, issue, error);
    }

    if (!submitted) {
      this.logger.warn("Turn budget exhausted without a resolution", {
        traceId,
        turns: ctx.trace.turns,
      });
      logEntry(ctx, "error", `No resolution after ${ctx.limits.maxTurns} turns`);
    }

    const { output, outcome } = this.policy.apply(submitted ?? maxTurnsOutput());
    ctx.trace.structuredOutput = output;
    ctx.trace.policy = outcome;
    if (outcome.matchedRules.length > 0) {
      logEntry(ctx, "policy", `Rules matched: ${outcome.matchedRules.join(", ")}`, {
        flagsAdded: outcome.flagsAdded,
        forcedEscalation: outcome.forcedEscalation,
      });
    }

    if (this.critic && (options.review ?? !isReplay)) {
      ctx.trace.critic = await this.critic.review({
        issueId: issue.issueId,
        structuredOutput: output,
        reasoning: assistantReasoning(ctx),
      });
      logEntry(ctx, "critic", ctx.trace.critic.notes, { agrees: ctx.trace.critic.agrees });
    }

    const status = output.escalate ? "escalated" : "completed";
    const trace = finalizeTrace(ctx, status);
    await this.store.updateTrace(trace);

    if (!isReplay) {
      await this.transitionIssue(issue.issueId, output.escalate ? "escalated" : "resolved");
    }

    this.logger.info(`Investigation ${status}`, {
      traceId,
      resolutionType: output.resolution_type,
      confidence: output.confidence_score,
      turns: trace.turns,
      toolCalls: trace.toolCalls.length,
      tokens: trace.tokenUsage.totalTokens,
      durationMs: trace.durationMs,
    });
    this.emit({ type: "run.completed", traceId, issueId: issue.issueId, status, trace });

    return trace;
  }

  private async loop(ctx: InvestigationContext, tools: ToolSpec[]): Promise<StructuredOutput | null> {
    while (beginTurn(ctx)) {
      const turn = ctx.trace.turns;
      const response = await this.complete(ctx, tools);
      addUsage(ctx, response.usage, response.model);

      if (response.text) {
        logEntry(ctx, "assistant", response.text);
      }

      const next = resolveNextAction(response.action);

      switch (next.kind) {
        case "terminal":
          logEntry(ctx, "terminal", "Resolution submitted", {
            resolutionType: next.output.resolution_type,
            confidence: next.output.confidence_score,
          });
          return next.output;

        case "tool": {
          ctx.conversation.push({ role: "assistant", text: response.text, toolCall: next.call });

          const { record, result, fatal } = await this.dispatcher.dispatch(
            next.call.name,
            next.call.arguments,
            turn,
          );
          recordToolCall(ctx, record);
          logEntry(ctx, "tool_call", `${record.tool}: ${record.resultSummary}`, {
            argsDigest: record.argsDigest,
            cacheHit: record.cacheHit,
            latencyMs: record.latencyMs,
          });
          this.emit({
            type: "run.tool_call",
            traceId: ctx.trace.traceId,
            issueId: ctx.trace.issueId,
            record,
          });

          if (fatal && isToolError(result)) {
            throw new ToolDispatchError(record.tool, result.error.message);
          }

          ctx.conversation.push({
            role: "tool",
            callId: next.call.callId,
            name: next.call.name,
            content: truncateOutput(JSON.stringify(result), ctx.limits.maxToolResultBytes),
            isError: record.isError,
          });
          break;
        }

        case "text":
          ctx.conversation.push({ role: "assistant", text: next.text });
          ctx.conversation.push({ role: "user", content: TERMINAL_NUDGE });
          logEntry(ctx, "nudge", "Reply without a tool call; asked for a resolution");
          break;
      }
    }

    return null;
  }

  private async complete(ctx: InvestigationContext, tools: ToolSpec[]): Promise<CompletionResponse> {
    try {
      return await withTimeout("Completion", ctx.limits.completionTimeoutMs, (signal) =>
        this.provider.complete({
          system: INVESTIGATION_SYSTEM_PROMPT,
          conversation: [...ctx.conversation],
          tools,
          model: this.model,
          signal,
        }),
      );
    } catch (error) {
      throw new CompletionCapabilityError(errorMessage(error), error);
    }
  }

  private async fail(ctx: InvestigationContext, issue: Issue, error: unknown): Promise<RunTrace> {
    const code = error instanceof InvestigationError ? error.code : "INTERNAL_ERROR";
    const message = errorMessage(error);

    logEntry(ctx, "error", message, { code });
    const trace = finalizeTrace(ctx, "failed", { code, message });
    await this.store.updateTrace(trace);

    if (!trace.isReplay) {
      await this.transitionIssue(issue.issueId, "open");
    }

    this.logger.error(`Investigation failed: ${message}`, {
      traceId: trace.traceId,
      code,
      toolCalls: trace.toolCalls.length,
    });
    this.emit({
      type: "run.completed",
      traceId: trace.traceId,
      issueId: issue.issueId,
      status: "failed",
      trace,
    });

    return trace;
  }

  private async transitionIssue(issueId: string, status: IssueStatus): Promise<void> {
    if (!this.issues) return;
    try {
      await this.issues.setStatus(issueId, status);
    } catch (error) {
      this.logger.warn(`Could not mark issue ${issueId} ${status}`, { error: errorMessage(error) });
    }
  }

  private emit(event: InvestigationEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.warn(`Event handler failed for ${event.type}`, { error: errorMessage(error) });
      }
    }
  }
}

function validateIssue(issue: Issue): void {
  if (!issue.issueId.trim() || !issue.customerId.trim()) {
    throw new InvalidInputError("Issue must have an issue id and a customer id", {
      issueId: issue.issueId,
    });
  }
  if (!issue.rawMessage.trim()) {
    throw new InvalidInputError(`Issue ${issue.issueId} has a blank message`, {
      issueId: issue.issueId,
    });
  }
}

function assistantReasoning(ctx: InvestigationContext): string {
  return ctx.trace.reasoning
    .filter((entry) => entry.type === "assistant")
    .map((entry) => entry.message)
    .join("\n\n");
}
