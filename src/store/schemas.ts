/**
 * Schemas for stored documents
 */

import { z } from "zod";
import type { RunTrace } from "../orchestrator/core.js";
import { ResolutionTypeSchema, StructuredOutputSchema } from "../orchestrator/terminal.js";
import type { ReplaySession } from "../replay/types.js";

const ToolCallRecordSchema = z.object({
  turn: z.number(),
  tool: z.string(),
  argsDigest: z.string(),
  latencyMs: z.number(),
  cacheHit: z.boolean(),
  resultSummary: z.string(),
  isError: z.boolean(),
});

const ReasoningEntrySchema = z.object({
  timestamp: z.string(),
  turn: z.number(),
  type: z.enum(["assistant", "tool_call", "terminal", "nudge", "policy", "critic", "error"]),
  message: z.string(),
  data: z.record(z.unknown()).optional(),
});

export const RunTraceSchema: z.ZodType<RunTrace, z.ZodTypeDef, unknown> = z.object({
  traceId: z.string(),
  issueId: z.string(),
  customerId: z.string(),
  isReplay: z.boolean(),
  startedAt: z.string(),
  completedAt: z.string().nullable(),
  durationMs: z.number().nullable(),
  status: z.enum(["running", "completed", "escalated", "failed"]),
  toolCalls: z.array(ToolCallRecordSchema),
  reasoning: z.array(ReasoningEntrySchema),
  structuredOutput: StructuredOutputSchema.nullable(),
  policy: z
    .object({
      matchedRules: z.array(z.string()),
      flagsAdded: z.array(z.string()),
      forcedEscalation: z.boolean(),
    })
    .nullable(),
  tokenUsage: z.object({
    inputTokens: z.number(),
    outputTokens: z.number(),
    totalTokens: z.number(),
  }),
  turns: z.number(),
  model: z.string().nullable(),
  error: z.object({ code: z.string(), message: z.string() }).nullable(),
  critic: z
    .object({
      agrees: z.boolean(),
      notes: z.string(),
      model: z.string(),
      available: z.boolean(),
    })
    .nullable(),
});

const ReplayRunSchema = z.object({
  runId: z.string(),
  index: z.number(),
  perturbation: z.string(),
  paraphraseSource: z.enum(["model", "fallback"]),
  trace: RunTraceSchema.nullable(),
  resolutionType: ResolutionTypeSchema.nullable(),
  escalate: z.boolean().nullable(),
  confidenceScore: z.number().nullable(),
  matchesOriginal: z.boolean(),
  error: z.string().nullable(),
});

export const ReplaySessionSchema: z.ZodType<ReplaySession, z.ZodTypeDef, unknown> = z.object({
  sessionId: z.string(),
  traceId: z.string(),
  issueId: z.string(),
  nRuns: z.number(),
  matches: z.number(),
  stabilityScore: z.number().nullable(),
  status: z.enum(["running", "completed", "failed"]),
  seed: z.number().nullable(),
  original: z.object({
    resolutionType: ResolutionTypeSchema,
    escalate: z.boolean(),
  }),
  runs: z.array(ReplayRunSchema),
  createdAt: z.string(),
  completedAt: z.string().nullable(),
  error: z.string().nullable(),
});
