/**
 * Configuration types for casetrail
 */

import { z } from "zod";
import { MAX_TURNS } from "../orchestrator/core.js";

/**
 * Model configuration
 */
export const ModelConfigSchema = z.object({
  /** Model used for the investigation loop */
  investigation: z.string().default("claude-sonnet-4-5"),
  /** Smaller model used by the critic */
  critic: z.string().default("claude-haiku-4-5"),
  /** Model used for paraphrase generation */
  paraphrase: z.string().default("claude-haiku-4-5"),
  /** Max output tokens per completion call */
  maxTokens: z.number().int().positive().default(4096),
  /** Environment variable holding the API key */
  apiKeyEnv: z.string().default("ANTHROPIC_API_KEY"),
});

export type ModelConfig = z.infer<typeof ModelConfigSchema>;

/**
 * Loop limits
 */
export const LimitsConfigSchema = z.object({
  /** May only lower the built-in turn budget */
  maxTurns: z.number().int().positive().max(MAX_TURNS).default(MAX_TURNS),
  /** Timeout for a single completion call (ms) */
  completionTimeoutMs: z.number().int().positive().default(120_000),
  /** Timeout for a single tool invocation (ms) */
  toolTimeoutMs: z.number().int().positive().default(15_000),
  /** Max bytes of a tool result fed back into the conversation */
  maxToolResultBytes: z.number().int().positive().default(16_384),
});

export type LimitsConfig = z.infer<typeof LimitsConfigSchema>;

/**
 * Tool result cache configuration
 */
export const CacheConfigSchema = z.object({
  /** TTL in seconds per tool class */
  ttlSeconds: z
    .object({
      lookup: z.number().positive().default(60),
      similarity: z.number().positive().default(120),
      reference: z.number().positive().default(300),
    })
    .default({}),
  /** Hex characters of the argument digest kept in cache keys */
  keyDigestLength: z.number().int().min(8).max(64).default(16),
});

export type CacheConfig = z.infer<typeof CacheConfigSchema>;

const OutputFieldSchema = z.enum([
  "issue_type",
  "root_cause",
  "resolution",
  "next_steps",
  "policy_flags",
]);

export type OutputField = z.infer<typeof OutputFieldSchema>;

const ResolutionTypeSchema = z.enum(["AUTO_RESOLVED", "ESCALATED", "REFUNDED", "CORRECTED"]);

/**
 * Rule conditions. Evaluated against the structured output only.
 * `issue_type` and `flag_present` compare whole codes; `keywords` searches text.
 */
export type RuleCondition =
  | { type: "keywords"; fields: OutputField[]; any: string[] }
  | { type: "issue_type"; in: string[] }
  | { type: "confidence_below"; threshold?: number }
  | { type: "resolution_type"; equals: z.infer<typeof ResolutionTypeSchema> }
  | { type: "flag_present"; flags: string[] }
  | { type: "all"; conditions: RuleCondition[] }
  | { type: "any"; conditions: RuleCondition[] };

export const RuleConditionSchema: z.ZodType<RuleCondition> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({
      type: z.literal("keywords"),
      fields: z.array(OutputFieldSchema).min(1),
      any: z.array(z.string().min(1)).min(1),
    }),
    z.object({ type: z.literal("issue_type"), in: z.array(z.string().min(1)).min(1) }),
    z.object({ type: z.literal("confidence_below"), threshold: z.number().min(0).max(1).optional() }),
    z.object({ type: z.literal("resolution_type"), equals: ResolutionTypeSchema }),
    z.object({ type: z.literal("flag_present"), flags: z.array(z.string()).min(1) }),
    z.object({ type: z.literal("all"), conditions: z.array(RuleConditionSchema).min(1) }),
    z.object({ type: z.literal("any"), conditions: z.array(RuleConditionSchema).min(1) }),
  ]),
);

/**
 * Escalation rule
 */
export const PolicyRuleSchema = z.object({
  id: z.string().min(1),
  description: z.string().default(""),
  when: RuleConditionSchema,
  flags: z.array(z.string()).default([]),
  forceEscalate: z.boolean().default(true),
  /** Priority applied when the output carries none */
  escalationPriority: z.enum(["LOW", "MEDIUM", "HIGH", "CRITICAL"]).optional(),
});

export type PolicyRule = z.infer<typeof PolicyRuleSchema>;

/**
 * Policy evaluator configuration. `rules` replaces the built-in table when set.
 */
export const PolicyConfigSchema = z.object({
  lowConfidenceThreshold: z.number().min(0).max(1).default(0.6),
  rules: z.array(PolicyRuleSchema).optional(),
});

export type PolicyConfig = z.infer<typeof PolicyConfigSchema>;

/**
 * Replay configuration
 */
export const ReplayConfigSchema = z.object({
  defaultRuns: z.number().int().min(1).max(20).default(3),
  /** Replay children investigated at the same time */
  concurrency: z.number().int().min(1).max(10).default(3),
  /** Allotted time for a whole session (ms) */
  sessionTimeoutMs: z.number().int().positive().default(900_000),
  /** Seed for reproducible paraphrase generation */
  seed: z.number().int().optional(),
});

export type ReplayConfig = z.infer<typeof ReplayConfigSchema>;

export const CriticConfigSchema = z.object({
  enabled: z.boolean().default(true),
});

export type CriticConfig = z.infer<typeof CriticConfigSchema>;

/**
 * Dataset backing the tool collaborators and the issue source
 */
export const DatasetConfigSchema = z.object({
  path: z.string().optional(),
});

export type DatasetConfig = z.infer<typeof DatasetConfigSchema>;

/**
 * Server configuration
 */
export const ServerConfigSchema = z.object({
  /** Host to bind to */
  host: z.string().default("127.0.0.1"),
  /** Port to listen on */
  port: z.number().int().min(0).max(65535).default(3848),
  /** Enable request logging */
  enableRequestLogging: z.boolean().default(true),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  /** Log level */
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  /** Directory for log files */
  logDir: z.string().optional(),
  /** Enable structured JSON logging */
  jsonLogs: z.boolean().default(false),
  /** Include timestamps */
  timestamps: z.boolean().default(true),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Main configuration
 */
export const CasetrailConfigSchema = z.object({
  /** Config version */
  version: z.literal(1).default(1),
  model: ModelConfigSchema.default({}),
  limits: LimitsConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  policy: PolicyConfigSchema.default({}),
  replay: ReplayConfigSchema.default({}),
  critic: CriticConfigSchema.default({}),
  dataset: DatasetConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type CasetrailConfig = z.infer<typeof CasetrailConfigSchema>;

/**
 * Default configuration
 */
export function getDefaultConfig(): CasetrailConfig {
  return CasetrailConfigSchema.parse({});
}
