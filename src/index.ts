/**
 * casetrail - turn-bounded investigation of customer financial issues
 *
 * - Runs a model through declared tools until it submits a structured resolution
 * - Caches tool results and records every call in an immutable trace
 * - Applies escalation policy after the model, never inside it
 * - Measures verdict stability by replaying reworded issues
 */

// CLI
export { runCli, buildProgram } from "./cli/main.js";

// Errors
export {
  InvestigationError,
  InvestigationErrorCode,
  InvalidInputError,
  MalformedTerminalOutputError,
  ToolDispatchError,
  CompletionCapabilityError,
  NotFoundError,
} from "./errors.js";

// Completion capability
export type {
  CompletionProvider,
  CompletionRequest,
  CompletionResponse,
  ConversationTurn,
  ModelAction,
  ToolCallRequest,
  TokenUsage,
} from "./completion/types.js";
export { AnthropicCompletionProvider } from "./completion/anthropic.js";

// Issues
export type { Issue, IssueFilter, IssueSource, IssueStatus } from "./issues/types.js";
export { MemoryIssueSource } from "./issues/source.js";

// Tools
export {
  TERMINAL_TOOL_NAME,
  DEFAULT_TOOL_CATALOG,
  ToolCatalog,
  type ToolCatalogEntry,
  type ToolCollaborator,
  type ToolResult,
} from "./tools/types.js";
export { ToolResultCache, cacheKey, digestArgs } from "./tools/cache.js";
export { ToolDispatcher, type DispatchOutcome } from "./tools/dispatcher.js";
export { loadDataset, datasetIssues, type CaseDataset } from "./tools/dataset.js";
export { createDatasetTools } from "./tools/dataset-tools.js";

// Orchestrator
export {
  type RunTrace,
  type ToolCallRecord,
  type InvestigationLimits,
  DEFAULT_LIMITS,
  MAX_TURNS,
  formatRunLog,
} from "./orchestrator/core.js";
export { type StructuredOutput, StructuredOutputSchema } from "./orchestrator/terminal.js";
export { Investigator, type InvestigationEvent } from "./orchestrator/runner.js";
export { CriticReviewer } from "./orchestrator/critic.js";

// Policy
export { PolicyEvaluator, DEFAULT_POLICY_RULES } from "./policy/evaluator.js";

// Replay
export { ReplayEngine, computeStability, type ReplayEvent } from "./replay/engine.js";
export { ParaphraseGenerator } from "./replay/paraphrase.js";
export type { ReplaySession, ReplayRun } from "./replay/types.js";

// Storage
export { FileRunStore, MemoryRunStore, type RunStore } from "./store/run-store.js";

// Runtime
export { createRuntime, type Runtime } from "./runtime/context.js";
export { loadConfig, saveConfig, getConfigPath } from "./config/loader.js";
export type { CasetrailConfig } from "./config/types.js";

// Daemon and client
export { InvestigationDaemon } from "./server/daemon.js";
export { InvestigatorClient } from "./client/daemon-client.js";
export { ToolServer } from "./server/tool-server.js";
export { getOrCreateToken, regenerateToken, getTokenPath } from "./auth/token.js";
