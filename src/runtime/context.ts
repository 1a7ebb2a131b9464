/**
 * Runtime wiring for casetrail commands and the daemon
 */

import { fileURLToPath } from "node:url";
import { AnthropicCompletionProvider } from "../completion/anthropic.js";
import type { CompletionProvider, CompletionRequest, CompletionResponse } from "../completion/types.js";
import type { CasetrailConfig } from "../config/types.js";
import { MemoryIssueSource } from "../issues/source.js";
import type { IssueSource } from "../issues/types.js";
import { CriticReviewer } from "../orchestrator/critic.js";
import { Investigator } from "../orchestrator/runner.js";
import { PolicyEvaluator } from "../policy/evaluator.js";
import { ParaphraseGenerator } from "../replay/paraphrase.js";
import { ReplayEngine } from "../replay/engine.js";
import { FileRunStore, type RunStore } from "../store/run-store.js";
import { ToolResultCache } from "../tools/cache.js";
import { type CaseDataset, datasetIssues, loadDataset } from "../tools/dataset.js";
import { createDatasetTools } from "../tools/dataset-tools.js";
import { ToolDispatcher } from "../tools/dispatcher.js";
import { DEFAULT_TOOL_CATALOG, ToolCatalog, type ToolCollaborator } from "../tools/types.js";
import type { CasetrailLogger } from "./logger.js";

/** Dataset shipped with the package, used when the config names none */
export const BUNDLED_DATASET_PATH = fileURLToPath(
  new URL("../../data/sample-dataset.json", import.meta.url),
);

/**
 * Everything a command needs to investigate and replay
 */
export interface Runtime {
  config: CasetrailConfig;
  logger: CasetrailLogger;
  provider: CompletionProvider;
  catalog: ToolCatalog;
  cache: ToolResultCache;
  dispatcher: ToolDispatcher;
  policy: PolicyEvaluator;
  store: RunStore;
  issues: IssueSource;
  investigator: Investigator;
  replay: ReplayEngine;
}

export interface RuntimeOverrides {
  provider?: CompletionProvider;
  store?: RunStore;
  issues?: IssueSource;
  collaborators?: ReadonlyMap<string, ToolCollaborator>;
  dataset?: CaseDataset;
}

/**
 * Anthropic provider created on first use, so commands that never call
 * the model run without an API key
 */
export class LazyAnthropicProvider implements CompletionProvider {
  private provider: AnthropicCompletionProvider | null = null;

  constructor(
    private readonly config: CasetrailConfig["model"],
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    if (!this.provider) {
      const apiKey = this.env[this.config.apiKeyEnv];
      if (!apiKey) {
        throw new Error(`${this.config.apiKeyEnv} is not set`);
      }
      this.provider = new AnthropicCompletionProvider({
        apiKey,
        model: this.config.investigation,
        maxTokens: this.config.maxTokens,
      });
    }
    return this.provider.complete(request);
  }
}

/**
 * Load the configured dataset, or the bundled sample
 */
export async function loadConfiguredDataset(config: CasetrailConfig): Promise<CaseDataset> {
  return loadDataset(config.dataset.path ?? BUNDLED_DATASET_PATH);
}

/**
 * Build the runtime from config. Overrides replace the default collaborators.
 */
export async function createRuntime(
  config: CasetrailConfig,
  logger: CasetrailLogger,
  overrides: RuntimeOverrides = {},
): Promise<Runtime> {
  const needsDataset = !overrides.collaborators || !overrides.issues;
  const dataset = overrides.dataset ?? (needsDataset ? await loadConfiguredDataset(config) : undefined);

  const provider = overrides.provider ?? new LazyAnthropicProvider(config.model);
  const store = overrides.store ?? new FileRunStore();
  const issues = overrides.issues ?? new MemoryIssueSource(dataset ? datasetIssues(dataset) : []);
  const collaborators =
    overrides.collaborators ?? (dataset ? createDatasetTools(dataset) : new Map<string, ToolCollaborator>());

  const catalog = new ToolCatalog(DEFAULT_TOOL_CATALOG);
  const cache = new ToolResultCache({ ttl: config.cache.ttlSeconds });
  const dispatcher = new ToolDispatcher({
    catalog,
    collaborators,
    cache,
    logger,
    toolTimeoutMs: config.limits.toolTimeoutMs,
    keyDigestLength: config.cache.keyDigestLength,
  });
  const policy = new PolicyEvaluator(config.policy);

  const critic = config.critic.enabled
    ? new CriticReviewer({ provider, model: config.model.critic, logger })
    : undefined;

  const investigator = new Investigator({
    provider,
    catalog,
    dispatcher,
    policy,
    store,
    logger,
    issues,
    critic,
    limits: config.limits,
    model: config.model.investigation,
  });

  const replay = new ReplayEngine({
    investigator,
    paraphraser: new ParaphraseGenerator({ provider, model: config.model.paraphrase, logger }),
    store,
    issues,
    logger,
    defaultRuns: config.replay.defaultRuns,
    concurrency: config.replay.concurrency,
    sessionTimeoutMs: config.replay.sessionTimeoutMs,
    seed: config.replay.seed,
  });

  return {
    config,
    logger,
    provider,
    catalog,
    cache,
    dispatcher,
    policy,
    store,
    issues,
    investigator,
    replay,
  };
}
