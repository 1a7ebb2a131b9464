/**
 * Replay engine - stability of a verdict under rewording of the issue
 */

import crypto from "node:crypto";
import { InvalidInputError, NotFoundError, errorMessage } from "../errors.js";
import type { Issue, IssueSource } from "../issues/types.js";
import type { RunTrace } from "../orchestrator/core.js";
import type { Investigator } from "../orchestrator/runner.js";
import type { CasetrailLogger } from "../runtime/logger.js";
import type { RunStore } from "../store/run-store.js";
import type { Paraphrase, ParaphraseGenerator } from "./paraphrase.js";
import type { ReplayRun, ReplaySession } from "./types.js";

export const MAX_REPLAY_RUNS = 20;

export type ReplayEvent =
  | { type: "replay.started"; session: ReplaySession }
  | { type: "replay.run_completed"; sessionId: string; run: ReplayRun }
  | { type: "replay.completed"; session: ReplaySession };

export type ReplayEventHandler = (event: ReplayEvent) => void;

export interface ReplayEngineOptions {
  investigator: Investigator;
  paraphraser: ParaphraseGenerator;
  store: RunStore;
  issues: IssueSource;
  logger: CasetrailLogger;
  defaultRuns?: number;
  concurrency?: number;
  sessionTimeoutMs?: number;
  seed?: number;
}

/**
 * Fraction of matching runs, rounded to 3 decimals
 */
export function computeStability(matches: number, total: number): number {
  if (total <= 0) return 0;
  return Math.round((matches / total) * 1000) / 1000;
}

/**
 * A child matches when both resolution type and escalation agree with the original
 */
export function matchesOriginal(original: ReplaySession["original"], trace: RunTrace | null): boolean {
  if (!trace || trace.status === "failed" || !trace.structuredOutput) return false;
  const output = trace.structuredOutput;
  return output.resolution_type === original.resolutionType && output.escalate === original.escalate;
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight
 */
async function runPool<T>(
  items: T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let next = 0;
  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, async () => {
    while (next < items.length) {
      const index = next++;
      await worker(items[index], index);
    }
  });
  await Promise.all(lanes);
}

/**
 * Serializes session writes so progress lands in order
 */
class SessionWriter {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: RunStore,
    private readonly logger: CasetrailLogger,
  ) {}

  /** Queue a progress snapshot. Progress write failures are logged, not raised. */
  save(session: ReplaySession): Promise<void> {
    const snapshot = structuredClone(session);
    this.tail = this.tail
      .then(() => this.store.updateReplay(snapshot))
      .catch((error: unknown) => {
        this.logger.warn("Could not persist replay progress", {
          sessionId: snapshot.sessionId,
          error: errorMessage(error),
        });
      });
    return this.tail;
  }

  /** Final write after queued progress; failures propagate */
  async finish(session: ReplaySession): Promise<void> {
    await this.tail;
    await this.store.updateReplay(structuredClone(session));
  }
}

export class ReplayEngine {
  private readonly investigator: Investigator;
  private readonly paraphraser: ParaphraseGenerator;
  private readonly store: RunStore;
  private readonly issues: IssueSource;
  private readonly logger: CasetrailLogger;
  private readonly defaultRuns: number;
  private readonly concurrency: number;
  private readonly sessionTimeoutMs: number;
  private readonly seed?: number;
  private readonly handlers = new Set<ReplayEventHandler>();
  private readonly inflight = new Set<Promise<void>>();

  constructor(options: ReplayEngineOptions) {
    this.investigator = options.investigator;
    this.paraphraser = options.paraphraser;
    this.store = options.store;
    this.issues = options.issues;
    this.logger = options.logger;
    this.defaultRuns = options.defaultRuns ?? 3;
    this.concurrency = options.concurrency ?? 3;
    this.sessionTimeoutMs = options.sessionTimeoutMs ?? 900_000;
    this.seed = options.seed;
  }

  onEvent(handler: ReplayEventHandler): () => void {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  /**
   * Replay a completed trace and wait for the session to finish
   */
  async replay(traceId: string, nRuns?: number): Promise<ReplaySession> {
    const { session, issue } = await this.prepare(traceId, nRuns);
    return this.execute(session, issue);
  }

  /**
   * Start a replay in the background and return the running session
   */
  async start(traceId: string, nRuns?: number): Promise<ReplaySession> {
    const { session, issue } = await this.prepare(traceId, nRuns);
    const snapshot = structuredClone(session);

    const tracked: Promise<void> = this.execute(session, issue)
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error(`Replay session ${session.sessionId} could not be saved`, {
            error: errorMessage(error),
          });
        },
      )
      .finally(() => {
        this.inflight.delete(tracked);
      });
    this.inflight.add(tracked);

    return snapshot;
  }

  /**
   * Wait for every background session
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.inflight));
  }

  private async prepare(
    traceId: string,
    nRuns: number = this.defaultRuns,
  ): Promise<{ session: ReplaySession; issue: Issue }> {
    if (!Number.isInteger(nRuns) || nRuns < 1 || nRuns > MAX_REPLAY_RUNS) {
      throw new InvalidInputError(`Replay run count must be between 1 and ${MAX_REPLAY_RUNS}`, {
        nRuns,
      });
    }

    const source = await this.store.getTrace(traceId);
    if (!source) {
      throw new NotFoundError("Trace", traceId);
    }
    if (source.isReplay) {
      throw new InvalidInputError(`Trace ${traceId} is itself a replay`);
    }
    const verdict = source.structuredOutput;
    if (!verdict || source.status === "running" || source.status === "failed") {
      throw new InvalidInputError(`Trace ${traceId} has no verdict to replay`, {
        status: source.status,
      });
    }

    const issue = await this.issues.get(source.issueId);
    if (!issue) {
      throw new NotFoundError("Issue", source.issueId);
    }

    const session: ReplaySession = {
      sessionId: crypto.randomUUID(),
      traceId,
      issueId: source.issueId,
      nRuns,
      matches: 0,
      stabilityScore: null,
      status: "running",
      seed: this.seed ?? null,
      original: {
        resolutionType: verdict.resolution_type,
        escalate: verdict.escalate,
      },
      runs: [],
      createdAt: new Date().toISOString(),
      completedAt: null,
      error: null,
    };

    await this.store.createReplay(session);
    this.logger.info(`Replay session ${session.sessionId} started`, { traceId, nRuns });
    this.emit({ type: "replay.started", session: structuredClone(session) });

    return { session, issue };
  }

  private async execute(session: ReplaySession, issue: Issue): Promise<ReplaySession> {
    const writer = new SessionWriter(this.store, this.logger);
    const state = { finished: false };
    let timer: NodeJS.Timeout | undefined;

    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.sessionTimeoutMs);
    });

    try {
      const work = this.runChildren(session, issue, writer, state).then(() => "done" as const);
      const winner = await Promise.race([work, timedOut]);

      if (winner === "timeout") {
        session.status = "failed";
        session.error = `Replay session timed out after ${this.sessionTimeoutMs}ms`;
      } else {
        session.status = "completed";
        session.stabilityScore = computeStability(session.matches, session.nRuns);
      }
    } catch (error) {
      session.status = "failed";
      session.error = errorMessage(error);
    } finally {
      // Children finishing after this point leave the session untouched
      state.finished = true;
      clearTimeout(timer);
    }

    session.runs.sort((a, b) => a.index - b.index);
    session.completedAt = new Date().toISOString();
    await writer.finish(session);

    this.logger.info(`Replay session ${session.sessionId} ${session.status}`, {
      matches: session.matches,
      nRuns: session.nRuns,
      stabilityScore: session.stabilityScore,
      error: session.error,
    });
    this.emit({ type: "replay.completed", session: structuredClone(session) });

    return session;
  }

  private async runChildren(
    session: ReplaySession,
    issue: Issue,
    writer: SessionWriter,
    state: { finished: boolean },
  ): Promise<void> {
    const paraphrases = await this.paraphraser.generate(issue.rawMessage, session.nRuns, this.seed);

    await runPool(paraphrases, this.concurrency, async (paraphrase, index) => {
      const run = await this.runChild(session, issue, paraphrase, index);
      if (state.finished) {
        this.logger.debug(`Ignoring late replay run ${index}`, { sessionId: session.sessionId });
        return;
      }

      session.runs.push(run);
      if (run.matchesOriginal) {
        session.matches++;
      }
      this.emit({ type: "replay.run_completed", sessionId: session.sessionId, run });
      await writer.save(session);
    });
  }

  private async runChild(
    session: ReplaySession,
    issue: Issue,
    paraphrase: Paraphrase,
    index: number,
  ): Promise<ReplayRun> {
    const base = {
      runId: crypto.randomUUID(),
      index,
      perturbation: paraphrase.text,
      paraphraseSource: paraphrase.source,
    };

    try {
      const trace = await this.investigator.run(
        { ...issue, rawMessage: paraphrase.text },
        { isReplay: true, review: false },
      );
      const output = trace.structuredOutput;
      return {
        ...base,
        trace,
        resolutionType: output?.resolution_type ?? null,
        escalate: output?.escalate ?? null,
        confidenceScore: output?.confidence_score ?? null,
        matchesOriginal: matchesOriginal(session.original, trace),
        error: trace.error?.message ?? null,
      };
    } catch (error) {
      this.logger.warn(`Replay run ${index} could not start`, {
        sessionId: session.sessionId,
        error: errorMessage(error),
      });
      return {
        ...base,
        trace: null,
        resolutionType: null,
        escalate: null,
        confidenceScore: null,
        matchesOriginal: false,
        error: errorMessage(error),
      };
    }
  }

  private emit(event: ReplayEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.warn(`Event handler failed for ${event.type}`, { error: errorMessage(error) });
      }
    }
  }
}
