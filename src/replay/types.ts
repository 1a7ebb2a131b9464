/**
 * Replay session types
 */

import type { RunTrace } from "../orchestrator/core.js";
import type { ResolutionType } from "../orchestrator/terminal.js";

export type ReplayStatus = "running" | "completed" | "failed";

export type ParaphraseSource = "model" | "fallback";

/**
 * One re-investigation of a paraphrased issue
 */
export interface ReplayRun {
  runId: string;
  index: number;
  perturbation: string;
  paraphraseSource: ParaphraseSource;
  /** Null when the child could not start */
  trace: RunTrace | null;
  resolutionType: ResolutionType | null;
  escalate: boolean | null;
  confidenceScore: number | null;
  matchesOriginal: boolean;
  error: string | null;
}

/**
 * Stability evaluation of one source trace
 */
export interface ReplaySession {
  sessionId: string;
  traceId: string;
  issueId: string;
  nRuns: number;
  matches: number;
  /** Null until every child is terminal */
  stabilityScore: number | null;
  status: ReplayStatus;
  seed: number | null;
  original: {
    resolutionType: ResolutionType;
    escalate: boolean;
  };
  runs: ReplayRun[];
  createdAt: string;
  completedAt: string | null;
  error: string | null;
}
