import { describe, it, expect } from "vitest";
import type { RunTrace } from "../orchestrator/core.js";
import type { ReplaySession } from "../replay/types.js";
import { formatSession, formatTraceLine, formatVerdict } from "./format.js";

const TRACE: RunTrace = {
  traceId: "trace-1",
  issueId: "ISS-9002",
  customerId: "CUS-1002",
  isReplay: false,
  startedAt: "2025-03-15T12:00:00.000Z",
  completedAt: "2025-03-15T12:00:04.000Z",
  durationMs: 4000,
  status: "escalated",
  toolCalls: [],
  reasoning: [],
  structuredOutput: {
    issue_type: "UNAUTH_TRADE",
    root_cause: "Trade from an unrecognized device.",
    resolution: "Referred to security.",
    resolution_type: "ESCALATED",
    next_steps: ["Freeze trading"],
    confidence_score: 0.9,
    escalate: true,
    escalation_priority: "HIGH",
    policy_flags: ["MANDATORY_ESCALATION"],
  },
  policy: { matchedRules: ["fraud-signal"], flagsAdded: ["MANDATORY_ESCALATION"], forcedEscalation: true },
  tokenUsage: { inputTokens: 900, outputTokens: 100, totalTokens: 1000 },
  turns: 4,
  model: "test-model",
  error: null,
  critic: { agrees: false, notes: "Check the device history.", model: "test-model", available: true },
};

describe("formatVerdict", () => {
  it("renders the verdict block", () => {
    expect(formatVerdict(TRACE).split("\n")).toEqual([
      "Trace:      trace-1",
      "Issue:      ISS-9002",
      "Status:     escalated",
      "Type:       UNAUTH_TRADE",
      "Resolution: ESCALATED (confidence 0.90)",
      "Escalate:   yes (HIGH)",
      "Flags:      MANDATORY_ESCALATION",
      "",
      "Root cause: Trade from an unrecognized device.",
      "Resolution: Referred to security.",
      "  - Freeze trading",
      "",
      "Critic:     disagrees - Check the device history.",
      "",
      "4 turns, 0 tool calls, 1000 tokens, 4000ms",
    ]);
  });
});

describe("formatTraceLine", () => {
  it("marks escalated verdicts and replays", () => {
    expect(formatTraceLine({ ...TRACE, isReplay: true })).toBe(
      "trace-1  ISS-9002  escalated  ESCALATED (escalated) [replay]  2025-03-15T12:00:00.000Z",
    );
  });
});

describe("formatSession", () => {
  it("lists each run under the score", () => {
    const session: ReplaySession = {
      sessionId: "session-1",
      traceId: "trace-1",
      issueId: "ISS-9002",
      nRuns: 1,
      matches: 0,
      stabilityScore: 0,
      status: "completed",
      seed: null,
      original: { resolutionType: "ESCALATED", escalate: true },
      runs: [
        {
          runId: "run-1",
          index: 0,
          perturbation: "Someone bought shares in my name!",
          paraphraseSource: "fallback",
          trace: null,
          resolutionType: null,
          escalate: null,
          confidenceScore: null,
          matchesOriginal: false,
          error: "upstream down",
        },
      ],
      createdAt: "2025-03-15T12:00:00.000Z",
      completedAt: "2025-03-15T12:01:00.000Z",
      error: null,
    };

    expect(formatSession(session).split("\n")).toEqual([
      "Session:    session-1",
      "Trace:      trace-1",
      "Status:     completed",
      "Original:   ESCALATED / escalate=true",
      "Stability:  0.000 (0/1 matched)",
      "",
      "  #1 differs: no verdict [fallback]",
      "     Someone bought shares in my name!",
      "     error: upstream down",
    ]);
  });
});
