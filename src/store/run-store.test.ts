import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createInvestigationContext, finalizeTrace, type RunTrace } from "../orchestrator/core.js";
import type { ReplaySession } from "../replay/types.js";
import { sampleIssue } from "../testing/fakes.js";
import { FileRunStore, MemoryRunStore } from "./run-store.js";

function runningTrace(issueId = "ISS-100", startedAt?: string): RunTrace {
  const { trace } = createInvestigationContext(sampleIssue({ issueId }));
  return startedAt ? { ...trace, startedAt } : trace;
}

function completedTrace(): RunTrace {
  const ctx = createInvestigationContext(sampleIssue());
  ctx.trace.turns = 1;
  ctx.trace.structuredOutput = {
    issue_type: "WIRE_DELAY",
    root_cause: "AML hold",
    resolution: "Wait for release",
    resolution_type: "AUTO_RESOLVED",
    next_steps: [],
    confidence_score: 0.9,
    escalate: false,
    escalation_priority: undefined,
    policy_flags: [],
  };
  ctx.trace.toolCalls.push({
    turn: 1,
    tool: "customer_lookup",
    argsDigest: "abc123def456",
    latencyMs: 1.5,
    cacheHit: false,
    resultSummary: "Customer: Alice | KYC: verified",
    isError: false,
  });
  return structuredClone(finalizeTrace(ctx, "completed"));
}

function session(traceId: string): ReplaySession {
  return {
    sessionId: "session-1",
    traceId,
    issueId: "ISS-100",
    nRuns: 3,
    matches: 0,
    stabilityScore: null,
    status: "running",
    seed: 7,
    original: { resolutionType: "AUTO_RESOLVED", escalate: false },
    runs: [],
    createdAt: "2025-03-15T12:00:00.000Z",
    completedAt: null,
    error: null,
  };
}

describe("MemoryRunStore", () => {
  let store: MemoryRunStore;

  beforeEach(() => {
    store = new MemoryRunStore();
  });

  it("rejects a second trace with the same id", async () => {
    const trace = runningTrace();
    await store.createTrace(trace);

    await expect(store.createTrace(trace)).rejects.toThrow(`Trace already exists: ${trace.traceId}`);
  });

  it("hands out copies", async () => {
    const trace = runningTrace();
    await store.createTrace(trace);

    const copy = await store.getTrace(trace.traceId);
    copy?.reasoning.push({ timestamp: "t", turn: 0, type: "error", message: "changed" });

    expect((await store.getTrace(trace.traceId))?.reasoning).toEqual([]);
  });

  it("lists newest first with filters", async () => {
    const older = runningTrace("ISS-1", "2025-03-01T00:00:00.000Z");
    const newer = runningTrace("ISS-1", "2025-03-02T00:00:00.000Z");
    const other = runningTrace("ISS-2", "2025-03-03T00:00:00.000Z");
    for (const trace of [older, newer, other]) {
      await store.createTrace(trace);
    }

    expect((await store.listTraces()).map((t) => t.traceId)).toEqual([
      other.traceId,
      newer.traceId,
      older.traceId,
    ]);
    expect((await store.listTraces({ issueId: "ISS-1" })).map((t) => t.traceId)).toEqual([
      newer.traceId,
      older.traceId,
    ]);
    expect(await store.listTraces({ status: "completed" })).toEqual([]);
    expect(await store.listTraces({ limit: 1 })).toHaveLength(1);
  });
});

describe("FileRunStore", () => {
  let dir: string;
  let store: FileRunStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "casetrail-store-"));
    store = new FileRunStore(dir);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("round-trips a trace through disk", async () => {
    const trace = completedTrace();
    await store.createTrace(trace);

    const loaded = await store.getTrace(trace.traceId);

    expect(loaded?.status).toBe("completed");
    expect(loaded?.toolCalls).toEqual(trace.toolCalls);
    expect(loaded?.structuredOutput?.resolution_type).toBe("AUTO_RESOLVED");
    expect(await fs.readdir(path.join(dir, "runs"))).toEqual([`${trace.traceId}.json`]);
  });

  it("overwrites on update", async () => {
    const trace = runningTrace();
    await store.createTrace(trace);
    await store.updateTrace({ ...trace, status: "failed", error: { code: "X", message: "boom" } });

    const loaded = await store.getTrace(trace.traceId);
    expect(loaded?.status).toBe("failed");
    expect(loaded?.error).toEqual({ code: "X", message: "boom" });
  });

  it("returns nothing for unknown ids and an empty list before any write", async () => {
    expect(await store.getTrace("missing")).toBeUndefined();
    expect(await store.getReplay("missing")).toBeUndefined();
    expect(await store.listTraces()).toEqual([]);
  });

  it("refuses ids that would leave the store directory", async () => {
    await expect(store.getTrace("../config")).rejects.toThrow("Invalid id: ../config");
  });

  it("filters listed traces", async () => {
    const primary = runningTrace();
    const replay = { ...runningTrace(), isReplay: true };
    await store.createTrace(primary);
    await store.createTrace(replay);

    const listed = await store.listTraces({ isReplay: false });
    expect(listed.map((t) => t.traceId)).toEqual([primary.traceId]);
  });

  it("round-trips a replay session", async () => {
    const value = session("trace-1");
    await store.createReplay(value);
    await store.updateReplay({ ...value, status: "completed", stabilityScore: 1, matches: 3 });

    const loaded = await store.getReplay("session-1");
    expect(loaded?.status).toBe("completed");
    expect(loaded?.stabilityScore).toBe(1);
    expect(loaded?.seed).toBe(7);
  });
});
