/**
 * Tests for investigation core functions
 */

import { describe, it, expect } from "vitest";
import { sampleIssue } from "../testing/fakes.js";
import {
  createInvestigationContext,
  beginTurn,
  recordToolCall,
  addUsage,
  logEntry,
  finalizeTrace,
  truncateOutput,
  withTimeout,
  TimeoutError,
  formatRunLog,
  DEFAULT_LIMITS,
  MAX_TURNS,
  resolveLimits,
} from "./core.js";

describe("investigation core", () => {
  describe("createInvestigationContext", () => {
    it("starts a running trace with default limits", () => {
      const ctx = createInvestigationContext(sampleIssue());

      expect(ctx.trace.traceId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
      expect(ctx.trace.issueId).toBe("ISS-100");
      expect(ctx.trace.customerId).toBe("CUS-1");
      expect(ctx.trace.status).toBe("running");
      expect(ctx.trace.isReplay).toBe(false);
      expect(ctx.trace.turns).toBe(0);
      expect(ctx.limits).toEqual(DEFAULT_LIMITS);
    });

    it("merges custom limits", () => {
      const ctx = createInvestigationContext(sampleIssue(), { isReplay: true, limits: { maxTurns: 3 } });

      expect(ctx.trace.isReplay).toBe(true);
      expect(ctx.limits.maxTurns).toBe(3);
      expect(ctx.limits.toolTimeoutMs).toBe(DEFAULT_LIMITS.toolTimeoutMs);
    });
  });

  describe("resolveLimits", () => {
    it("never raises the turn budget above the hard cap", () => {
      expect(resolveLimits({ maxTurns: 30 }).maxTurns).toBe(MAX_TURNS);
      expect(resolveLimits({ maxTurns: 5 }).maxTurns).toBe(5);
      expect(resolveLimits()).toEqual(DEFAULT_LIMITS);
    });
  });

  describe("beginTurn", () => {
    it("refuses turns past the budget", () => {
      const ctx = createInvestigationContext(sampleIssue(), { limits: { maxTurns: 2 } });

      expect(beginTurn(ctx)).toBe(true);
      expect(beginTurn(ctx)).toBe(true);
      expect(beginTurn(ctx)).toBe(false);
      expect(ctx.trace.turns).toBe(2);
    });
  });

  describe("addUsage", () => {
    it("accumulates tokens and keeps the last model", () => {
      const ctx = createInvestigationContext(sampleIssue());
      addUsage(ctx, { inputTokens: 100, outputTokens: 10 }, "model-a");
      addUsage(ctx, { inputTokens: 50, outputTokens: 5 }, "model-b");

      expect(ctx.trace.tokenUsage).toEqual({ inputTokens: 150, outputTokens: 15, totalTokens: 165 });
      expect(ctx.trace.model).toBe("model-b");
    });
  });

  describe("finalizeTrace", () => {
    it("sets the terminal status and freezes the trace", () => {
      const ctx = createInvestigationContext(sampleIssue());
      beginTurn(ctx);
      logEntry(ctx, "assistant", "Looking up the customer");

      const trace = finalizeTrace(ctx, "failed", { code: "COMPLETION_CAPABILITY_ERROR", message: "down" });

      expect(trace.status).toBe("failed");
      expect(trace.error).toEqual({ code: "COMPLETION_CAPABILITY_ERROR", message: "down" });
      expect(trace.completedAt).not.toBeNull();
      expect(trace.durationMs).toBeGreaterThanOrEqual(0);
      expect(Object.isFrozen(trace)).toBe(true);
      expect(Object.isFrozen(trace.reasoning)).toBe(true);
      expect(Object.isFrozen(trace.reasoning[0])).toBe(true);
      expect(() => trace.toolCalls.push({
        turn: 1,
        tool: "x",
        argsDigest: "0",
        latencyMs: 0,
        cacheHit: false,
        resultSummary: "",
        isError: false,
      })).toThrow(TypeError);
    });
  });

  describe("truncateOutput", () => {
    it("leaves short output alone", () => {
      expect(truncateOutput("short", 100)).toBe("short");
    });

    it("cuts long output and marks it", () => {
      expect(truncateOutput("x".repeat(100), 50)).toBe(`${"x".repeat(30)}\n[TRUNCATED]`);
    });

    it("never splits a multi-byte character", () => {
      const result = truncateOutput("é".repeat(40), 40);
      expect(result).toBe(`${"é".repeat(10)}\n[TRUNCATED]`);
    });
  });

  describe("withTimeout", () => {
    it("returns the task result", async () => {
      await expect(withTimeout("Fast", 1_000, async () => 42)).resolves.toBe(42);
    });

    it("rejects and aborts when the timer fires", async () => {
      let signalAborted = false;
      const pending = withTimeout("Slow", 10, (signal) => {
        signal.addEventListener("abort", () => {
          signalAborted = true;
        });
        return new Promise<number>(() => {});
      });

      await expect(pending).rejects.toThrow(TimeoutError);
      await expect(pending).rejects.toThrow("Slow timed out after 10ms");
      expect(signalAborted).toBe(true);
    });
  });

  describe("formatRunLog", () => {
    it("renders tool calls and the resolution", () => {
      const ctx = createInvestigationContext(sampleIssue());
      beginTurn(ctx);
      recordToolCall(ctx, {
        turn: 1,
        tool: "customer_lookup",
        argsDigest: "a1b2c3d4e5f6",
        latencyMs: 1.5,
        cacheHit: true,
        resultSummary: "Customer: Alice | KYC: verified",
        isError: false,
      });
      ctx.trace.structuredOutput = {
        issue_type: "WIRE_DELAY",
        root_cause: "AML hold",
        resolution: "Wait",
        resolution_type: "AUTO_RESOLVED",
        next_steps: [],
        confidence_score: 0.9,
        escalate: false,
        escalation_priority: undefined,
        policy_flags: [],
      };
      const log = formatRunLog(finalizeTrace(ctx, "completed")).split("\n");

      expect(log[0]).toBe(`# Run Log: ${ctx.trace.traceId}`);
      expect(log).toContain("**Issue:** ISS-100 (customer CUS-1)");
      expect(log).toContain("**Status:** completed");
      expect(log).toContain("- Resolution: AUTO_RESOLVED");
      expect(log).toContain("- Escalate: false");
      expect(log).toContain("- Flags: none");
      expect(log).toContain("- `1` customer_lookup [a1b2c3d4e5f6] 1.5ms (cache): Customer: Alice | KYC: verified");
    });
  });
});
