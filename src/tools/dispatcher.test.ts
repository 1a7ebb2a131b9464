/**
 * Tests for the tool dispatcher
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createMockLogger, staticCollaborator } from "../testing/fakes.js";
import type { CasetrailLogger } from "../runtime/logger.js";
import { ToolResultCache } from "./cache.js";
import { ToolDispatcher, MIN_INVOKE_LATENCY_MS, RECORD_DIGEST_LENGTH } from "./dispatcher.js";
import { ToolCatalog, ToolErrorCode, type ToolCatalogEntry, type ToolCollaborator } from "./types.js";

const ENTRIES: ToolCatalogEntry[] = [
  {
    name: "customer_lookup",
    description: "Look up a customer",
    inputSchema: {
      type: "object",
      properties: { customer_id: { type: "string" } },
      required: ["customer_id"],
    },
    toolClass: "lookup",
    recoverable: true,
  },
  {
    name: "ledger_snapshot",
    description: "Snapshot the ledger",
    inputSchema: { type: "object", properties: {} },
    toolClass: "lookup",
    recoverable: false,
  },
];

describe("ToolDispatcher", () => {
  let logger: CasetrailLogger;
  let cache: ToolResultCache;

  beforeEach(() => {
    logger = createMockLogger();
    cache = new ToolResultCache();
  });

  function dispatcherWith(collaborators: Record<string, ToolCollaborator>, toolTimeoutMs?: number) {
    return new ToolDispatcher({
      catalog: new ToolCatalog(ENTRIES),
      collaborators: new Map(Object.entries(collaborators)),
      cache,
      logger,
      toolTimeoutMs,
    });
  }

  it("invokes the collaborator on a miss and serves the cache on a repeat", async () => {
    const customer = staticCollaborator({ name: "Alice", kyc_status: "verified" });
    const dispatcher = dispatcherWith({ customer_lookup: customer });

    const first = await dispatcher.dispatch("customer_lookup", { customer_id: "C1" }, 1);
    const second = await dispatcher.dispatch("customer_lookup", { customer_id: "C1" }, 2);

    expect(customer.calls).toBe(1);
    expect(first.result).toEqual(second.result);
    expect(first.record.cacheHit).toBe(false);
    expect(second.record.cacheHit).toBe(true);
    expect(second.record.latencyMs).toBeLessThan(first.record.latencyMs);
    expect(second.record.turn).toBe(2);
    expect(first.record.argsDigest).toHaveLength(RECORD_DIGEST_LENGTH);
    expect(first.record.resultSummary).toBe("Customer: Alice | KYC: verified");
    expect(logger.tool).toHaveBeenCalledTimes(2);
  });

  it("records a cache hit as faster than the miss that filled it", async () => {
    const slow: ToolCollaborator = {
      async invoke() {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return { name: "Alice" };
      },
    };
    const dispatcher = dispatcherWith({ customer_lookup: slow });

    const first = await dispatcher.dispatch("customer_lookup", { customer_id: "C1" });
    const second = await dispatcher.dispatch("customer_lookup", { customer_id: "C1" });

    expect(first.record.latencyMs).toBeGreaterThan(1);
    expect(second.record.cacheHit).toBe(true);
    expect(second.record.latencyMs).toBe(0);
    expect(second.record.latencyMs).toBeLessThan(first.record.latencyMs);
  });

  it("keeps hits faster than misses for instant collaborators", async () => {
    const dispatcher = dispatcherWith({ customer_lookup: staticCollaborator({ name: "Alice" }) });

    for (let i = 0; i < 200; i++) {
      const args = { customer_id: `C${i}` };
      const miss = await dispatcher.dispatch("customer_lookup", args);
      const hit = await dispatcher.dispatch("customer_lookup", args);

      expect(miss.record.cacheHit).toBe(false);
      expect(miss.record.latencyMs).toBeGreaterThanOrEqual(MIN_INVOKE_LATENCY_MS);
      expect(hit.record.cacheHit).toBe(true);
      expect(hit.record.latencyMs).toBeLessThan(miss.record.latencyMs);
    }
  });

  it("returns frozen records", async () => {
    const dispatcher = dispatcherWith({ customer_lookup: staticCollaborator({ name: "A" }) });
    const { record } = await dispatcher.dispatch("customer_lookup", { customer_id: "C1" });
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("reports unknown tools without throwing", async () => {
    const dispatcher = dispatcherWith({});
    const { record, result, fatal } = await dispatcher.dispatch("wire_money", { amount: 1 });

    expect(result).toEqual({ error: { code: ToolErrorCode.UNKNOWN_TOOL, message: "Unknown tool: wire_money" } });
    expect(record.isError).toBe(true);
    expect(record.resultSummary).toBe("ERROR: Unknown tool: wire_money");
    expect(fatal).toBe(false);
  });

  it("rejects calls missing required arguments", async () => {
    const customer = staticCollaborator({ name: "A" });
    const dispatcher = dispatcherWith({ customer_lookup: customer });

    const { result } = await dispatcher.dispatch("customer_lookup", {});

    expect(result).toEqual({
      error: { code: ToolErrorCode.INVALID_ARGUMENTS, message: "Missing required argument(s): customer_id" },
    });
    expect(customer.calls).toBe(0);
  });

  it("does not cache errors", async () => {
    const failing = staticCollaborator({ error: { code: ToolErrorCode.NOT_FOUND, message: "Customer 'C9' not found." } });
    const dispatcher = dispatcherWith({ customer_lookup: failing });

    await dispatcher.dispatch("customer_lookup", { customer_id: "C9" });
    const second = await dispatcher.dispatch("customer_lookup", { customer_id: "C9" });

    expect(failing.calls).toBe(2);
    expect(second.record.cacheHit).toBe(false);
    expect(cache.stats().sets).toBe(0);
  });

  it("converts thrown collaborator errors into internal errors", async () => {
    const dispatcher = dispatcherWith({
      customer_lookup: {
        async invoke() {
          throw new Error("connection reset");
        },
      },
    });

    const { result } = await dispatcher.dispatch("customer_lookup", { customer_id: "C1" });
    expect(result).toEqual({ error: { code: ToolErrorCode.INTERNAL_ERROR, message: "connection reset" } });
  });

  it("times out slow collaborators and aborts their signal", async () => {
    let aborted = false;
    const dispatcher = dispatcherWith(
      {
        customer_lookup: {
          invoke(_args, signal) {
            return new Promise<never>(() => {
              signal.addEventListener("abort", () => {
                aborted = true;
              });
            });
          },
        },
      },
      20,
    );

    const { result } = await dispatcher.dispatch("customer_lookup", { customer_id: "C1" });

    expect(result).toEqual({
      error: { code: ToolErrorCode.TIMEOUT, message: "Tool customer_lookup timed out after 20ms" },
    });
    expect(aborted).toBe(true);
  });

  it("marks failures of non-recoverable tools as fatal", async () => {
    const dispatcher = dispatcherWith({
      ledger_snapshot: staticCollaborator({ error: { code: ToolErrorCode.INTERNAL_ERROR, message: "ledger offline" } }),
    });

    const { fatal, record } = await dispatcher.dispatch("ledger_snapshot", {});
    expect(fatal).toBe(true);
    expect(record.isError).toBe(true);
  });

  it("reports a missing collaborator as an internal error", async () => {
    const dispatcher = dispatcherWith({});
    const { result } = await dispatcher.dispatch("customer_lookup", { customer_id: "C1" });
    expect(result).toEqual({
      error: { code: ToolErrorCode.INTERNAL_ERROR, message: "No collaborator registered for customer_lookup" },
    });
  });
});
