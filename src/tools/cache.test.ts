/**
 * Tests for the tool result cache
 */

import { describe, it, expect } from "vitest";
import { ToolResultCache, cacheKey, digestArgs, stableStringify } from "./cache.js";

describe("stableStringify", () => {
  it("sorts keys at every depth", () => {
    expect(stableStringify({ b: 1, a: { d: 2, c: [{ f: 1, e: 2 }] } })).toBe(
      '{"a":{"c":[{"e":2,"f":1}],"d":2},"b":1}',
    );
  });

  it("drops undefined values", () => {
    expect(stableStringify({ a: undefined, b: null })).toBe('{"b":null}');
  });
});

describe("cacheKey", () => {
  it("ignores argument order", () => {
    expect(cacheKey("customer_lookup", { a: 1, b: 2 })).toBe(cacheKey("customer_lookup", { b: 2, a: 1 }));
  });

  it("separates tools with the same arguments", () => {
    expect(cacheKey("account_lookup", { customer_id: "C1" })).not.toBe(
      cacheKey("customer_lookup", { customer_id: "C1" }),
    );
  });

  it("uses the configured digest length", () => {
    const key = cacheKey("policy_search", { query: "wire" }, 8);
    expect(key).toMatch(/^tool:policy_search:[0-9a-f]{8}$/);
    expect(key.endsWith(digestArgs({ query: "wire" }, 8))).toBe(true);
  });
});

describe("ToolResultCache", () => {
  it("returns a stored value until its class TTL passes", () => {
    let now = 1_000;
    const cache = new ToolResultCache({ now: () => now });

    cache.set("k", { name: "Alice" }, "lookup");
    now += 59_999;
    expect(cache.get("k")).toEqual({ name: "Alice" });

    now += 1;
    expect(cache.get("k")).toBeUndefined();
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, sets: 1, expired: 1, size: 0 });
  });

  it("applies per-class TTL overrides", () => {
    const cache = new ToolResultCache({ ttl: { reference: 10 } });
    expect(cache.ttlFor("reference")).toBe(10_000);
    expect(cache.ttlFor("similarity")).toBe(120_000);
  });

  it("hands out copies that callers cannot mutate", () => {
    const cache = new ToolResultCache();
    cache.set("k", { accounts: [{ id: "A1" }] }, "lookup");

    const first = cache.get("k");
    if (first) first.accounts = [];

    expect(cache.get("k")).toEqual({ accounts: [{ id: "A1" }] });
  });

  it("clears entries", () => {
    const cache = new ToolResultCache();
    cache.set("a", { x: 1 }, "lookup");
    cache.set("b", { x: 2 }, "lookup");
    expect(cache.delete("a")).toBe(true);
    cache.clear();
    expect(cache.stats().size).toBe(0);
  });
});
