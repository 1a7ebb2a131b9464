/**
 * Tool result cache - TTL cache shared by all investigations in the process
 */

import crypto from "node:crypto";
import type { ToolClass, ToolPayload } from "./types.js";

/**
 * TTL per tool class, in seconds
 */
export type CacheTtlConfig = Record<ToolClass, number>;

export const DEFAULT_CACHE_TTL: CacheTtlConfig = {
  lookup: 60,
  similarity: 120,
  reference: 300,
};

/** Hex characters kept from the SHA-256 digest in a cache key */
export const DEFAULT_KEY_DIGEST_LENGTH = 16;

/**
 * JSON serialization with object keys sorted at every depth
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "object" && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) {
        sorted[key] = canonicalize(entry);
      }
    }
    return sorted;
  }
  return value;
}

/**
 * Truncated SHA-256 of the canonical JSON of the arguments
 */
export function digestArgs(args: Record<string, unknown>, length: number): string {
  return crypto.createHash("sha256").update(stableStringify(args)).digest("hex").slice(0, length);
}

/**
 * Cache key for a tool call. Truncation trades a small collision risk for compact keys.
 */
export function cacheKey(
  tool: string,
  args: Record<string, unknown>,
  digestLength: number = DEFAULT_KEY_DIGEST_LENGTH,
): string {
  return `tool:${tool}:${digestArgs(args, digestLength)}`;
}

interface CacheEntry {
  /** Serialized payload; every read gets its own copy */
  value: string;
  expiresAt: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  sets: number;
  expired: number;
  size: number;
}

/**
 * In-process TTL cache. Expiry is checked lazily on lookup; there is no sweeper.
 */
export class ToolResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttl: CacheTtlConfig;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private sets = 0;
  private expired = 0;

  constructor(options?: { ttl?: Partial<CacheTtlConfig>; now?: () => number }) {
    this.ttl = { ...DEFAULT_CACHE_TTL, ...options?.ttl };
    this.now = options?.now ?? Date.now;
  }

  /**
   * TTL in milliseconds for a tool class
   */
  ttlFor(toolClass: ToolClass): number {
    return this.ttl[toolClass] * 1000;
  }

  get(key: string): ToolPayload | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      this.expired++;
      this.misses++;
      return undefined;
    }

    this.hits++;
    return parsePayload(entry.value);
  }

  set(key: string, value: ToolPayload, toolClass: ToolClass): void {
    this.entries.set(key, {
      value: JSON.stringify(value),
      expiresAt: this.now() + this.ttlFor(toolClass),
    });
    this.sets++;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      sets: this.sets,
      expired: this.expired,
      size: this.entries.size,
    };
  }
}

function parsePayload(serialized: string): ToolPayload {
  const parsed: unknown = JSON.parse(serialized);
  if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
    return { ...parsed };
  }
  return { value: parsed };
}
