/**
 * Tool dispatcher - routes tool calls through the cache to collaborators
 */

import { performance } from "node:perf_hooks";
import type { CasetrailLogger } from "../runtime/logger.js";
import type { ToolCallRecord } from "../orchestrator/core.js";
import { TimeoutError, withTimeout } from "../orchestrator/core.js";
import { errorMessage } from "../errors.js";
import { ToolResultCache, cacheKey, digestArgs, DEFAULT_KEY_DIGEST_LENGTH } from "./cache.js";
import { summarizeToolResult } from "./summarize.js";
import {
  type ToolCatalog,
  type ToolCatalogEntry,
  type ToolCollaborator,
  type ToolResult,
  ToolErrorCode,
  createToolError,
  isToolError,
} from "./types.js";

/** Hex characters of the argument digest stored on a record */
export const RECORD_DIGEST_LENGTH = 12;

export interface DispatchOutcome {
  record: ToolCallRecord;
  result: ToolResult;
  /** A non-recoverable tool failed; the investigation must stop */
  fatal: boolean;
}

export interface ToolDispatcherOptions {
  catalog: ToolCatalog;
  collaborators: ReadonlyMap<string, ToolCollaborator>;
  cache: ToolResultCache;
  logger: CasetrailLogger;
  toolTimeoutMs?: number;
  keyDigestLength?: number;
}

/** Smallest latency recorded for a collaborator call */
export const MIN_INVOKE_LATENCY_MS = 0.01;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function elapsedSince(startTime: number): number {
  return round2(performance.now() - startTime);
}

interface CallInfo {
  name: string;
  argsDigest: string;
  turn: number;
  cacheHit: boolean;
  latencyMs: number;
}

function missingRequired(entry: ToolCatalogEntry, args: Record<string, unknown>): string[] {
  return (entry.inputSchema.required ?? []).filter(
    (field) => args[field] === undefined || args[field] === null,
  );
}

/**
 * Dispatches declared tools. The terminal tool never reaches this class.
 */
export class ToolDispatcher {
  private readonly catalog: ToolCatalog;
  private readonly collaborators: ReadonlyMap<string, ToolCollaborator>;
  private readonly cache: ToolResultCache;
  private readonly logger: CasetrailLogger;
  private readonly toolTimeoutMs: number;
  private readonly keyDigestLength: number;

  constructor(options: ToolDispatcherOptions) {
    this.catalog = options.catalog;
    this.collaborators = options.collaborators;
    this.cache = options.cache;
    this.logger = options.logger;
    this.toolTimeoutMs = options.toolTimeoutMs ?? 15_000;
    this.keyDigestLength = options.keyDigestLength ?? DEFAULT_KEY_DIGEST_LENGTH;
  }

  /**
   * Dispatch one tool call. Errors come back as error records; only the
   * `fatal` flag says whether the loop may continue.
   */
  async dispatch(name: string, args: Record<string, unknown>, turn = 0): Promise<DispatchOutcome> {
    const startTime = performance.now();
    const argsDigest = digestArgs(args, RECORD_DIGEST_LENGTH);

    const entry = this.catalog.get(name);
    if (!entry) {
      return this.finish(
        { name, argsDigest, turn, cacheHit: false, latencyMs: elapsedSince(startTime) },
        createToolError(ToolErrorCode.UNKNOWN_TOOL, `Unknown tool: ${name}`),
        false,
      );
    }

    const missing = missingRequired(entry, args);
    if (missing.length > 0) {
      return this.finish(
        { name, argsDigest, turn, cacheHit: false, latencyMs: elapsedSince(startTime) },
        createToolError(
          ToolErrorCode.INVALID_ARGUMENTS,
          `Missing required argument(s): ${missing.join(", ")}`,
        ),
        false,
      );
    }

    const key = cacheKey(name, args, this.keyDigestLength);
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      // No collaborator work on a hit
      return this.finish({ name, argsDigest, turn, cacheHit: true, latencyMs: 0 }, cached, false);
    }

    const invokeStart = performance.now();
    const result = await this.invoke(entry, args);
    if (isToolError(result)) {
      // Errors are never cached
      return this.finish(
        { name, argsDigest, turn, cacheHit: false, latencyMs: elapsedSince(invokeStart) },
        result,
        !entry.recoverable,
      );
    }

    this.cache.set(key, result, entry.toolClass);
    const latencyMs = Math.max(elapsedSince(invokeStart), MIN_INVOKE_LATENCY_MS);
    return this.finish({ name, argsDigest, turn, cacheHit: false, latencyMs }, result, false);
  }

  private async invoke(entry: ToolCatalogEntry, args: Record<string, unknown>): Promise<ToolResult> {
    const collaborator = this.collaborators.get(entry.name);
    if (!collaborator) {
      return createToolError(
        ToolErrorCode.INTERNAL_ERROR,
        `No collaborator registered for ${entry.name}`,
      );
    }

    try {
      return await withTimeout(`Tool ${entry.name}`, this.toolTimeoutMs, (signal) =>
        collaborator.invoke(args, signal),
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        return createToolError(ToolErrorCode.TIMEOUT, error.message);
      }
      return createToolError(ToolErrorCode.INTERNAL_ERROR, errorMessage(error));
    }
  }

  private finish(call: CallInfo, result: ToolResult, fatal: boolean): DispatchOutcome {
    const { latencyMs } = call;
    const record: ToolCallRecord = Object.freeze({
      turn: call.turn,
      tool: call.name,
      argsDigest: call.argsDigest,
      latencyMs,
      cacheHit: call.cacheHit,
      resultSummary: summarizeToolResult(call.name, result),
      isError: isToolError(result),
    });

    this.logger.tool(call.name, call.argsDigest, call.cacheHit, latencyMs);
    if (record.isError) {
      this.logger.warn(`Tool ${call.name} returned an error`, {
        argsDigest: call.argsDigest,
        summary: record.resultSummary,
        fatal,
      });
    }

    return { record, result, fatal };
  }
}
