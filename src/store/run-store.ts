/**
 * Persistence for run traces and replay sessions
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { z } from "zod";
import { getConfigDir } from "../config/loader.js";
import type { RunTrace, RunStatus } from "../orchestrator/core.js";
import type { ReplaySession } from "../replay/types.js";
import { ReplaySessionSchema, RunTraceSchema } from "./schemas.js";

export interface TraceFilter {
  issueId?: string;
  status?: RunStatus;
  isReplay?: boolean;
  limit?: number;
}

/**
 * Trace and replay persistence. Traces are created at start and updated once
 * at their terminal transition.
 */
export interface RunStore {
  createTrace(trace: RunTrace): Promise<void>;
  updateTrace(trace: RunTrace): Promise<void>;
  getTrace(traceId: string): Promise<RunTrace | undefined>;
  listTraces(filter?: TraceFilter): Promise<RunTrace[]>;
  createReplay(session: ReplaySession): Promise<void>;
  updateReplay(session: ReplaySession): Promise<void>;
  getReplay(sessionId: string): Promise<ReplaySession | undefined>;
}

function applyFilter(traces: RunTrace[], filter: TraceFilter): RunTrace[] {
  const matching = traces
    .filter((trace) => !filter.issueId || trace.issueId === filter.issueId)
    .filter((trace) => !filter.status || trace.status === filter.status)
    .filter((trace) => filter.isReplay === undefined || trace.isReplay === filter.isReplay)
    .sort((a, b) => b.startedAt.localeCompare(a.startedAt));
  return filter.limit ? matching.slice(0, filter.limit) : matching;
}

/**
 * In-memory store. Values are copied in and out.
 */
export class MemoryRunStore implements RunStore {
  private readonly traces = new Map<string, RunTrace>();
  private readonly replays = new Map<string, ReplaySession>();

  async createTrace(trace: RunTrace): Promise<void> {
    if (this.traces.has(trace.traceId)) {
      throw new Error(`Trace already exists: ${trace.traceId}`);
    }
    this.traces.set(trace.traceId, structuredClone(trace));
  }

  async updateTrace(trace: RunTrace): Promise<void> {
    this.traces.set(trace.traceId, structuredClone(trace));
  }

  async getTrace(traceId: string): Promise<RunTrace | undefined> {
    const trace = this.traces.get(traceId);
    return trace ? structuredClone(trace) : undefined;
  }

  async listTraces(filter: TraceFilter = {}): Promise<RunTrace[]> {
    return applyFilter(Array.from(this.traces.values()), filter).map((trace) =>
      structuredClone(trace),
    );
  }

  async createReplay(session: ReplaySession): Promise<void> {
    this.replays.set(session.sessionId, structuredClone(session));
  }

  async updateReplay(session: ReplaySession): Promise<void> {
    this.replays.set(session.sessionId, structuredClone(session));
  }

  async getReplay(sessionId: string): Promise<ReplaySession | undefined> {
    const session = this.replays.get(sessionId);
    return session ? structuredClone(session) : undefined;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * JSON documents under `<dir>/runs/<traceId>.json` and `<dir>/replays/<sessionId>.json`
 */
export class FileRunStore implements RunStore {
  private readonly runsDir: string;
  private readonly replaysDir: string;
  private writeSeq = 0;

  constructor(baseDir: string = getConfigDir()) {
    this.runsDir = path.join(baseDir, "runs");
    this.replaysDir = path.join(baseDir, "replays");
  }

  async createTrace(trace: RunTrace): Promise<void> {
    await this.write(this.runsDir, trace.traceId, trace);
  }

  async updateTrace(trace: RunTrace): Promise<void> {
    await this.write(this.runsDir, trace.traceId, trace);
  }

  async getTrace(traceId: string): Promise<RunTrace | undefined> {
    return this.read(this.runsDir, traceId, RunTraceSchema);
  }

  async listTraces(filter: TraceFilter = {}): Promise<RunTrace[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.runsDir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const traces: RunTrace[] = [];
    for (const file of files.filter((name) => name.endsWith(".json"))) {
      const trace = await this.read(this.runsDir, path.basename(file, ".json"), RunTraceSchema);
      if (trace) traces.push(trace);
    }
    return applyFilter(traces, filter);
  }

  async createReplay(session: ReplaySession): Promise<void> {
    await this.write(this.replaysDir, session.sessionId, session);
  }

  async updateReplay(session: ReplaySession): Promise<void> {
    await this.write(this.replaysDir, session.sessionId, session);
  }

  async getReplay(sessionId: string): Promise<ReplaySession | undefined> {
    return this.read(this.replaysDir, sessionId, ReplaySessionSchema);
  }

  private fileFor(dir: string, id: string): string {
    if (!/^[A-Za-z0-9_-]+$/.test(id)) {
      throw new Error(`Invalid id: ${id}`);
    }
    return path.join(dir, `${id}.json`);
  }

  private async write(dir: string, id: string, value: RunTrace | ReplaySession): Promise<void> {
    const file = this.fileFor(dir, id);
    await fs.mkdir(dir, { recursive: true });
    // Write then rename so readers never see a partial document
    const tmp = `${file}.${process.pid}.${++this.writeSeq}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(value, null, 2), "utf-8");
    await fs.rename(tmp, file);
  }

  private async read<T>(
    dir: string,
    id: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T | undefined> {
    let content: string;
    try {
      content = await fs.readFile(this.fileFor(dir, id), "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
    return schema.parse(JSON.parse(content));
  }
}
