/**
 * Client for connecting to the investigation daemon
 */

import WebSocket, { type RawData } from "ws";
import crypto from "node:crypto";
import { z } from "zod";
import { type Issue, type IssueFilter, IssueSchema } from "../issues/types.js";
import type { RunTrace } from "../orchestrator/core.js";
import type { ReplaySession } from "../replay/types.js";
import type { TraceFilter } from "../store/run-store.js";
import { ReplaySessionSchema, RunTraceSchema } from "../store/schemas.js";

/** Protocol version expected from daemon */
const EXPECTED_PROTOCOL_VERSION = 1;

/** Connection timeout (10s) */
const CONNECT_TIMEOUT_MS = 10_000;

/** Request timeout (15 minutes, the default replay session allowance) */
const REQUEST_TIMEOUT_MS = 15 * 60 * 1000;

/**
 * Request frame to daemon
 */
interface RequestFrame {
  type: "req";
  id: string;
  method: string;
  params?: Record<string, unknown>;
}

const ResponseFrameSchema = z.object({
  type: z.literal("res"),
  id: z.string(),
  ok: z.boolean(),
  payload: z.unknown().optional(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      details: z.unknown().optional(),
    })
    .optional(),
});

const EventFrameSchema = z.object({
  type: z.literal("event"),
  event: z.string(),
  payload: z.unknown(),
  seq: z.number(),
});

const FrameSchema = z.discriminatedUnion("type", [ResponseFrameSchema, EventFrameSchema]);

type ResponseFrame = z.infer<typeof ResponseFrameSchema>;
type EventFrame = z.infer<typeof EventFrameSchema>;

const DaemonToolSchema = z.object({
  name: z.string(),
  description: z.string(),
  inputSchema: z.unknown(),
});

/**
 * Tool definition from daemon
 */
export type DaemonTool = z.infer<typeof DaemonToolSchema>;

const HelloResponseSchema = z.object({
  type: z.literal("hello-ok"),
  protocol: z.number(),
  server: z.object({
    name: z.string(),
    version: z.string(),
  }),
  tools: z.array(DaemonToolSchema),
  features: z.object({
    methods: z.array(z.string()),
    events: z.array(z.string()),
  }),
});

export type HelloResponse = z.infer<typeof HelloResponseSchema>;

const ToolsPayloadSchema = z.object({ tools: z.array(DaemonToolSchema) });
const IssuesPayloadSchema = z.object({ issues: z.array(IssueSchema) });
const TracePayloadSchema = z.object({ trace: RunTraceSchema });
const TracesPayloadSchema = z.object({ traces: z.array(RunTraceSchema) });
const SessionPayloadSchema = z.object({ session: ReplaySessionSchema });

/**
 * Error returned by the daemon for a failed request
 */
export class DaemonRequestError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = "DaemonRequestError";
  }
}

/**
 * Event handler type
 */
export type EventHandler = (event: string, payload: unknown) => void;

/**
 * Pending request
 */
interface PendingRequest {
  resolve: (payload: unknown) => void;
  reject: (error: Error) => void;
  timeout: ReturnType<typeof setTimeout>;
}

/**
 * Client for the investigation daemon
 */
export class InvestigatorClient {
  private url: string;
  private token: string;
  private clientName: string;

  private ws: WebSocket | null = null;
  private connected = false;
  private authenticated = false;

  private pendingRequests: Map<string, PendingRequest> = new Map();
  private eventHandlers: Set<EventHandler> = new Set();

  private tools: DaemonTool[] = [];

  constructor(options: { host: string; port: number; token: string; clientName?: string }) {
    this.url = `ws://${options.host}:${options.port}`;
    this.token = options.token;
    this.clientName = options.clientName || "casetrail-cli";
  }

  /**
   * Connect and authenticate
   */
  async connect(): Promise<HelloResponse> {
    if (this.connected) {
      throw new Error("Already connected");
    }

    return new Promise((resolve, reject) => {
      const connectTimeout = setTimeout(() => {
        this.close();
        reject(new Error("Connection timeout"));
      }, CONNECT_TIMEOUT_MS);

      const ws = new WebSocket(this.url);
      this.ws = ws;

      ws.on("open", () => {
        this.connected = true;
        this.authenticate().then(
          (hello) => {
            clearTimeout(connectTimeout);
            resolve(hello);
          },
          (error: unknown) => {
            clearTimeout(connectTimeout);
            this.close();
            reject(error);
          },
        );
      });

      ws.on("message", (data: RawData) => {
        this.handleMessage(data.toString());
      });

      ws.on("close", () => {
        this.handleClose();
      });

      ws.on("error", (err) => {
        clearTimeout(connectTimeout);
        reject(err);
      });
    });
  }

  private async authenticate(): Promise<HelloResponse> {
    const hello = HelloResponseSchema.parse(
      await this.request("connect", {
        token: this.token,
        client: {
          name: this.clientName,
          version: "0.1.0",
        },
      }),
    );

    if (hello.protocol !== EXPECTED_PROTOCOL_VERSION) {
      throw new Error(
        `Protocol version mismatch: expected ${EXPECTED_PROTOCOL_VERSION}, got ${hello.protocol}`,
      );
    }

    this.authenticated = true;
    this.tools = hello.tools;
    return hello;
  }

  /**
   * Handle incoming message. Frames that do not parse are dropped.
   */
  private handleMessage(data: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch {
      return;
    }

    const parsed = FrameSchema.safeParse(raw);
    if (!parsed.success) return;

    if (parsed.data.type === "res") {
      this.handleResponse(parsed.data);
    } else {
      this.handleEvent(parsed.data);
    }
  }

  private handleResponse(frame: ResponseFrame): void {
    const pending = this.pendingRequests.get(frame.id);
    if (!pending) return;

    clearTimeout(pending.timeout);
    this.pendingRequests.delete(frame.id);

    if (frame.ok) {
      pending.resolve(frame.payload);
    } else {
      pending.reject(
        new DaemonRequestError(
          frame.error?.code ?? "UNKNOWN",
          frame.error?.message || "Request failed",
          frame.error?.details,
        ),
      );
    }
  }

  private handleEvent(frame: EventFrame): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(frame.event, frame.payload);
      } catch (error) {
        console.error(`Event handler failed for ${frame.event}:`, error);
      }
    }
  }

  private handleClose(): void {
    this.connected = false;
    this.authenticated = false;

    // Reject all pending requests
    for (const [id, pending] of this.pendingRequests) {
      clearTimeout(pending.timeout);
      pending.reject(new Error("Connection closed"));
      this.pendingRequests.delete(id);
    }
  }

  /**
   * Send a request and wait for response
   */
  private async request(method: string, params?: Record<string, unknown>): Promise<unknown> {
    const ws = this.ws;
    if (!ws || !this.connected) {
      throw new Error("Not connected");
    }

    const id = crypto.randomUUID();
    const frame: RequestFrame = { type: "req", id, method };
    if (params) frame.params = params;

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pendingRequests.delete(id);
        reject(new Error(`Request timeout: ${method}`));
      }, REQUEST_TIMEOUT_MS);

      this.pendingRequests.set(id, { resolve, reject, timeout });

      ws.send(JSON.stringify(frame), (err) => {
        if (err) {
          clearTimeout(timeout);
          this.pendingRequests.delete(id);
          reject(err);
        }
      });
    });
  }

  private requireAuth(): void {
    if (!this.authenticated) {
      throw new Error("Not authenticated");
    }
  }

  async listTools(): Promise<DaemonTool[]> {
    this.requireAuth();
    const { tools } = ToolsPayloadSchema.parse(await this.request("tools.list"));
    this.tools = tools;
    return tools;
  }

  async listIssues(filter: IssueFilter = {}): Promise<Issue[]> {
    this.requireAuth();
    const params: Record<string, unknown> = { ...filter };
    return IssuesPayloadSchema.parse(await this.request("issues.list", params)).issues;
  }

  /**
   * Investigate an issue and wait for the finished trace
   */
  async investigate(issueId: string): Promise<RunTrace> {
    this.requireAuth();
    return TracePayloadSchema.parse(await this.request("investigate", { issueId })).trace;
  }

  async getRun(traceId: string): Promise<RunTrace> {
    this.requireAuth();
    return TracePayloadSchema.parse(await this.request("runs.get", { traceId })).trace;
  }

  async listRuns(filter: TraceFilter = {}): Promise<RunTrace[]> {
    this.requireAuth();
    const params: Record<string, unknown> = { ...filter };
    return TracesPayloadSchema.parse(await this.request("runs.list", params)).traces;
  }

  /**
   * Start a replay session. Progress arrives as `replay` events.
   */
  async startReplay(traceId: string, nRuns?: number): Promise<ReplaySession> {
    this.requireAuth();
    const params: Record<string, unknown> = { traceId };
    if (nRuns !== undefined) params.nRuns = nRuns;
    return SessionPayloadSchema.parse(await this.request("replay.start", params)).session;
  }

  async getReplay(sessionId: string): Promise<ReplaySession> {
    this.requireAuth();
    return SessionPayloadSchema.parse(await this.request("replay.get", { sessionId })).session;
  }

  /**
   * Ping the daemon
   */
  async ping(): Promise<boolean> {
    if (!this.authenticated) {
      return false;
    }

    try {
      await this.request("ping");
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Add an event handler
   */
  onEvent(handler: EventHandler): () => void {
    this.eventHandlers.add(handler);
    return () => this.eventHandlers.delete(handler);
  }

  getTools(): DaemonTool[] {
    return this.tools;
  }

  /**
   * Check if connected and authenticated
   */
  isConnected(): boolean {
    return this.connected && this.authenticated;
  }

  /**
   * Close the connection
   */
  close(): void {
    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }
    this.connected = false;
    this.authenticated = false;
    this.tools = [];
  }
}
