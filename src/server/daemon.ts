/**
 * Investigation daemon - WebSocket server for running and replaying investigations
 *
 * Clients authenticate with the daemon token, then start investigations and
 * replays and receive their progress as events.
 */

import { createServer, type Server, type IncomingMessage } from "node:http";
import type { AddressInfo } from "node:net";
import { WebSocketServer, type WebSocket, type RawData } from "ws";
import { z } from "zod";
import { tokensMatch } from "../auth/token.js";
import type { ServerConfig } from "../config/types.js";
import { InvestigationError, NotFoundError, errorMessage } from "../errors.js";
import { IssueStatusSchema } from "../issues/types.js";
import type { Runtime } from "../runtime/context.js";
import type { CasetrailLogger } from "../runtime/logger.js";

/** Protocol version for the investigation daemon */
export const PROTOCOL_VERSION = 1;

/** Maximum payload size (5MB) */
const MAX_PAYLOAD_BYTES = 5 * 1024 * 1024;

/** Heartbeat interval (30s) */
const TICK_INTERVAL_MS = 30_000;

const METHODS = [
  "connect",
  "tools.list",
  "issues.list",
  "investigate",
  "runs.get",
  "runs.list",
  "replay.start",
  "replay.get",
  "ping",
] as const;

const EVENTS = ["investigation", "replay", "tick"] as const;

const RequestFrameSchema = z.object({
  type: z.literal("req"),
  id: z.string().min(1),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

const ConnectParamsSchema = z.object({
  token: z.string().default(""),
  client: z
    .object({
      name: z.string().optional(),
      version: z.string().optional(),
    })
    .optional(),
});

const IssuesListParamsSchema = z.object({
  status: IssueStatusSchema.optional(),
  customerId: z.string().optional(),
});

const InvestigateParamsSchema = z.object({ issueId: z.string().min(1) });

const TraceIdParamsSchema = z.object({ traceId: z.string().min(1) });

const RunsListParamsSchema = z.object({
  issueId: z.string().optional(),
  status: z.enum(["running", "completed", "escalated", "failed"]).optional(),
  isReplay: z.boolean().optional(),
  limit: z.number().int().positive().optional(),
});

const ReplayStartParamsSchema = z.object({
  traceId: z.string().min(1),
  nRuns: z.number().int().optional(),
});

const ReplayGetParamsSchema = z.object({ sessionId: z.string().min(1) });

type ResponseError = { code: string; message: string; details?: unknown };

/**
 * Response frame to client
 */
interface ResponseFrame {
  type: "res";
  id: string;
  ok: boolean;
  payload?: unknown;
  error?: ResponseError;
}

/**
 * Event frame to client
 */
interface EventFrame {
  type: "event";
  event: string;
  payload: unknown;
  seq: number;
}

/**
 * Connected client state
 */
interface ConnectedClient {
  authenticated: boolean;
  clientName?: string;
  connectedAt: number;
  lastActivity: number;
  eventSeq: number;
}

/** Request rejected before reaching a handler */
class RequestError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = "RequestError";
  }
}

function parseParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, params: unknown): T {
  const result = schema.safeParse(params ?? {});
  if (!result.success) {
    throw new RequestError(
      "INVALID_PARAMS",
      result.error.issues.map((issue) => `${issue.path.join(".") || "params"}: ${issue.message}`).join("; "),
    );
  }
  return result.data;
}

function toResponseError(error: unknown): ResponseError {
  if (error instanceof RequestError) {
    return { code: error.code, message: error.message, details: error.details };
  }
  if (error instanceof InvestigationError) {
    return { code: error.code, message: error.message, details: error.details };
  }
  return { code: "INTERNAL_ERROR", message: errorMessage(error) };
}

export type DaemonRuntime = Pick<Runtime, "catalog" | "issues" | "investigator" | "replay" | "store">;

/**
 * Investigation daemon server
 */
export class InvestigationDaemon {
  private readonly runtime: DaemonRuntime;
  private readonly logger: CasetrailLogger;
  private readonly config: ServerConfig;
  private readonly authToken: string;

  private httpServer: Server | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Map<WebSocket, ConnectedClient> = new Map();
  private tickInterval: ReturnType<typeof setInterval> | null = null;
  private unsubscribers: Array<() => void> = [];
  private running = false;

  constructor(runtime: DaemonRuntime, logger: CasetrailLogger, config: ServerConfig, authToken: string) {
    this.runtime = runtime;
    this.logger = logger;
    this.config = config;
    this.authToken = authToken;
  }

  private listTools(): Array<{ name: string; description: string; inputSchema: unknown }> {
    return this.runtime.catalog.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }));
  }

  /**
   * Send a response frame
   */
  private sendResponse(
    ws: WebSocket,
    id: string,
    ok: boolean,
    payload?: unknown,
    error?: ResponseError,
  ): void {
    const frame: ResponseFrame = { type: "res", id, ok };
    if (payload !== undefined) frame.payload = payload;
    if (error) frame.error = error;

    try {
      ws.send(JSON.stringify(frame));
    } catch (err) {
      this.logger.error("Failed to send response", { error: errorMessage(err) });
    }
  }

  /**
   * Send an event frame to all authenticated clients
   */
  private broadcastEvent(event: (typeof EVENTS)[number], payload: unknown): void {
    for (const [ws, client] of this.clients) {
      if (!client.authenticated) continue;

      client.eventSeq++;
      const frame: EventFrame = {
        type: "event",
        event,
        payload,
        seq: client.eventSeq,
      };

      try {
        ws.send(JSON.stringify(frame));
      } catch (err) {
        this.logger.error("Failed to broadcast event", { error: errorMessage(err) });
      }
    }
  }

  /**
   * Handle connect request (authentication)
   */
  private handleConnect(ws: WebSocket, client: ConnectedClient, id: string, params: unknown): void {
    const parsed = ConnectParamsSchema.safeParse(params ?? {});
    const token = parsed.success ? parsed.data.token : "";

    if (!tokensMatch(token, this.authToken)) {
      this.sendResponse(ws, id, false, undefined, {
        code: "AUTH_FAILED",
        message: "Invalid authentication token",
      });
      ws.close(4001, "Authentication failed");
      return;
    }

    client.authenticated = true;
    client.clientName = parsed.success ? parsed.data.client?.name : undefined;

    this.logger.info("Client authenticated", { clientName: client.clientName });

    this.sendResponse(ws, id, true, {
      type: "hello-ok",
      protocol: PROTOCOL_VERSION,
      server: {
        name: "casetrail",
        version: "0.1.0",
      },
      tools: this.listTools(),
      features: {
        methods: [...METHODS],
        events: [...EVENTS],
      },
    });
  }

  /**
   * Route an authenticated request to its handler
   */
  private async dispatch(method: string, params: unknown): Promise<unknown> {
    switch (method) {
      case "tools.list":
        return { tools: this.listTools() };

      case "issues.list": {
        const filter = parseParams(IssuesListParamsSchema, params);
        return { issues: await this.runtime.issues.list(filter) };
      }

      case "investigate": {
        const { issueId } = parseParams(InvestigateParamsSchema, params);
        const issue = await this.runtime.issues.get(issueId);
        if (!issue) {
          throw new NotFoundError("Issue", issueId);
        }
        return { trace: await this.runtime.investigator.run(issue) };
      }

      case "runs.get": {
        const { traceId } = parseParams(TraceIdParamsSchema, params);
        const trace = await this.runtime.store.getTrace(traceId);
        if (!trace) {
          throw new NotFoundError("Trace", traceId);
        }
        return { trace };
      }

      case "runs.list": {
        const filter = parseParams(RunsListParamsSchema, params);
        return { traces: await this.runtime.store.listTraces(filter) };
      }

      case "replay.start": {
        const { traceId, nRuns } = parseParams(ReplayStartParamsSchema, params);
        return { session: await this.runtime.replay.start(traceId, nRuns) };
      }

      case "replay.get": {
        const { sessionId } = parseParams(ReplayGetParamsSchema, params);
        const session = await this.runtime.store.getReplay(sessionId);
        if (!session) {
          throw new NotFoundError("Replay session", sessionId);
        }
        return { session };
      }

      case "ping":
        return { pong: true };

      default:
        throw new RequestError("METHOD_NOT_FOUND", `Unknown method: ${method}`);
    }
  }

  /**
   * Handle incoming message
   */
  private async handleMessage(ws: WebSocket, client: ConnectedClient, data: string): Promise<void> {
    client.lastActivity = Date.now();

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch {
      this.sendResponse(ws, "unknown", false, undefined, {
        code: "PARSE_ERROR",
        message: "Invalid JSON",
      });
      return;
    }

    const parsed = RequestFrameSchema.safeParse(raw);
    if (!parsed.success) {
      this.sendResponse(ws, "unknown", false, undefined, {
        code: "INVALID_REQUEST",
        message: "Invalid request frame",
      });
      return;
    }
    const frame = parsed.data;

    // Handle connect (always allowed)
    if (frame.method === "connect") {
      this.handleConnect(ws, client, frame.id, frame.params);
      return;
    }

    // All other methods require authentication
    if (!client.authenticated) {
      this.sendResponse(ws, frame.id, false, undefined, {
        code: "UNAUTHORIZED",
        message: "Authentication required. Send connect request first.",
      });
      return;
    }

    if (this.config.enableRequestLogging) {
      this.logger.debug(`Request: ${frame.method}`, { id: frame.id, clientName: client.clientName });
    }

    try {
      const payload = await this.dispatch(frame.method, frame.params);
      this.sendResponse(ws, frame.id, true, payload);
    } catch (error) {
      const responseError = toResponseError(error);
      if (responseError.code === "INTERNAL_ERROR") {
        this.logger.error(`Request ${frame.method} failed`, { error: responseError.message });
      }
      this.sendResponse(ws, frame.id, false, undefined, responseError);
    }
  }

  /**
   * Handle new WebSocket connection
   */
  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const client: ConnectedClient = {
      authenticated: false,
      connectedAt: Date.now(),
      lastActivity: Date.now(),
      eventSeq: 0,
    };

    this.clients.set(ws, client);

    this.logger.info("Client connected", {
      remoteAddress: req.socket.remoteAddress,
    });

    ws.on("message", (data: RawData) => {
      this.handleMessage(ws, client, data.toString()).catch((error: unknown) => {
        this.logger.error("Failed to handle message", { error: errorMessage(error) });
      });
    });

    ws.on("close", () => {
      this.clients.delete(ws);
      this.logger.info("Client disconnected", {
        clientName: client.clientName,
        authenticated: client.authenticated,
      });
    });

    ws.on("error", (err) => {
      this.logger.error("WebSocket error", {
        error: err.message,
        clientName: client.clientName,
      });
    });
  }

  private subscribe(): void {
    this.unsubscribers.push(
      this.runtime.investigator.onEvent((event) => {
        if (event.type === "run.completed") {
          this.broadcastEvent("investigation", {
            type: event.type,
            traceId: event.traceId,
            issueId: event.issueId,
            status: event.status,
            structuredOutput: event.trace.structuredOutput,
          });
        } else {
          this.broadcastEvent("investigation", event);
        }
      }),
      this.runtime.replay.onEvent((event) => {
        this.broadcastEvent("replay", event);
      }),
    );
  }

  /**
   * Start the daemon. Resolves with the bound address.
   */
  async start(): Promise<{ host: string; port: number }> {
    if (this.running) {
      throw new Error("Daemon is already running");
    }

    return new Promise((resolve, reject) => {
      const httpServer = createServer();
      this.httpServer = httpServer;

      this.wss = new WebSocketServer({
        server: httpServer,
        maxPayload: MAX_PAYLOAD_BYTES,
      });

      this.wss.on("connection", (ws, req) => {
        this.handleConnection(ws, req);
      });

      httpServer.on("error", (err) => {
        reject(err);
      });

      httpServer.listen(this.config.port, this.config.host, () => {
        this.running = true;
        this.subscribe();

        // Start heartbeat
        this.tickInterval = setInterval(() => {
          this.broadcastEvent("tick", { timestamp: Date.now() });
        }, TICK_INTERVAL_MS);

        const address: AddressInfo | string | null = httpServer.address();
        const port = address && typeof address === "object" ? address.port : this.config.port;

        this.logger.info("Investigation daemon started", {
          host: this.config.host,
          port,
        });

        resolve({ host: this.config.host, port });
      });
    });
  }

  /**
   * Stop the daemon. Background replays keep running until drained by the caller.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;

    if (this.tickInterval) {
      clearInterval(this.tickInterval);
      this.tickInterval = null;
    }

    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];

    // Close all client connections
    for (const [ws] of this.clients) {
      ws.close(1001, "Server shutting down");
    }
    this.clients.clear();

    if (this.wss) {
      this.wss.close();
      this.wss = null;
    }

    const httpServer = this.httpServer;
    if (httpServer) {
      await new Promise<void>((resolve) => {
        httpServer.close(() => resolve());
      });
      this.httpServer = null;
    }

    this.logger.info("Investigation daemon stopped");
  }
}
