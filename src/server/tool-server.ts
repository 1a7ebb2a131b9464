/**
 * Tool server - JSON-RPC 2.0 over stdio exposing the declared investigation tools
 *
 * Speaks the Model Context Protocol tool subset (initialize, tools/list,
 * tools/call) so external agents can use the same cached tools. The terminal
 * tool is never offered here.
 */

import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { CasetrailLogger } from "../runtime/logger.js";
import type { ToolDispatcher } from "../tools/dispatcher.js";
import type { ToolCatalog } from "../tools/types.js";

type JsonRpcId = string | number | null;

const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

const ToolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
});

/**
 * JSON-RPC 2.0 response
 */
interface JsonRpcResponse {
  jsonrpc: "2.0";
  id: JsonRpcId;
  result?: unknown;
  error?: {
    code: number;
    message: string;
    data?: unknown;
  };
}

export const JSON_RPC_PARSE_ERROR = -32700;
export const JSON_RPC_INVALID_REQUEST = -32600;
export const JSON_RPC_METHOD_NOT_FOUND = -32601;
export const JSON_RPC_INVALID_PARAMS = -32602;
export const JSON_RPC_INTERNAL_ERROR = -32603;

export interface ToolServerOptions {
  catalog: ToolCatalog;
  dispatcher: ToolDispatcher;
  logger: CasetrailLogger;
  input?: Readable;
  output?: Writable;
}

export class ToolServer {
  private readonly catalog: ToolCatalog;
  private readonly dispatcher: ToolDispatcher;
  private readonly logger: CasetrailLogger;
  private readonly input: Readable;
  private readonly output: Writable;
  private rl: readline.Interface | null = null;

  constructor(options: ToolServerOptions) {
    this.catalog = options.catalog;
    this.dispatcher = options.dispatcher;
    this.logger = options.logger;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  /**
   * Handle one parsed request
   */
  async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const id = request.id ?? null;

    try {
      switch (request.method) {
        case "initialize":
          return {
            jsonrpc: "2.0",
            id,
            result: {
              protocolVersion: "2024-11-05",
              serverInfo: { name: "casetrail", version: "0.1.0" },
              capabilities: { tools: {} },
            },
          };

        case "notifications/initialized":
        case "ping":
          return { jsonrpc: "2.0", id, result: {} };

        case "tools/list":
          return {
            jsonrpc: "2.0",
            id,
            result: {
              tools: this.catalog.list().map((tool) => ({
                name: tool.name,
                description: tool.description,
                inputSchema: tool.inputSchema,
              })),
            },
          };

        case "tools/call": {
          const parsed = ToolCallParamsSchema.safeParse(request.params ?? {});
          if (!parsed.success) {
            return {
              jsonrpc: "2.0",
              id,
              error: { code: JSON_RPC_INVALID_PARAMS, message: "Invalid params: name is required" },
            };
          }

          const { record, result } = await this.dispatcher.dispatch(
            parsed.data.name,
            parsed.data.arguments,
          );

          return {
            jsonrpc: "2.0",
            id,
            result: {
              content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
              isError: record.isError,
            },
          };
        }

        default:
          return {
            jsonrpc: "2.0",
            id,
            error: { code: JSON_RPC_METHOD_NOT_FOUND, message: `Method not found: ${request.method}` },
          };
      }
    } catch (error) {
      return {
        jsonrpc: "2.0",
        id,
        error: { code: JSON_RPC_INTERNAL_ERROR, message: errorMessage(error) },
      };
    }
  }

  /**
   * Handle one input line. Returns the response, or null for notifications.
   */
  async handleLine(line: string): Promise<JsonRpcResponse | null> {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      return { jsonrpc: "2.0", id: null, error: { code: JSON_RPC_PARSE_ERROR, message: "Parse error" } };
    }

    const parsed = JsonRpcRequestSchema.safeParse(raw);
    if (!parsed.success) {
      return {
        jsonrpc: "2.0",
        id: null,
        error: { code: JSON_RPC_INVALID_REQUEST, message: "Invalid Request" },
      };
    }

    const response = await this.handleRequest(parsed.data);
    return parsed.data.id === undefined ? null : response;
  }

  private send(response: JsonRpcResponse): void {
    this.output.write(JSON.stringify(response) + "\n");
  }

  /**
   * Serve until the input closes
   */
  async start(): Promise<void> {
    this.logger.info("Tool server starting on stdio", { tools: this.catalog.names().length });

    const rl = readline.createInterface({ input: this.input, terminal: false });
    this.rl = rl;

    return new Promise((resolve) => {
      rl.on("line", (line) => {
        if (!line.trim()) return;
        this.handleLine(line).then(
          (response) => {
            if (response) this.send(response);
          },
          (error: unknown) => {
            this.logger.error("Failed to handle request", { error: errorMessage(error) });
          },
        );
      });

      rl.on("close", () => {
        this.rl = null;
        resolve();
      });
    });
  }

  stop(): void {
    if (this.rl) {
      this.rl.close();
      this.rl = null;
    }
    this.logger.info("Tool server stopped");
  }
}
