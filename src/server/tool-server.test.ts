import { describe, it, expect, beforeEach } from "vitest";
import { PassThrough } from "node:stream";
import { createMockLogger, staticCollaborator } from "../testing/fakes.js";
import { ToolResultCache } from "../tools/cache.js";
import { ToolDispatcher } from "../tools/dispatcher.js";
import { DEFAULT_TOOL_CATALOG, ToolCatalog } from "../tools/types.js";
import {
  JSON_RPC_INVALID_PARAMS,
  JSON_RPC_INVALID_REQUEST,
  JSON_RPC_METHOD_NOT_FOUND,
  JSON_RPC_PARSE_ERROR,
  ToolServer,
} from "./tool-server.js";

const CUSTOMER = { name: "Alice", kyc_status: "verified" };

describe("ToolServer", () => {
  let server: ToolServer;
  let input: PassThrough;
  let output: PassThrough;

  beforeEach(() => {
    const logger = createMockLogger();
    const catalog = new ToolCatalog(DEFAULT_TOOL_CATALOG);
    input = new PassThrough();
    output = new PassThrough();
    server = new ToolServer({
      catalog,
      dispatcher: new ToolDispatcher({
        catalog,
        collaborators: new Map([["customer_lookup", staticCollaborator(CUSTOMER)]]),
        cache: new ToolResultCache(),
        logger,
      }),
      logger,
      input,
      output,
    });
  });

  it("answers initialize", async () => {
    const response = await server.handleLine('{"jsonrpc":"2.0","id":1,"method":"initialize","params":{}}');

    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 1,
      result: {
        protocolVersion: "2024-11-05",
        serverInfo: { name: "casetrail", version: "0.1.0" },
        capabilities: { tools: {} },
      },
    });
  });

  it("lists the declared tools without the terminal tool", async () => {
    const response = await server.handleLine('{"jsonrpc":"2.0","id":"a","method":"tools/list"}');

    const result = response?.result;
    const tools =
      typeof result === "object" && result !== null && "tools" in result && Array.isArray(result.tools)
        ? result.tools
        : [];
    expect(tools.map((tool: { name: string }) => tool.name)).toEqual(DEFAULT_TOOL_CATALOG.map((entry) => entry.name));
  });

  it("calls a tool and returns its result as text", async () => {
    const response = await server.handleLine(
      JSON.stringify({
        jsonrpc: "2.0",
        id: 2,
        method: "tools/call",
        params: { name: "customer_lookup", arguments: { customer_id: "CUS-1" } },
      }),
    );

    expect(response?.result).toEqual({
      content: [{ type: "text", text: JSON.stringify(CUSTOMER, null, 2) }],
      isError: false,
    });
  });

  it("marks tool errors", async () => {
    const response = await server.handleLine(
      JSON.stringify({
        jsonrpc: "2.0",
        id: 3,
        method: "tools/call",
        params: { name: "submit_resolution", arguments: {} },
      }),
    );

    expect(response?.result).toMatchObject({ isError: true });
    expect(JSON.stringify(response?.result)).toContain("Unknown tool: submit_resolution");
  });

  it("rejects a call without a tool name", async () => {
    const response = await server.handleLine('{"jsonrpc":"2.0","id":4,"method":"tools/call","params":{}}');

    expect(response?.error).toEqual({
      code: JSON_RPC_INVALID_PARAMS,
      message: "Invalid params: name is required",
    });
  });

  it("reports parse errors, invalid requests and unknown methods", async () => {
    expect((await server.handleLine("{not json"))?.error?.code).toBe(JSON_RPC_PARSE_ERROR);
    expect((await server.handleLine('{"id":5,"method":"ping"}'))?.error?.code).toBe(JSON_RPC_INVALID_REQUEST);
    expect((await server.handleLine('{"jsonrpc":"2.0","id":6,"method":"resources/list"}'))?.error).toEqual({
      code: JSON_RPC_METHOD_NOT_FOUND,
      message: "Method not found: resources/list",
    });
  });

  it("does not answer notifications", async () => {
    expect(await server.handleLine('{"jsonrpc":"2.0","method":"notifications/initialized"}')).toBeNull();
  });

  it("serves line-delimited requests until the input ends", async () => {
    const lines: string[] = [];
    output.on("data", (chunk: Buffer) => lines.push(...chunk.toString().split("\n").filter(Boolean)));

    const done = server.start();
    input.write('{"jsonrpc":"2.0","id":7,"method":"ping"}\n');
    input.end();
    await done;
    await new Promise((resolve) => setImmediate(resolve));

    expect(lines.map((line) => JSON.parse(line))).toEqual([{ jsonrpc: "2.0", id: 7, result: {} }]);
  });
});
