/**
 * casetrail tools command - Inspect and call investigation tools directly
 */

import { Command } from "commander";
import { z } from "zod";
import { ToolServer } from "../../server/tool-server.js";
import { exitWithError, openRuntime } from "../shared.js";

const ToolArgsSchema = z.record(z.unknown());

export function registerToolsCommand(program: Command): void {
  const toolsCmd = program.command("tools").description("Investigation tools");

  toolsCmd
    .command("list")
    .description("List declared tools")
    .option("--json", "Output as JSON")
    .action(async (opts: { json?: boolean }) => {
      try {
        const runtime = await openRuntime({ quiet: true });
        const tools = runtime.catalog.list();

        if (opts.json) {
          console.log(JSON.stringify(tools, null, 2));
          return;
        }

        for (const tool of tools) {
          const required = tool.inputSchema.required ?? [];
          console.log(`  ${tool.name} (${tool.toolClass}${tool.recoverable ? "" : ", fatal on error"})`);
          console.log(`    ${tool.description}`);
          if (required.length > 0) {
            console.log(`    required: ${required.join(", ")}`);
          }
          console.log();
        }
      } catch (error) {
        exitWithError("list tools", error);
      }
    });

  toolsCmd
    .command("call")
    .description("Call a tool through the dispatcher and print the result")
    .argument("<name>", "Tool name")
    .argument("[args]", "Arguments as a JSON object", "{}")
    .option("-v, --verbose", "Enable verbose logging")
    .action(async (name: string, rawArgs: string, opts: { verbose?: boolean }) => {
      try {
        const args = ToolArgsSchema.parse(JSON.parse(rawArgs));
        const runtime = await openRuntime({ verbose: opts.verbose });
        const { record, result } = await runtime.dispatcher.dispatch(name, args);

        console.log(JSON.stringify(result, null, 2));
        console.error(`\n${record.resultSummary} (${record.latencyMs}ms)`);

        if (record.isError) {
          process.exit(1);
        }
      } catch (error) {
        exitWithError("call tool", error);
      }
    });

  toolsCmd
    .command("serve")
    .description("Serve the tools over stdio (JSON-RPC, MCP tool subset)")
    .action(async () => {
      try {
        const runtime = await openRuntime({});
        const server = new ToolServer({
          catalog: runtime.catalog,
          dispatcher: runtime.dispatcher,
          logger: runtime.logger,
        });
        await server.start();
        await runtime.logger.flush();
      } catch (error) {
        exitWithError("serve tools", error);
      }
    });
}
