/**
 * Main CLI entry point for casetrail
 */

import { Command } from "commander";
import { registerInitCommand } from "./commands/init.js";
import { registerIssuesCommand } from "./commands/issues.js";
import { registerInvestigateCommand } from "./commands/investigate.js";
import { registerRunsCommand } from "./commands/runs.js";
import { registerReplayCommand } from "./commands/replay.js";
import { registerToolsCommand } from "./commands/tools.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerServeCommand } from "./commands/serve.js";

/**
 * Build the casetrail CLI program
 */
export function buildProgram(): Command {
  const program = new Command();

  program
    .name("casetrail")
    .description("Investigate customer financial issues with an audited tool-use agent")
    .version("0.1.0");

  registerInitCommand(program);
  registerIssuesCommand(program);
  registerInvestigateCommand(program);
  registerRunsCommand(program);
  registerReplayCommand(program);
  registerToolsCommand(program);
  registerConfigCommand(program);
  registerServeCommand(program);

  return program;
}

/**
 * Run the CLI
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = buildProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    if (process.env.DEBUG && error instanceof Error) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}
