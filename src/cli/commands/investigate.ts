/**
 * casetrail investigate command - Run one investigation
 */

import { Command } from "commander";
import { formatVerdict } from "../format.js";
import { exitWithError, openRuntime } from "../shared.js";

export interface InvestigateOptions {
  json?: boolean;
  verbose?: boolean;
  critic?: boolean;
}

export function registerInvestigateCommand(program: Command): void {
  program
    .command("investigate")
    .description("Investigate an issue and print the verdict")
    .argument("<issue-id>", "Issue to investigate")
    .option("--json", "Print the full trace as JSON")
    .option("--no-critic", "Skip the critic review")
    .option("-v, --verbose", "Enable verbose logging")
    .action(async (issueId: string, opts: InvestigateOptions) => {
      try {
        const runtime = await openRuntime({ verbose: opts.verbose, quiet: opts.json }, (config) => {
          if (opts.critic === false) config.critic.enabled = false;
        });

        const issue = await runtime.issues.get(issueId);
        if (!issue) {
          console.error(`Issue not found: ${issueId}`);
          process.exit(1);
        }

        const trace = await runtime.investigator.run(issue);
        await runtime.logger.flush();

        console.log(opts.json ? JSON.stringify(trace, null, 2) : formatVerdict(trace));

        if (trace.status === "failed") {
          process.exit(1);
        }
      } catch (error) {
        exitWithError("investigate", error);
      }
    });
}
