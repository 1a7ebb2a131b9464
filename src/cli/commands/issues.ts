/**
 * casetrail issues command - Browse the issue queue
 */

import { Command } from "commander";
import { IssueStatusSchema, type IssueFilter } from "../../issues/types.js";
import { exitWithError, openRuntime } from "../shared.js";

export function registerIssuesCommand(program: Command): void {
  const issuesCmd = program.command("issues").description("Browse customer issues");

  issuesCmd
    .command("list")
    .description("List issues from the configured dataset")
    .option("-s, --status <status>", "Only issues with this status")
    .option("-c, --customer <id>", "Only issues from this customer")
    .option("--json", "Output as JSON")
    .action(async (opts: { status?: string; customer?: string; json?: boolean }) => {
      try {
        const filter: IssueFilter = {};
        if (opts.status) filter.status = IssueStatusSchema.parse(opts.status);
        if (opts.customer) filter.customerId = opts.customer;

        const runtime = await openRuntime({ quiet: true });
        const issues = await runtime.issues.list(filter);

        if (opts.json) {
          console.log(JSON.stringify(issues, null, 2));
          return;
        }

        if (issues.length === 0) {
          console.log("No issues found");
          return;
        }

        for (const issue of issues) {
          console.log(`  ${issue.issueId}  ${issue.customerId}  ${issue.urgency.padEnd(8)}  ${issue.status}`);
          console.log(`    ${issue.rawMessage}`);
          console.log();
        }
      } catch (error) {
        exitWithError("list issues", error);
      }
    });
}
