/**
 * casetrail runs command - View stored investigation traces
 */

import { Command } from "commander";
import { formatRunLog } from "../../orchestrator/core.js";
import { FileRunStore, type TraceFilter } from "../../store/run-store.js";
import { formatTraceLine, formatVerdict } from "../format.js";
import { exitWithError, parsePositiveInt } from "../shared.js";

const TRACE_STATUSES = ["running", "completed", "escalated", "failed"] as const;

function isTraceStatus(value: string): value is (typeof TRACE_STATUSES)[number] {
  return TRACE_STATUSES.some((status) => status === value);
}

export function registerRunsCommand(program: Command): void {
  const runsCmd = program.command("runs").description("View investigation traces");

  runsCmd
    .command("list")
    .description("List recent traces, newest first")
    .option("-n, --limit <n>", "Number of traces to show", parsePositiveInt, 20)
    .option("-i, --issue <id>", "Only traces for this issue")
    .option("-s, --status <status>", "Only traces with this status")
    .option("--replays", "Include replay children")
    .option("--json", "Output as JSON")
    .action(
      async (opts: { limit: number; issue?: string; status?: string; replays?: boolean; json?: boolean }) => {
        try {
          const filter: TraceFilter = { limit: opts.limit };
          if (opts.issue) filter.issueId = opts.issue;
          if (opts.status) {
            if (!isTraceStatus(opts.status)) {
              throw new Error(`Unknown status: ${opts.status}`);
            }
            filter.status = opts.status;
          }
          if (!opts.replays) filter.isReplay = false;

          const traces = await new FileRunStore().listTraces(filter);

          if (opts.json) {
            console.log(JSON.stringify(traces, null, 2));
            return;
          }

          if (traces.length === 0) {
            console.log("No runs found");
            return;
          }

          for (const trace of traces) {
            console.log(`  ${formatTraceLine(trace)}`);
          }
        } catch (error) {
          exitWithError("list runs", error);
        }
      },
    );

  runsCmd
    .command("show")
    .description("Show one trace")
    .argument("<trace-id>", "Trace ID to show")
    .option("--json", "Output as JSON")
    .option("--markdown", "Output the full run log as markdown")
    .action(async (traceId: string, opts: { json?: boolean; markdown?: boolean }) => {
      try {
        const trace = await new FileRunStore().getTrace(traceId);
        if (!trace) {
          console.error(`No trace found: ${traceId}`);
          process.exit(1);
        }

        if (opts.json) {
          console.log(JSON.stringify(trace, null, 2));
        } else if (opts.markdown) {
          console.log(formatRunLog(trace));
        } else {
          console.log(formatVerdict(trace));
        }
      } catch (error) {
        exitWithError("show run", error);
      }
    });
}
