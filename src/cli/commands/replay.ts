/**
 * casetrail replay command - Measure verdict stability
 */

import { Command } from "commander";
import { FileRunStore } from "../../store/run-store.js";
import { formatSession } from "../format.js";
import { exitWithError, openRuntime, parsePositiveInt } from "../shared.js";

export function registerReplayCommand(program: Command): void {
  const replayCmd = program.command("replay").description("Replay investigations under reworded issues");

  replayCmd
    .command("start")
    .description("Replay a finished trace and report its stability score")
    .argument("<trace-id>", "Trace to replay")
    .option("-n, --runs <n>", "Number of reworded runs (1-20)", parsePositiveInt)
    .option("--seed <seed>", "Seed for reproducible rewording", parsePositiveInt)
    .option("--json", "Output as JSON")
    .option("-v, --verbose", "Enable verbose logging")
    .action(
      async (traceId: string, opts: { runs?: number; seed?: number; json?: boolean; verbose?: boolean }) => {
        try {
          const runtime = await openRuntime({ verbose: opts.verbose, quiet: opts.json }, (config) => {
            if (opts.seed !== undefined) config.replay.seed = opts.seed;
          });

          if (!opts.json) {
            runtime.replay.onEvent((event) => {
              if (event.type === "replay.run_completed") {
                const { run } = event;
                console.log(`  run ${run.index + 1}: ${run.matchesOriginal ? "match" : "differs"}`);
              }
            });
          }

          const session = await runtime.replay.replay(traceId, opts.runs);
          await runtime.logger.flush();

          console.log(opts.json ? JSON.stringify(session, null, 2) : `\n${formatSession(session)}`);

          if (session.status === "failed") {
            process.exit(1);
          }
        } catch (error) {
          exitWithError("replay", error);
        }
      },
    );

  replayCmd
    .command("show")
    .description("Show a replay session")
    .argument("<session-id>", "Replay session ID")
    .option("--json", "Output as JSON")
    .action(async (sessionId: string, opts: { json?: boolean }) => {
      try {
        const session = await new FileRunStore().getReplay(sessionId);
        if (!session) {
          console.error(`No replay session found: ${sessionId}`);
          process.exit(1);
        }
        console.log(opts.json ? JSON.stringify(session, null, 2) : formatSession(session));
      } catch (error) {
        exitWithError("show replay", error);
      }
    });
}
