/**
 * casetrail serve command - Start the investigation daemon
 */

import { Command } from "commander";
import { getOrCreateToken, regenerateToken, getTokenPath } from "../../auth/token.js";
import { InvestigationDaemon } from "../../server/daemon.js";
import { MemoryRunStore } from "../../store/run-store.js";
import { exitWithError, openRuntime } from "../shared.js";

export interface ServeOptions {
  host?: string;
  port?: number;
  verbose?: boolean;
  newToken?: boolean;
  showToken?: boolean;
  ephemeral?: boolean;
}

export function registerServeCommand(program: Command): void {
  program
    .command("serve")
    .description("Start the investigation daemon")
    .option("--host <host>", "Host to bind to (default: 127.0.0.1)")
    .option("-p, --port <port>", "Port to listen on (default: 3848)", (value) => Number.parseInt(value, 10))
    .option("-v, --verbose", "Enable verbose logging")
    .option("--new-token", "Generate a new auth token")
    .option("--show-token", "Display the auth token on startup")
    .option("--ephemeral", "Keep traces and replay sessions in memory only")
    .action(async (opts: ServeOptions) => {
      try {
        const runtime = await openRuntime(
          { verbose: opts.verbose },
          undefined,
          opts.ephemeral ? { store: new MemoryRunStore() } : {},
        );
        const { logger } = runtime;

        const authToken = opts.newToken ? await regenerateToken() : await getOrCreateToken();

        const serverConfig = {
          ...runtime.config.server,
          ...(opts.host ? { host: opts.host } : {}),
          ...(opts.port !== undefined ? { port: opts.port } : {}),
        };

        const daemon = new InvestigationDaemon(runtime, logger, serverConfig, authToken);

        const shutdown = async (): Promise<void> => {
          console.log("\nShutting down...");
          await daemon.stop();
          await runtime.replay.drain();
          await logger.flush();
          process.exit(0);
        };

        const onSignal = (): void => {
          shutdown().catch((error: unknown) => exitWithError("shut down", error));
        };
        process.on("SIGINT", onSignal);
        process.on("SIGTERM", onSignal);

        const { host, port } = await daemon.start();

        console.log("");
        console.log("Investigation Daemon");
        console.log("====================");
        console.log(`Host:        ${host}`);
        console.log(`Port:        ${port}`);
        console.log(`Token file:  ${getTokenPath()}`);
        console.log(`Storage:     ${opts.ephemeral ? "memory" : "disk"}`);
        console.log(opts.showToken ? `Auth token:  ${authToken}` : "Auth token:  (use --show-token to display)");
        console.log("");
        console.log("Connect with:");
        console.log(`  ws://${host}:${port}`);
        console.log("");
        console.log("Daemon running. Press Ctrl+C to stop.");
      } catch (error) {
        exitWithError("start daemon", error);
      }
    });
}
