/**
 * casetrail init command
 */

import { Command } from "commander";
import { initConfig, configExists, getConfigPath } from "../../config/loader.js";
import { exitWithError } from "../shared.js";

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Initialize casetrail configuration")
    .option("-d, --dataset <path>", "Case dataset to investigate against")
    .option("-f, --force", "Overwrite existing config")
    .action(async (opts: { dataset?: string; force?: boolean }) => {
      const configPath = getConfigPath();

      if (!opts.force && (await configExists())) {
        console.log(`Config already exists at ${configPath}`);
        console.log("Use --force to overwrite");
        return;
      }

      try {
        const { configPath: savedPath, config } = await initConfig({
          datasetPath: opts.dataset,
          force: opts.force,
        });

        console.log(`✓ Created config at ${savedPath}`);
        console.log(`  Dataset: ${config.dataset.path ?? "(bundled sample)"}`);

        console.log("\nNext steps:");
        console.log(`  1. Export ${config.model.apiKeyEnv}`);
        console.log("  2. List issues:     casetrail issues list");
        console.log("  3. Investigate one: casetrail investigate <issue-id>");
      } catch (error) {
        exitWithError("initialize", error);
      }
    });
}
