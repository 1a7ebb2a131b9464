/**
 * casetrail config command - View and edit configuration
 */

import { Command } from "commander";
import {
  loadConfig,
  saveConfig,
  getConfigPath,
  getConfigValue,
  setConfigValue,
} from "../../config/loader.js";
import { exitWithError } from "../shared.js";

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command("config").description("View and edit configuration");

  configCmd
    .command("path")
    .description("Show config file path")
    .action(() => {
      console.log(getConfigPath());
    });

  configCmd
    .command("show")
    .description("Show current configuration as JSON")
    .action(async () => {
      try {
        const config = await loadConfig();
        console.log(JSON.stringify(config, null, 2));
      } catch (error) {
        exitWithError("load config", error);
      }
    });

  configCmd
    .command("get")
    .description("Get a config value")
    .argument("<key>", "Config key (dot notation, e.g., server.port)")
    .action(async (key: string) => {
      try {
        const value = getConfigValue(await loadConfig(), key);
        if (value === undefined) {
          console.error(`Key not found: ${key}`);
          process.exit(1);
        }

        console.log(typeof value === "object" ? JSON.stringify(value, null, 2) : String(value));
      } catch (error) {
        exitWithError("get config", error);
      }
    });

  configCmd
    .command("set")
    .description("Set a config value")
    .argument("<key>", "Config key (dot notation)")
    .argument("<value>", "Value to set (JSON for numbers, booleans, objects and arrays)")
    .action(async (key: string, rawValue: string) => {
      try {
        const updated = setConfigValue(await loadConfig(), key, rawValue);
        await saveConfig(updated);
        console.log(`✓ Set ${key} = ${JSON.stringify(getConfigValue(updated, key))}`);
      } catch (error) {
        exitWithError("set config", error);
      }
    });
}
