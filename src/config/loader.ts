/**
 * Configuration loading and validation
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import YAML from "yaml";
import { type CasetrailConfig, CasetrailConfigSchema, getDefaultConfig } from "./types.js";

/** Default config directory */
export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), ".casetrail");

/** Default config file name */
export const CONFIG_FILE_NAME = "config.yaml";

/** Environment variable for config path override */
export const CASETRAIL_CONFIG_PATH_ENV = "CASETRAIL_CONFIG_PATH";

/** Environment variable for config directory override */
export const CASETRAIL_CONFIG_DIR_ENV = "CASETRAIL_CONFIG_DIR";

/**
 * Get the configuration directory path
 */
export function getConfigDir(): string {
  return process.env[CASETRAIL_CONFIG_DIR_ENV] || DEFAULT_CONFIG_DIR;
}

/**
 * Get the configuration file path
 */
export function getConfigPath(): string {
  const override = process.env[CASETRAIL_CONFIG_PATH_ENV];
  if (override) {
    return override;
  }
  return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

/**
 * Check if config file exists
 */
export async function configExists(): Promise<boolean> {
  try {
    await fs.access(getConfigPath());
    return true;
  } catch {
    return false;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Load configuration from file
 */
export async function loadConfig(): Promise<CasetrailConfig> {
  const configPath = getConfigPath();

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      // Return default config if file doesn't exist
      return getDefaultConfig();
    }
    throw error;
  }

  try {
    const parsed: unknown = YAML.parse(content);
    return CasetrailConfigSchema.parse(parsed ?? {});
  } catch (error) {
    throw new Error(
      `Failed to load config from ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

/**
 * Save configuration to file
 */
export async function saveConfig(config: CasetrailConfig): Promise<void> {
  const configPath = getConfigPath();
  const configDir = path.dirname(configPath);

  await fs.mkdir(configDir, { recursive: true });

  // Validate before saving
  const validated = CasetrailConfigSchema.parse(config);

  const content = YAML.stringify(validated, { indent: 2 });
  await fs.writeFile(configPath, content, "utf-8");
}

/**
 * Initialize configuration with defaults
 */
export async function initConfig(options?: {
  datasetPath?: string;
  force?: boolean;
}): Promise<{ configPath: string; config: CasetrailConfig }> {
  const configPath = getConfigPath();

  if (!options?.force && (await configExists())) {
    throw new Error(`Config already exists at ${configPath}`);
  }

  const config = getDefaultConfig();

  if (options?.datasetPath) {
    config.dataset.path = path.resolve(options.datasetPath);
  }

  await saveConfig(config);

  return { configPath, config };
}

/**
 * Read a value by dot-notation key
 */
export function getConfigValue(config: CasetrailConfig, key: string): unknown {
  let value: unknown = config;

  for (const part of key.split(".")) {
    if (typeof value === "object" && value !== null && part in value) {
      value = Reflect.get(value, part);
    } else {
      return undefined;
    }
  }

  return value;
}

/**
 * Return a validated copy of the config with one dot-notation key replaced.
 * The raw value is parsed as JSON when possible, otherwise kept as a string.
 */
export function setConfigValue(
  config: CasetrailConfig,
  key: string,
  rawValue: string,
): CasetrailConfig {
  const parts = key.split(".");
  const lastPart = parts.pop();
  if (!lastPart) {
    throw new Error("Invalid key");
  }

  let value: unknown;
  try {
    value = JSON.parse(rawValue);
  } catch {
    value = rawValue;
  }

  const draft: unknown = structuredClone(config);
  let target: unknown = draft;
  for (const part of parts) {
    if (typeof target !== "object" || target === null) {
      throw new Error(`Key not found: ${key}`);
    }
    if (!(part in target) || Reflect.get(target, part) === undefined) {
      Reflect.set(target, part, {});
    }
    target = Reflect.get(target, part);
  }

  if (typeof target !== "object" || target === null) {
    throw new Error(`Key not found: ${key}`);
  }
  Reflect.set(target, lastPart, value);

  return CasetrailConfigSchema.parse(draft);
}
