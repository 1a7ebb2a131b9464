import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  CASETRAIL_CONFIG_DIR_ENV,
  getConfigPath,
  getConfigValue,
  initConfig,
  loadConfig,
  saveConfig,
  setConfigValue,
} from "./loader.js";
import { getDefaultConfig } from "./types.js";

describe("config loader", () => {
  let dir: string;
  let previousDir: string | undefined;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "casetrail-config-"));
    previousDir = process.env[CASETRAIL_CONFIG_DIR_ENV];
    process.env[CASETRAIL_CONFIG_DIR_ENV] = dir;
  });

  afterEach(async () => {
    if (previousDir === undefined) {
      delete process.env[CASETRAIL_CONFIG_DIR_ENV];
    } else {
      process.env[CASETRAIL_CONFIG_DIR_ENV] = previousDir;
    }
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("resolves the config file inside the config directory", () => {
    expect(getConfigPath()).toBe(path.join(dir, "config.yaml"));
  });

  it("returns defaults when no file exists", async () => {
    const config = await loadConfig();
    expect(config).toEqual(getDefaultConfig());
    expect(config.limits.maxTurns).toBe(15);
    expect(config.replay.defaultRuns).toBe(3);
    expect(config.cache.ttlSeconds).toEqual({ lookup: 60, similarity: 120, reference: 300 });
  });

  it("fills defaults around a partial YAML file", async () => {
    await fs.writeFile(
      path.join(dir, "config.yaml"),
      "replay:\n  defaultRuns: 5\n  seed: 42\ncritic:\n  enabled: false\n",
    );

    const config = await loadConfig();

    expect(config.replay).toMatchObject({ defaultRuns: 5, seed: 42, concurrency: 3 });
    expect(config.critic.enabled).toBe(false);
    expect(config.model.apiKeyEnv).toBe("ANTHROPIC_API_KEY");
  });

  it("names the file when validation fails", async () => {
    await fs.writeFile(path.join(dir, "config.yaml"), "limits:\n  maxTurns: -1\n");

    await expect(loadConfig()).rejects.toThrow(`Failed to load config from ${path.join(dir, "config.yaml")}`);
  });

  it("refuses to overwrite without force", async () => {
    const { configPath } = await initConfig({ datasetPath: "cases.json" });
    expect(configPath).toBe(path.join(dir, "config.yaml"));
    expect((await loadConfig()).dataset.path).toBe(path.resolve("cases.json"));

    await expect(initConfig()).rejects.toThrow("Config already exists");
    const { config } = await initConfig({ force: true });
    expect(config.dataset.path).toBeUndefined();
  });

  it("saves and reloads", async () => {
    const config = setConfigValue(getDefaultConfig(), "server.port", "4000");
    await saveConfig(config);

    expect((await loadConfig()).server.port).toBe(4000);
  });

  it("reads dotted keys", () => {
    const config = getDefaultConfig();
    expect(getConfigValue(config, "model.critic")).toBe("claude-haiku-4-5");
    expect(getConfigValue(config, "model.unknown")).toBeUndefined();
  });

  it("parses JSON values and validates the result", () => {
    const config = getDefaultConfig();
    expect(setConfigValue(config, "critic.enabled", "false").critic.enabled).toBe(false);
    expect(setConfigValue(config, "model.investigation", "my-model").model.investigation).toBe("my-model");
    expect(() => setConfigValue(config, "replay.defaultRuns", "50")).toThrow();
    expect(config.critic.enabled).toBe(true);
  });

  it("only lets the turn budget go down", async () => {
    const config = getDefaultConfig();
    expect(setConfigValue(config, "limits.maxTurns", "10").limits.maxTurns).toBe(10);
    expect(() => setConfigValue(config, "limits.maxTurns", "30")).toThrow();

    await fs.writeFile(path.join(dir, "config.yaml"), "limits:\n  maxTurns: 16\n");
    await expect(loadConfig()).rejects.toThrow(`Failed to load config from ${path.join(dir, "config.yaml")}`);
  });
});
