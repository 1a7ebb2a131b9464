/**
 * Helpers shared by casetrail commands
 */

import { loadConfig } from "../config/loader.js";
import type { CasetrailConfig } from "../config/types.js";
import { errorMessage } from "../errors.js";
import { type Runtime, type RuntimeOverrides, createRuntime } from "../runtime/context.js";
import { createLogger } from "../runtime/logger.js";

export interface RuntimeFlags {
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Load config and build the runtime for one command invocation
 */
export async function openRuntime(
  flags: RuntimeFlags,
  adjust?: (config: CasetrailConfig) => void,
  overrides: RuntimeOverrides = {},
): Promise<Runtime> {
  const config = await loadConfig();
  adjust?.(config);
  const logger = createLogger(`cli_${Date.now().toString(36)}`, config.logging, flags);
  return createRuntime(config, logger, overrides);
}

/**
 * Print a command failure and exit with status 1
 */
export function exitWithError(action: string, error: unknown): never {
  console.error(`Failed to ${action}: ${errorMessage(error)}`);
  if (process.env.DEBUG && error instanceof Error) {
    console.error(error.stack);
  }
  process.exit(1);
}

/**
 * Parse a positive integer option value
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}
