/**
 * Logging infrastructure for casetrail
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { LoggingConfig } from "../config/types.js";
import { getConfigDir } from "../config/loader.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger instance for a process or a run
 */
export interface CasetrailLogger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
  /** Tool call line. Takes the argument digest, never raw arguments. */
  tool: (name: string, argsDigest: string, cacheHit: boolean, latencyMs: number) => void;
  flush: () => Promise<void>;
}

/**
 * Format a log message for console output
 */
function formatConsoleMessage(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>,
  config?: LoggingConfig,
): string {
  const parts: string[] = [];

  if (config?.timestamps ?? true) {
    parts.push(`[${new Date().toISOString()}]`);
  }

  parts.push(`[${level.toUpperCase().padEnd(5)}]`);
  parts.push(message);

  if (data && Object.keys(data).length > 0) {
    parts.push(JSON.stringify(data));
  }

  return parts.join(" ");
}

/**
 * Format a log entry as JSON
 */
function formatJsonLog(
  level: LogLevel,
  message: string,
  logId: string,
  data?: Record<string, unknown>,
): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    logId,
    message,
    ...data,
  });
}

/**
 * Create a logger. Lines are buffered and appended to `<logDir>/<logId>.log` on flush.
 */
export function createLogger(
  logId: string,
  config: LoggingConfig,
  options?: {
    quiet?: boolean;
    verbose?: boolean;
  },
): CasetrailLogger {
  const logBuffer: string[] = [];
  const effectiveLevel: LogLevel = options?.verbose ? "debug" : config.level;
  const shouldLog = (level: LogLevel): boolean =>
    LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[effectiveLevel];

  const log = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (!shouldLog(level)) return;

    const formattedLine = config.jsonLogs
      ? formatJsonLog(level, message, logId, data)
      : formatConsoleMessage(level, message, data, config);

    logBuffer.push(formattedLine);

    // stdout is reserved for command output; logs go to stderr
    if (!options?.quiet) {
      console.error(formattedLine);
    }
  };

  return {
    debug: (message, data) => log("debug", message, data),
    info: (message, data) => log("info", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, data) => log("error", message, data),

    tool: (name, argsDigest, cacheHit, latencyMs) => {
      log("debug", `Tool: ${name}`, {
        argsDigest,
        cacheHit,
        latency_ms: latencyMs,
      });
    },

    flush: async () => {
      if (!config.logDir || logBuffer.length === 0) return;

      const logDir = config.logDir.startsWith("~")
        ? path.join(getConfigDir(), "logs")
        : config.logDir;

      await fs.mkdir(logDir, { recursive: true });

      const logFile = path.join(logDir, `${logId}.log`);
      await fs.appendFile(logFile, logBuffer.join("\n") + "\n");
      logBuffer.length = 0;
    },
  };
}

/**
 * Logger that discards everything
 */
export function createSilentLogger(): CasetrailLogger {
  const noop = (): void => {};
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    tool: noop,
    flush: async () => {},
  };
}
