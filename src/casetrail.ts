#!/usr/bin/env node
/**
 * casetrail CLI entry point
 */

import { runCli } from "./cli/main.js";

runCli().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
