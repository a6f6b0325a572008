#!/usr/bin/env node
import { config } from "dotenv";
config();

import { parseCli, USAGE, type CliOptions } from "./cli.js";
import { resolveConfig } from "./config/index.js";
import { parseLevel, setLogLevel } from "./lib/logger.js";
import { exitCode, formatRunReport, runDigest } from "./pipeline/index.js";

async function main(): Promise<void> {
  let options: CliOptions | "help";
  try {
    options = parseCli(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  if (options === "help") {
    console.log(USAGE);
    return;
  }

  const { configPath, overrides, debug, dryRun } = options;
  if (debug) setLogLevel("debug");

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("\nInterrupted, finishing the current step...");
    controller.abort();
  });

  const report = await runDigest({
    dryRun,
    signal: controller.signal,
    resolve: async () => {
      const resolved = await resolveConfig({ configPath, overrides });
      // --debug wins, then LOG_LEVEL (possibly from .env), then logging.level
      if (!debug) setLogLevel(parseLevel(process.env.LOG_LEVEL) ?? resolved.logLevel);
      return resolved;
    },
  });

  console.log(`\n${formatRunReport(report)}`);
  process.exitCode = exitCode(report.status);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exitCode = 1;
});
