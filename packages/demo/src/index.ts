#!/usr/bin/env node
/**
 * @tally/demo — CLI walkthrough.
 *
 * Loads config, builds the root logger, and runs both account
 * scenarios in the terminal.
 */

import chalk from "chalk";
import pino from "pino";
import { loadConfig } from "./config.js";
import { runWalkthrough } from "./walkthrough.js";

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  console.log();
  console.log(chalk.cyan.bold("  TALLY DEMO"));
  console.log(chalk.gray("  Every attempt is recorded, including rejected ones.\n"));

  const summary = runWalkthrough({
    out: (line) => console.log(line),
    creditLimit: config.DEMO_CREDIT_LIMIT,
    logger,
  });

  logger.info(summary, "Walkthrough complete");
  console.log();
}

try {
  main();
} catch (err: unknown) {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exitCode = 1;
}
