#!/usr/bin/env node

import { loadConfig } from "./config.js";
import { UsageError } from "./errors.js";
import { commands } from "./commands/index.js";
import { runCli } from "./commands/dispatch.js";
import { createLogger, type Logger } from "./utils/logger.js";

const CLI_NAME = "notes-toolkit";

function startLogger(): Logger {
  try {
    return createLogger(loadConfig());
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

const logger = startLogger();

process.on("uncaughtException", (error) => {
  logger.fatal({ group: "Process", err: error }, "Uncaught exception");
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ group: "Process", reason }, "Unhandled rejection");
  process.exit(1);
});

logger.debug({ group: "Process", argv: process.argv.slice(2) }, "Starting");

process.exitCode = await runCli(process.argv.slice(2), commands, { logger }, CLI_NAME);
