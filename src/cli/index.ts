#!/usr/bin/env node

import { Command } from "commander";
import pc from "picocolors";
import {
  createListCommand,
  createPrioritizeCommand,
  createRecommendCommand,
  createAssignedCommand,
  createAnalyzeCommand,
  createCommentCommand,
  createRateLimitCommand,
} from "./commands/index.js";
import { logger } from "../infra/logger.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("issue-compass")
  .description(pc.cyan("Find, rank and analyze GitHub issues worth contributing to"))
  .version(VERSION, "-V, --version", "Output the version number")
  .option("-v, --verbose", "Enable verbose output")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.verbose) {
      logger.configure({ level: "debug", verbose: true });
    }
  });

// Register commands
program.addCommand(createListCommand());
program.addCommand(createPrioritizeCommand());
program.addCommand(createRecommendCommand());
program.addCommand(createAssignedCommand());
program.addCommand(createAnalyzeCommand());
program.addCommand(createCommentCommand());
program.addCommand(createRateLimitCommand());

// Error handling
program.exitOverride((err) => {
  if (err.code === "commander.help" || err.code === "commander.helpDisplayed") {
    process.exit(0);
  }
  if (err.code === "commander.version") {
    process.exit(0);
  }
  logger.error(`Command failed: ${err.message}`);
  process.exit(1);
});

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      logger.error(error.message, error);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error("Unexpected error", error);
  process.exit(1);
});
