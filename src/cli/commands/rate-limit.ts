import { Command } from "commander";
import { logger } from "../../infra/logger.js";
import { toError } from "../../infra/errors.js";
import { formatRateLimit } from "../output/issue-display.js";
import { addCommonOptions, createCommandContext, printJson, printLines, type CommonOptions } from "./context.js";

export function createRateLimitCommand(): Command {
  const command = addCommonOptions(
    new Command("rate-limit").description("Show the remaining GitHub API quota")
  ).action(async (options: CommonOptions) => {
    try {
      await runRateLimit(options);
    } catch (error) {
      logger.error(`Rate limit check failed: ${toError(error).message}`, error);
      process.exit(1);
    }
  });

  return command;
}

async function runRateLimit(options: CommonOptions): Promise<void> {
  // Polling the quota does not need the repository to be reachable
  const { client } = await createCommandContext(options, { verify: false });

  const status = await client.getRateLimitStatus();
  if (!status) {
    logger.error("Could not retrieve rate limit status");
    process.exit(1);
  }

  if (options.json) {
    printJson({ ...status, reset: status.reset.toISOString() });
    return;
  }

  printLines(formatRateLimit(status));
}
