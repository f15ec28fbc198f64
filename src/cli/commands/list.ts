import { Command } from "commander";
import ora from "ora";
import { logger } from "../../infra/logger.js";
import { toError } from "../../infra/errors.js";
import { formatIssueList } from "../output/issue-display.js";
import { addCommonOptions, createCommandContext, printJson, printLines, type CommonOptions } from "./context.js";

export function createListCommand(): Command {
  const command = addCommonOptions(
    new Command("list").description("List the most recent open issues")
  ).action(async (options: CommonOptions) => {
    try {
      await runList(options);
    } catch (error) {
      logger.error(`List failed: ${toError(error).message}`, error);
      process.exit(1);
    }
  });

  return command;
}

async function runList(options: CommonOptions): Promise<void> {
  const { fetcher, repository } = await createCommandContext(options);

  const spinner = ora(`Fetching issues from ${repository}...`).start();
  const issues = await fetcher.getIssues({ limit: options.limit });
  spinner.stop();

  if (options.json) {
    printJson(issues);
    return;
  }

  printLines(formatIssueList(`Found ${issues.length} issues in ${repository}:`, issues));
}
