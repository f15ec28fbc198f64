import { Command } from "commander";
import ora from "ora";
import { logger } from "../../infra/logger.js";
import { toError } from "../../infra/errors.js";
import { formatIssueList } from "../output/issue-display.js";
import { addCommonOptions, createCommandContext, printJson, printLines, type CommonOptions } from "./context.js";

interface AssignedOptions extends CommonOptions {
  username: string;
}

export function createAssignedCommand(): Command {
  const command = addCommonOptions(
    new Command("assigned")
      .description("List open issues assigned to a user")
      .requiredOption("-u, --username <login>", "GitHub username")
  ).action(async (options: AssignedOptions) => {
    try {
      await runAssigned(options);
    } catch (error) {
      logger.error(`Assigned failed: ${toError(error).message}`, error);
      process.exit(1);
    }
  });

  return command;
}

async function runAssigned(options: AssignedOptions): Promise<void> {
  const { fetcher, repository } = await createCommandContext(options);

  const spinner = ora(`Fetching issues assigned to ${options.username}...`).start();
  const assigned = await fetcher.getAssignedIssues(options.username);
  spinner.stop();

  const shown = assigned.slice(0, options.limit);
  if (options.json) {
    printJson(shown);
    return;
  }

  printLines(
    formatIssueList(
      `Found ${assigned.length} issues assigned to ${options.username} in ${repository}:`,
      shown
    )
  );
}
