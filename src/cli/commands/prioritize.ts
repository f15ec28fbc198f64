import { Command } from "commander";
import ora from "ora";
import { logger } from "../../infra/logger.js";
import { toError } from "../../infra/errors.js";
import { DEFAULT_FETCH_LIMIT } from "../../core/github/issue-fetcher.js";
import { formatIssueList } from "../output/issue-display.js";
import type { PrioritizedIssue } from "../../types/issue.js";
import { addCommonOptions, createCommandContext, printJson, printLines, type CommonOptions } from "./context.js";

export function createPrioritizeCommand(): Command {
  const command = addCommonOptions(
    new Command("prioritize").description("Rank open issues by priority score")
  ).action(async (options: CommonOptions) => {
    try {
      await runPrioritize(options);
    } catch (error) {
      logger.error(`Prioritize failed: ${toError(error).message}`, error);
      process.exit(1);
    }
  });

  return command;
}

async function runPrioritize(options: CommonOptions): Promise<void> {
  const { fetcher, engine, repository } = await createCommandContext(options);

  const spinner = ora(`Fetching issues from ${repository}...`).start();
  let top: PrioritizedIssue[];
  try {
    const issues = await fetcher.getIssues({ limit: DEFAULT_FETCH_LIMIT });
    spinner.text = `Scoring ${issues.length} issues...`;
    top = engine.prioritize(issues).slice(0, options.limit);
    spinner.stop();
  } catch (error) {
    spinner.fail("Could not rank issues");
    throw error;
  }

  if (options.json) {
    printJson(top);
    return;
  }

  printLines(formatIssueList(`Top ${options.limit} prioritized issues in ${repository}:`, top));
}
