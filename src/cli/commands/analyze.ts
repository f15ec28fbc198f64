import { Command } from "commander";
import ora from "ora";
import { logger } from "../../infra/logger.js";
import { toError } from "../../infra/errors.js";
import { IssueAnalyzer } from "../../oss/analysis/issue-analyzer.js";
import { formatAnalysis } from "../output/issue-display.js";
import {
  addCommonOptions,
  createCommandContext,
  parsePositiveInt,
  printJson,
  printLines,
  type CommonOptions,
} from "./context.js";

interface AnalyzeOptions extends CommonOptions {
  issue: number;
}

export function createAnalyzeCommand(): Command {
  const command = addCommonOptions(
    new Command("analyze")
      .description("Estimate complexity, related files and an approach for one issue")
      .requiredOption("-i, --issue <number>", "Issue number", parsePositiveInt)
  ).action(async (options: AnalyzeOptions) => {
    try {
      await runAnalyze(options);
    } catch (error) {
      logger.error(`Analyze failed: ${toError(error).message}`, error);
      process.exit(1);
    }
  });

  return command;
}

async function runAnalyze(options: AnalyzeOptions): Promise<void> {
  const { fetcher } = await createCommandContext(options);

  const spinner = ora(`Analyzing issue #${options.issue}...`).start();
  const analysis = await new IssueAnalyzer(fetcher).analyze(options.issue);
  spinner.stop();

  if (!analysis.found) {
    logger.error(analysis.error);
    process.exit(1);
  }

  if (options.json) {
    printJson(analysis);
    return;
  }

  printLines(formatAnalysis(analysis));
}
