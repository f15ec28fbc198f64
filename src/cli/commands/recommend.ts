import { Command } from "commander";
import ora from "ora";
import { logger } from "../../infra/logger.js";
import { toError } from "../../infra/errors.js";
import { DEFAULT_FETCH_LIMIT } from "../../core/github/issue-fetcher.js";
import {
  recommend,
  recommendationReasons,
  type Recommendation,
} from "../../oss/selection/recommendation.js";
import { formatRecommendations } from "../output/issue-display.js";
import { addCommonOptions, createCommandContext, printJson, printLines, type CommonOptions } from "./context.js";

export function createRecommendCommand(): Command {
  const command = addCommonOptions(
    new Command("recommend").description(
      "Suggest issues to work on, favouring contributor-friendly issues that match your expertise"
    )
  ).action(async (options: CommonOptions) => {
    try {
      await runRecommend(options);
    } catch (error) {
      logger.error(`Recommend failed: ${toError(error).message}`, error);
      process.exit(1);
    }
  });

  return command;
}

async function runRecommend(options: CommonOptions): Promise<void> {
  const { fetcher, engine, repository } = await createCommandContext(options);

  const spinner = ora(`Fetching issues from ${repository}...`).start();
  let recommendation: Recommendation;
  try {
    const issues = await fetcher.getIssues({ limit: DEFAULT_FETCH_LIMIT });
    recommendation = recommend(engine.prioritize(issues), options.limit);
    spinner.stop();
  } catch (error) {
    spinner.fail("Could not rank issues");
    throw error;
  }

  logger.debug(`Recommendations drawn from tier "${recommendation.tier}"`);

  if (options.json) {
    printJson({
      tier: recommendation.tier,
      issues: recommendation.issues.map((issue) => ({
        ...issue,
        reasons: recommendationReasons(issue),
      })),
    });
    return;
  }

  printLines(formatRecommendations(repository, recommendation.issues));
}
