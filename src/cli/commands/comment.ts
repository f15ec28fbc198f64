import { Command } from "commander";
import { logger } from "../../infra/logger.js";
import { toError } from "../../infra/errors.js";
import {
  addCommonOptions,
  createCommandContext,
  parsePositiveInt,
  printJson,
  type CommonOptions,
} from "./context.js";

interface CommentOptions extends CommonOptions {
  issue: number;
  message: string;
}

export function createCommentCommand(): Command {
  const command = addCommonOptions(
    new Command("comment")
      .description("Post a comment on an issue")
      .requiredOption("-i, --issue <number>", "Issue number", parsePositiveInt)
      .requiredOption("-m, --message <text>", "Comment body")
  ).action(async (options: CommentOptions) => {
    try {
      await runComment(options);
    } catch (error) {
      logger.error(`Comment failed: ${toError(error).message}`, error);
      process.exit(1);
    }
  });

  return command;
}

async function runComment(options: CommentOptions): Promise<void> {
  const { fetcher, client } = await createCommandContext(options);

  if (!client.isAuthenticated) {
    logger.warn("Posting comments requires a token; the request will likely be rejected");
  }

  const comment = await fetcher.createComment(options.issue, options.message);
  if (!comment) {
    logger.error(`Could not post comment on issue #${options.issue}`);
    process.exit(1);
  }

  if (options.json) {
    printJson(comment);
    return;
  }

  logger.success(`Posted comment ${comment.id} on issue #${options.issue}`);
}
