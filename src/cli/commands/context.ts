import { Command, InvalidArgumentError, Option } from "commander";
import { logger } from "../../infra/logger.js";
import { UsageError } from "../../infra/errors.js";
import { getConfigPath, loadConfig, resolveToken, updateExpertise } from "../config/loader.js";
import { GitHubApiClient, type FetchFn } from "../../core/github/api-client.js";
import { IssueFetcher } from "../../core/github/issue-fetcher.js";
import { PriorityEngine } from "../../oss/selection/priority-engine.js";
import { ScoringProfileSchema, type Config } from "../../types/config.js";

const REPOSITORY_PATTERN = /^[^/\s]+\/[^/\s]+$/;

export interface CommonOptions {
  repo?: string;
  token?: string;
  config?: string;
  limit: number;
  expertise?: string[];
  profile?: string;
  json: boolean;
}

export interface CommandContext {
  config: Config;
  repository: string;
  client: GitHubApiClient;
  fetcher: IssueFetcher;
  engine: PriorityEngine;
}

/** Hooks for tests; the CLI itself uses the defaults */
export interface ContextOverrides {
  fetch?: FetchFn;
  now?: () => number;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function addCommonOptions(command: Command, defaultLimit = 10): Command {
  return command
    .option("-r, --repo <owner/repo>", "GitHub repository")
    .option("-t, --token <token>", "GitHub personal access token")
    .option("-c, --config <path>", "Path to config file")
    .option("-n, --limit <n>", "Maximum number of issues to display", parsePositiveInt, defaultLimit)
    .option("-e, --expertise <keywords...>", "Your areas of expertise (saved to the config file)")
    .addOption(
      new Option("--profile <profile>", "Scoring profile").choices(ScoringProfileSchema.options)
    )
    .option("--json", "Output as JSON", false);
}

/**
 * Resolve config, repository and token, then build the client stack.
 * Flags win over the config file, which wins over defaults.
 *
 * @throws UsageError when no usable repository is given
 * @throws ConnectionError when `verify` is set and the repository is unreachable
 */
export async function createCommandContext(
  options: CommonOptions,
  { verify = true }: { verify?: boolean } = {},
  overrides: ContextOverrides = {}
): Promise<CommandContext> {
  const configPath = getConfigPath(options.config);
  let config = loadConfig(configPath);

  if (config.verbose) {
    logger.configure({ level: "debug", verbose: true });
  }

  if (options.expertise && options.expertise.length > 0) {
    config = updateExpertise(config, options.expertise, configPath);
  }

  const profile = ScoringProfileSchema.safeParse(options.profile);
  if (profile.success) {
    config = { ...config, scoring: { ...config.scoring, profile: profile.data } };
  }

  const repository = options.repo ?? config.github.repository;
  if (!repository) {
    throw new UsageError(
      `No repository specified. Use --repo or set github.repository in ${configPath}`
    );
  }
  if (!REPOSITORY_PATTERN.test(repository)) {
    throw new UsageError(`Repository must be in owner/repo form, got "${repository}"`);
  }

  const token = options.token ?? resolveToken(config);
  if (!token) {
    logger.warn(
      `No GitHub token provided. Set ${config.github.tokenEnvVar} or use --token; unauthenticated requests are heavily rate-limited.`
    );
  }

  const client = new GitHubApiClient({
    repository,
    token,
    apiUrl: config.github.apiUrl,
    rateLimit: config.rateLimit,
    fetch: overrides.fetch,
    now: overrides.now,
  });

  if (verify) {
    await client.verifyConnection();
  }

  return {
    config,
    repository,
    client,
    fetcher: new IssueFetcher(client),
    engine: PriorityEngine.fromConfig(config, overrides.now),
  };
}

export function printLines(lines: string[]): void {
  console.log(lines.join("\n"));
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
