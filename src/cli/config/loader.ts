import { existsSync, readFileSync, mkdirSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { config as loadEnv } from "dotenv";
import { ConfigSchema, type Config, type ConfigInput } from "../../types/config.js";
import { ConfigurationError, toError } from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";

// Load .env file if it exists
loadEnv();

const DEFAULT_CONFIG_DIR = join(homedir(), ".issue-compass");
const CONFIG_FILE_NAME = "config.json";

export const CONFIG_PATH_ENV = "ISSUE_COMPASS_CONFIG";

export function expandPath(path: string): string {
  if (path.startsWith("~")) {
    return join(homedir(), path.slice(1));
  }
  return path;
}

/**
 * Explicit path, then $ISSUE_COMPASS_CONFIG, then ~/.issue-compass/config.json
 */
export function getConfigPath(explicitPath?: string): string {
  const fromEnv = process.env[CONFIG_PATH_ENV];
  return expandPath(explicitPath ?? (fromEnv || join(DEFAULT_CONFIG_DIR, CONFIG_FILE_NAME)));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    logger.debug(`No config file at ${configPath}, using defaults`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Failed to parse config file: ${configPath}`, toError(error));
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file must contain a JSON object: ${configPath}`);
  }

  logger.debug(`Loaded config from ${configPath}`);
  return parsed;
}

/**
 * Load and validate the config file. A missing file yields the defaults.
 *
 * @throws ConfigurationError for unreadable JSON or values that fail validation
 */
export function loadConfig(configPath: string = getConfigPath()): Config {
  const fileConfig = readConfigFile(configPath);

  const result = ConfigSchema.safeParse(fileConfig);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new ConfigurationError(`Invalid configuration in ${configPath}: ${errors}`);
  }

  return result.data;
}

/**
 * Token from the configured environment variable, else from the config file.
 */
export function resolveToken(config: Config, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const fromEnv = env[config.github.tokenEnvVar];
  if (fromEnv) {
    return fromEnv;
  }
  return config.github.token ? config.github.token : undefined;
}

function mergeDeep(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const existing = merged[key];
    merged[key] = isRecord(existing) && isRecord(value) ? mergeDeep(existing, value) : value;
  }
  return merged;
}

/**
 * Merge `update` into the file at `configPath`, keeping keys it does not touch.
 */
export function saveConfig(update: ConfigInput, configPath: string = getConfigPath()): void {
  let existing: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    try {
      existing = readConfigFile(configPath);
    } catch (error) {
      logger.warn(`Overwriting unreadable config file ${configPath}: ${toError(error).message}`);
    }
  }

  const merged = mergeDeep(existing, update);
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify(merged, null, 2) + "\n");
  logger.debug(`Config saved to ${configPath}`);
}

/**
 * Persist new expertise keywords and return the config the current run should use.
 */
export function updateExpertise(config: Config, expertise: string[], configPath: string): Config {
  try {
    saveConfig({ agent: { userExpertise: expertise } }, configPath);
    logger.success(`Updated expertise in config file: ${expertise.join(", ")}`);
  } catch (error) {
    logger.warn(`Could not update config file: ${toError(error).message}`);
  }
  return { ...config, agent: { ...config.agent, userExpertise: expertise } };
}
