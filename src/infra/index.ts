export { logger, type LogLevel } from "./logger.js";
export * from "./errors.js";
export {
  withRetry,
  calculateBackoff,
  createRateLimitPolicy,
  sleep,
  type RetryPolicy,
  type RetryHooks,
  type Sleep,
} from "./retry.js";
