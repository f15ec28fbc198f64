import { RateLimitError, toError } from "./errors.js";
import { logger } from "./logger.js";

export type Sleep = (ms: number) => Promise<void>;

/**
 * A bounded retry policy: how many extra attempts are allowed, which
 * errors qualify, and how long to wait before each retry.
 */
export interface RetryPolicy {
  /** Retries after the first attempt (0 disables retrying) */
  maxRetries: number;
  shouldRetry: (error: Error, attempt: number) => boolean;
  /** Delay in milliseconds before retry number `attempt` (0-based) */
  backoff: (error: Error, attempt: number) => number;
}

export interface RetryHooks {
  sleep?: Sleep | undefined;
  onRetry?: ((error: Error, attempt: number, delayMs: number) => void) | undefined;
}

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff: base * 2^attempt, clamped to `maxDelayMs`,
 * with up to 25% jitter when enabled.
 */
export function calculateBackoff(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitter: boolean
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const clampedDelay = Math.min(exponentialDelay, maxDelayMs);

  if (jitter) {
    const jitterFactor = 1 + Math.random() * 0.25;
    return Math.floor(clampedDelay * jitterFactor);
  }

  return clampedDelay;
}

/**
 * Policy used by the GitHub client: only rate-limit errors are retried, and the
 * wait is the server-provided reset delay. Errors without a `retryAfter`
 * fall back to exponential backoff.
 */
export function createRateLimitPolicy(
  maxRetries: number,
  fallback: { baseDelayMs: number; maxDelayMs: number } = { baseDelayMs: 1000, maxDelayMs: 30000 }
): RetryPolicy {
  return {
    maxRetries,
    shouldRetry: (error) => error instanceof RateLimitError,
    backoff: (error, attempt) => {
      if (error instanceof RateLimitError && error.retryAfter !== undefined) {
        return error.retryAfter * 1000;
      }
      return calculateBackoff(attempt, fallback.baseDelayMs, fallback.maxDelayMs, false);
    },
  };
}

/**
 * Run `fn`, retrying per `policy`.
 *
 * @throws The last error once the policy declines or retries are exhausted
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<T> {
  const wait = hooks.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = toError(error);

      if (attempt >= policy.maxRetries || !policy.shouldRetry(lastError, attempt)) {
        throw lastError;
      }

      const delayMs = Math.max(0, policy.backoff(lastError, attempt));

      if (hooks.onRetry) {
        hooks.onRetry(lastError, attempt + 1, delayMs);
      } else {
        logger.debug(
          `Retry ${attempt + 1}/${policy.maxRetries} after ${delayMs}ms: ${lastError.message}`
        );
      }

      await wait(delayMs);
    }
  }
}
