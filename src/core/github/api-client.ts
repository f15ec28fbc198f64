/**
 * GitHub REST client scoped to a single repository.
 *
 * Every call polls the rate-limit endpoint first and sleeps until the quota
 * resets when it is nearly exhausted. A "rate limit exceeded" 403 is retried
 * through a bounded {@link RetryPolicy} (one retry by default). All other
 * failures are logged and returned as `{ ok: false }` instead of thrown.
 */

import {
  ApiRequestError,
  ConnectionError,
  IssueCompassError,
  NetworkError,
  RateLimitError,
  toError,
} from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";
import { createRateLimitPolicy, sleep, withRetry } from "../../infra/retry.js";
import type { RetryPolicy, Sleep } from "../../infra/retry.js";
import type { RateLimitConfig } from "../../types/config.js";
import type { RateLimitStatus } from "../../types/issue.js";
import { RateLimitResponseSchema, toRateLimitStatus } from "./schemas.js";

export type HttpMethod = "GET" | "POST" | "PATCH";

export type FetchFn = typeof globalThis.fetch;

export interface ApiRequestOptions {
  method?: HttpMethod | undefined;
  body?: Record<string, unknown> | undefined;
}

/** `data` is null when the response had no body */
export type ApiResult<T = unknown> =
  | { ok: true; data: T | null }
  | { ok: false; error: IssueCompassError };

export interface GitHubApiClientOptions {
  /** owner/repo */
  repository: string;
  token?: string | undefined;
  apiUrl?: string | undefined;
  rateLimit?: Partial<RateLimitConfig> | undefined;
  fetch?: FetchFn | undefined;
  sleep?: Sleep | undefined;
  /** Current time in epoch milliseconds */
  now?: (() => number) | undefined;
}

const DEFAULT_API_URL = "https://api.github.com";
const USER_AGENT = "issue-compass";

export class GitHubApiClient {
  readonly repository: string;
  readonly apiUrl: string;
  readonly baseUrl: string;

  private readonly token: string | undefined;
  private readonly rateLimit: RateLimitConfig;
  private readonly retryPolicy: RetryPolicy;
  private readonly fetchImpl: FetchFn;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(options: GitHubApiClientOptions) {
    this.repository = options.repository;
    this.apiUrl = (options.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, "");
    this.baseUrl = `${this.apiUrl}/repos/${options.repository}`;
    this.token = options.token;
    this.rateLimit = {
      minRemaining: options.rateLimit?.minRemaining ?? 5,
      marginSeconds: options.rateLimit?.marginSeconds ?? 1,
      maxRetries: options.rateLimit?.maxRetries ?? 1,
    };
    this.retryPolicy = createRateLimitPolicy(this.rateLimit.maxRetries);
    this.fetchImpl = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  get isAuthenticated(): boolean {
    return Boolean(this.token);
  }

  /**
   * Call `endpoint` relative to the repository resource.
   * An empty endpoint addresses the repository itself.
   */
  async request(endpoint: string, options: ApiRequestOptions = {}): Promise<ApiResult> {
    const method = options.method ?? "GET";
    const url = this.resolve(endpoint);

    try {
      const data = await withRetry(
        async () => {
          await this.waitForRateLimit();
          return this.send(url, method, options.body);
        },
        this.retryPolicy,
        {
          sleep: this.sleep,
          onRetry: (_error, attempt, delayMs) => {
            logger.warn(
              `Rate limit exceeded. Waiting for ${Math.ceil(delayMs / 1000)} seconds before retry ${attempt}/${this.retryPolicy.maxRetries}...`
            );
          },
        }
      );
      return { ok: true, data };
    } catch (error) {
      const apiError =
        error instanceof IssueCompassError
          ? error
          : new NetworkError(`Request to ${url} failed`, toError(error));
      logger.error(`Error making ${method} request to ${url}: ${apiError.message}`, apiError);
      return { ok: false, error: apiError };
    }
  }

  /**
   * Startup check that the repository is reachable with the current credentials.
   *
   * @throws ConnectionError when it is not
   */
  async verifyConnection(): Promise<void> {
    const result = await this.request("");
    if (!result.ok) {
      throw new ConnectionError(
        `Failed to connect to GitHub repository ${this.repository}: ${result.error.message}`,
        this.repository,
        result.error
      );
    }
    logger.success(`Connected to GitHub repository: ${this.repository}`);
  }

  /**
   * Read the core quota. Returns null when the endpoint cannot be read.
   */
  async getRateLimitStatus(): Promise<RateLimitStatus | null> {
    const url = `${this.apiUrl}/rate_limit`;
    try {
      const response = await this.fetchImpl(url, { method: "GET", headers: this.headers() });
      if (response.status !== 200) {
        logger.warn(`Could not check rate limits: HTTP ${response.status}`);
        return null;
      }
      const parsed = RateLimitResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        logger.warn(`Unexpected rate limit payload: ${parsed.error.message}`);
        return null;
      }
      return toRateLimitStatus(parsed.data);
    } catch (error) {
      logger.warn(`Could not check rate limits: ${toError(error).message}`);
      return null;
    }
  }

  private async waitForRateLimit(): Promise<void> {
    const status = await this.getRateLimitStatus();
    if (!status || status.remaining > this.rateLimit.minRemaining) {
      return;
    }

    const waitMs =
      Math.max(status.reset.getTime() - this.now(), 0) + this.rateLimit.marginSeconds * 1000;
    logger.warn(
      `Only ${status.remaining} API calls remaining. Waiting for ${Math.ceil(waitMs / 1000)} seconds...`
    );
    await this.sleep(waitMs);
  }

  private async send(
    url: string,
    method: HttpMethod,
    body: Record<string, unknown> | undefined
  ): Promise<unknown> {
    const init: RequestInit = { method, headers: this.headers(body !== undefined) };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, init);
    } catch (error) {
      const cause = toError(error);
      throw new NetworkError(cause.message, cause);
    }

    const text = await response.text();

    if (response.status === 403 && text.toLowerCase().includes("rate limit exceeded")) {
      const reset = Number(response.headers.get("x-ratelimit-reset") ?? "0");
      throw new RateLimitError(
        `Rate limit exceeded for ${method} ${url}`,
        this.secondsUntil(Number.isFinite(reset) ? reset : 0)
      );
    }

    if (!response.ok) {
      throw new ApiRequestError(
        `GitHub API error: ${response.status} ${response.statusText}`.trim(),
        response.status,
        url
      );
    }

    if (!text) {
      return null;
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ApiRequestError(
        `Invalid JSON from ${url}: ${toError(error).message}`,
        response.status,
        url
      );
    }
  }

  /** Seconds from now until `resetEpochSeconds`, plus the safety margin */
  private secondsUntil(resetEpochSeconds: number): number {
    return Math.max(resetEpochSeconds - this.now() / 1000, 0) + this.rateLimit.marginSeconds;
  }

  private resolve(endpoint: string): string {
    const trimmed = endpoint.replace(/^\/+/, "");
    return trimmed ? `${this.baseUrl}/${trimmed}` : this.baseUrl;
  }

  private headers(withBody = false): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github.v3+json",
      "User-Agent": USER_AGENT,
    };
    if (withBody) {
      headers["Content-Type"] = "application/json";
    }
    if (this.token) {
      headers["Authorization"] = `Bearer ${this.token}`;
    }
    return headers;
  }
}
