/**
 * Shared fixtures and an in-process stand-in for the GitHub REST API
 */

import type { FetchFn } from "../src/core/github/api-client.js";
import type { Issue, PrioritizedIssue } from "../src/types/issue.js";

export const TEST_REPO = "octo/widgets";
export const API_ROOT = "https://api.github.com";

/** 2023-11-14T22:13:20Z */
export const FIXED_NOW = 1_700_000_000_000;
export const FIXED_NOW_SECONDS = FIXED_NOW / 1000;

export function createMockIssue(overrides: Partial<Issue> = {}): Issue {
  return {
    number: 1,
    title: "Test issue",
    body: "Test body",
    state: "open",
    createdAt: "2023-11-04T22:13:20Z",
    comments: 0,
    labels: [],
    assignees: [],
    author: "testuser",
    htmlUrl: `https://github.com/${TEST_REPO}/issues/1`,
    isPullRequest: false,
    ...overrides,
  };
}

export function createMockPrioritized(overrides: Partial<PrioritizedIssue> = {}): PrioritizedIssue {
  return {
    ...createMockIssue(),
    priorityScore: 10,
    expertiseMatch: false,
    contributorFriendly: false,
    complexityEstimate: "Low",
    ...overrides,
  };
}

/** Issue payload shaped like the REST API's */
export function rawIssue(number: number, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    number,
    title: `Issue ${number}`,
    body: `Body of issue ${number}`,
    state: "open",
    created_at: "2023-11-01T00:00:00Z",
    comments: 0,
    labels: [],
    assignees: [],
    user: { login: "reporter" },
    html_url: `https://github.com/${TEST_REPO}/issues/${number}`,
    ...overrides,
  };
}

export interface RecordedRequest {
  method: string;
  /** Path relative to the API root, without the query string */
  path: string;
  query: URLSearchParams;
  headers: Headers;
  body: string | undefined;
}

export interface FakeResponse {
  status?: number;
  /** Serialized as JSON */
  json?: unknown;
  /** Raw body, used instead of `json` */
  text?: string;
  headers?: Record<string, string>;
}

type Responder = FakeResponse | ((request: RecordedRequest) => FakeResponse);

interface Route {
  method: string;
  path: string;
  respond: Responder;
}

const STATUS_TEXT: Record<number, string> = {
  200: "OK",
  201: "Created",
  403: "Forbidden",
  404: "Not Found",
  500: "Internal Server Error",
};

/**
 * Routes requests by method and path. `/rate_limit` answers from
 * `rateLimit` unless a route overrides it; anything unrouted is a 404.
 */
export class FakeGitHub {
  readonly requests: RecordedRequest[] = [];
  rateLimit = { remaining: 5000, limit: 5000, reset: FIXED_NOW_SECONDS + 3600 };

  private readonly routes: Route[] = [];

  on(method: string, path: string, respond: Responder): this {
    this.routes.push({ method, path, respond });
    return this;
  }

  /** Requests other than the rate-limit polls */
  apiRequests(): RecordedRequest[] {
    return this.requests.filter((request) => request.path !== "/rate_limit");
  }

  readonly fetch: FetchFn = async (input, init) => {
    const href = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const url = new URL(href);
    const request: RecordedRequest = {
      method: init?.method ?? "GET",
      path: url.href.startsWith(API_ROOT) ? url.pathname : url.href,
      query: url.searchParams,
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : undefined,
    };
    this.requests.push(request);

    const route = this.routes.find((r) => r.method === request.method && r.path === request.path);
    if (route) {
      const reply = typeof route.respond === "function" ? route.respond(request) : route.respond;
      return toResponse(reply);
    }
    if (request.path === "/rate_limit") {
      return toResponse({ json: { resources: { core: this.rateLimit } } });
    }
    return toResponse({ status: 404, json: { message: "Not Found" } });
  };
}

function toResponse(reply: FakeResponse): Response {
  const status = reply.status ?? 200;
  const body = reply.text ?? (reply.json === undefined ? null : JSON.stringify(reply.json));
  return new Response(body, {
    status,
    statusText: STATUS_TEXT[status] ?? "",
    headers: reply.headers,
  });
}
