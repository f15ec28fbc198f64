import { logger } from "../../infra/logger.js";
import type { Issue, IssueComment, IssueQuery } from "../../types/issue.js";
import type { GitHubApiClient } from "./api-client.js";
import { RawCommentSchema, RawIssueSchema, toComment, toIssue } from "./schemas.js";

/** GitHub caps per_page at 100 */
export const MAX_PAGE_SIZE = 100;

/** How many issues to pull before filtering or ranking locally */
export const DEFAULT_FETCH_LIMIT = 100;

/**
 * IssueFetcher - Read and write issues through the repository client.
 *
 * Request failures surface as "no data": an empty list, `null`, or a short
 * result, never an exception.
 */
export class IssueFetcher {
  constructor(private readonly client: GitHubApiClient) {}

  /**
   * Page through the issue list until `limit` issues are collected or the
   * server returns a short (or empty) page.
   */
  async getIssues(query: IssueQuery = {}): Promise<Issue[]> {
    const state = query.state ?? "open";
    const sort = query.sort ?? "created";
    const direction = query.direction ?? "desc";
    const limit = query.limit ?? DEFAULT_FETCH_LIMIT;

    if (limit <= 0) {
      return [];
    }

    const perPage = Math.min(MAX_PAGE_SIZE, limit);
    const issues: Issue[] = [];
    let page = 1;

    while (issues.length < limit) {
      const params = new URLSearchParams({
        state,
        sort,
        direction,
        per_page: String(perPage),
        page: String(page),
      });
      const result = await this.client.request(`issues?${params.toString()}`);

      if (!result.ok || !Array.isArray(result.data) || result.data.length === 0) {
        break;
      }

      const batch: unknown[] = result.data;
      issues.push(...this.parseIssues(batch));
      logger.debug(`Fetched page ${page} (${batch.length} items)`, { total: issues.length });

      if (batch.length < perPage) {
        break;
      }

      page++;
    }

    return issues.slice(0, limit);
  }

  /**
   * Open issues (from the first {@link DEFAULT_FETCH_LIMIT}) assigned to `username`.
   */
  async getAssignedIssues(username: string): Promise<Issue[]> {
    const issues = await this.getIssues({ limit: DEFAULT_FETCH_LIMIT });
    return issues.filter((issue) => issue.assignees.includes(username));
  }

  async getIssue(issueNumber: number): Promise<Issue | null> {
    const result = await this.client.request(`issues/${issueNumber}`);
    if (!result.ok || result.data === null) {
      return null;
    }

    const parsed = RawIssueSchema.safeParse(result.data);
    if (!parsed.success) {
      logger.warn(`Issue #${issueNumber} has an unexpected shape: ${parsed.error.message}`);
      return null;
    }
    return toIssue(parsed.data);
  }

  async getComments(issueNumber: number): Promise<IssueComment[]> {
    const result = await this.client.request(`issues/${issueNumber}/comments`);
    if (!result.ok || !Array.isArray(result.data)) {
      return [];
    }

    const items: unknown[] = result.data;
    const comments: IssueComment[] = [];
    for (const item of items) {
      const parsed = RawCommentSchema.safeParse(item);
      if (parsed.success) {
        comments.push(toComment(parsed.data));
      } else {
        logger.debug(`Skipping malformed comment on #${issueNumber}`);
      }
    }
    return comments;
  }

  async createComment(issueNumber: number, body: string): Promise<IssueComment | null> {
    const result = await this.client.request(`issues/${issueNumber}/comments`, {
      method: "POST",
      body: { body },
    });
    if (!result.ok) {
      return null;
    }

    const parsed = RawCommentSchema.safeParse(result.data);
    return parsed.success ? toComment(parsed.data) : null;
  }

  private parseIssues(items: unknown[]): Issue[] {
    const issues: Issue[] = [];
    for (const item of items) {
      const parsed = RawIssueSchema.safeParse(item);
      if (parsed.success) {
        issues.push(toIssue(parsed.data));
      } else {
        logger.warn(`Skipping malformed issue payload: ${parsed.error.message}`);
      }
    }
    return issues;
  }
}
