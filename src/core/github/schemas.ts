import { z } from "zod";
import type { Issue, IssueComment, RateLimitStatus } from "../../types/issue.js";

const UserSchema = z.object({ login: z.string() });

const LabelSchema = z.union([z.string(), z.object({ name: z.string() })]);

export const RawIssueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullish(),
  state: z.string(),
  created_at: z.string(),
  comments: z.number().int().nonnegative().default(0),
  labels: z.array(LabelSchema).default([]),
  assignees: z.array(UserSchema).nullish(),
  user: UserSchema.nullish(),
  html_url: z.string(),
  pull_request: z.unknown().optional(),
});

export const RawCommentSchema = z.object({
  id: z.number().int(),
  body: z.string().nullish(),
  user: UserSchema.nullish(),
  created_at: z.string(),
});

export const RateLimitResponseSchema = z.object({
  resources: z
    .object({
      core: z
        .object({
          remaining: z.number().default(1),
          limit: z.number().default(0),
          reset: z.number().default(0),
        })
        .default({}),
    })
    .default({}),
});

export type RawIssue = z.infer<typeof RawIssueSchema>;
export type RawComment = z.infer<typeof RawCommentSchema>;

export function toIssue(raw: RawIssue): Issue {
  return {
    number: raw.number,
    title: raw.title,
    body: raw.body ?? null,
    state: raw.state,
    createdAt: raw.created_at,
    comments: raw.comments,
    labels: raw.labels.map((label) => (typeof label === "string" ? label : label.name)),
    assignees: (raw.assignees ?? []).map((assignee) => assignee.login),
    author: raw.user?.login ?? "unknown",
    htmlUrl: raw.html_url,
    isPullRequest: raw.pull_request !== undefined && raw.pull_request !== null,
  };
}

export function toComment(raw: RawComment): IssueComment {
  return {
    id: raw.id,
    author: raw.user?.login ?? "unknown",
    body: raw.body ?? "",
    createdAt: raw.created_at,
  };
}

export function toRateLimitStatus(payload: z.infer<typeof RateLimitResponseSchema>): RateLimitStatus {
  const core = payload.resources.core;
  return {
    remaining: core.remaining,
    limit: core.limit,
    reset: new Date(core.reset * 1000),
  };
}
