export type IssueListState = "open" | "closed" | "all";
export type IssueSortField = "created" | "updated" | "comments";
export type SortDirection = "asc" | "desc";

export type ComplexityLevel = "Low" | "Medium" | "High";

export interface Issue {
  number: number;
  title: string;
  body: string | null;
  state: string;
  /** Creation timestamp exactly as returned by the API (YYYY-MM-DDTHH:MM:SSZ) */
  createdAt: string;
  /** Comment count */
  comments: number;
  labels: string[];
  assignees: string[];
  author: string;
  htmlUrl: string;
  /** The issues endpoint also lists pull requests */
  isPullRequest: boolean;
}

export interface IssueComment {
  id: number;
  author: string;
  body: string;
  createdAt: string;
}

/** An issue annotated by the prioritization engine */
export interface PrioritizedIssue extends Issue {
  priorityScore: number;
  expertiseMatch: boolean;
  contributorFriendly: boolean;
  complexityEstimate: ComplexityLevel;
}

export interface IssueQuery {
  state?: IssueListState | undefined;
  sort?: IssueSortField | undefined;
  direction?: SortDirection | undefined;
  limit?: number | undefined;
}

export interface IssueAnalysis {
  found: true;
  issue: Issue;
  commentsCount: number;
  complexity: ComplexityLevel;
  potentialFiles: string[];
  suggestedApproach: string;
}

export interface IssueNotFound {
  found: false;
  issueNumber: number;
  error: string;
}

export type IssueAnalysisResult = IssueAnalysis | IssueNotFound;

export interface RateLimitStatus {
  remaining: number;
  limit: number;
  reset: Date;
}

export function isPrioritized(issue: Issue): issue is PrioritizedIssue {
  return "priorityScore" in issue;
}
