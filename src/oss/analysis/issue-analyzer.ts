import { logger } from "../../infra/logger.js";
import type { IssueFetcher } from "../../core/github/issue-fetcher.js";
import type {
  ComplexityLevel,
  Issue,
  IssueAnalysisResult,
  IssueComment,
} from "../../types/issue.js";
import { countFenceMarkers } from "../selection/priority-engine.js";

export const KNOWN_FILE_EXTENSIONS = [".py", ".js", ".ts", ".html", ".css", ".md"] as const;

const SURROUNDING_PUNCTUATION = /^[.,()[\]{}:;"']+|[.,()[\]{}:;"']+$/g;

/**
 * Tokens that look like file paths: containing both "." and "/", or ending in a
 * known extension. Trimmed of surrounding punctuation, de-duplicated in
 * first-seen order.
 */
export function extractFileMentions(text: string): string[] {
  const files = new Set<string>();

  for (const token of text.split(/\s+/)) {
    const looksLikePath =
      (token.includes(".") && token.includes("/")) ||
      KNOWN_FILE_EXTENSIONS.some((ext) => token.endsWith(ext));
    if (!looksLikePath) continue;

    const trimmed = token.replace(SURROUNDING_PUNCTUATION, "");
    if (trimmed) {
      files.add(trimmed);
    }
  }

  return [...files];
}

/**
 * High above 500 body characters or 4 fence markers, Medium above 200 or 2.
 */
export function classifyComplexity(bodyLength: number, fenceMarkers: number): ComplexityLevel {
  if (bodyLength > 500 || fenceMarkers > 4) return "High";
  if (bodyLength > 200 || fenceMarkers > 2) return "Medium";
  return "Low";
}

export function suggestApproach(title: string, complexity: ComplexityLevel): string {
  const lower = title.toLowerCase();
  const level = complexity.toLowerCase();

  if (lower.includes("bug") || lower.includes("fix")) {
    return `This appears to be a bug fix with ${level} complexity. Recommend debugging and creating a test case first.`;
  }
  if (lower.includes("feature") || lower.includes("add")) {
    return `This is a feature request with ${level} complexity. Recommend starting with requirements clarification and design.`;
  }
  if (lower.includes("documentation") || lower.includes("docs")) {
    return "This is a documentation task. Update relevant docs and ensure examples are working.";
  }
  return `General task with ${level} complexity. Analyze requirements and break down into smaller steps.`;
}

/**
 * IssueAnalyzer - Inspect a single issue and its discussion
 */
export class IssueAnalyzer {
  constructor(private readonly fetcher: IssueFetcher) {}

  async analyze(issueNumber: number): Promise<IssueAnalysisResult> {
    const issue = await this.fetcher.getIssue(issueNumber);
    if (!issue) {
      return { found: false, issueNumber, error: `Issue #${issueNumber} not found` };
    }

    const comments = await this.fetcher.getComments(issueNumber);
    logger.debug(`Analyzing #${issueNumber} with ${comments.length} comments`);

    return analyzeIssue(issue, comments);
  }
}

export function analyzeIssue(issue: Issue, comments: IssueComment[]): IssueAnalysisResult {
  const body = issue.body ?? "";
  const corpus = `${body} ${comments.map((comment) => comment.body).join(" ")}`;
  const complexity = classifyComplexity(body.length, countFenceMarkers(corpus));

  return {
    found: true,
    issue,
    commentsCount: comments.length,
    complexity,
    potentialFiles: extractFileMentions(corpus),
    suggestedApproach: suggestApproach(issue.title, complexity),
  };
}
