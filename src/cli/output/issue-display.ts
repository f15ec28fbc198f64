import pc from "picocolors";
import {
  isPrioritized,
  type Issue,
  type IssueAnalysis,
  type PrioritizedIssue,
  type RateLimitStatus,
} from "../../types/issue.js";
import { recommendationReasons } from "../../oss/selection/recommendation.js";

export type Colors = ReturnType<typeof pc.createColors>;

const RULE = "=".repeat(80);
const THIN_RULE = "-".repeat(40);
const BODY_PREVIEW_LENGTH = 300;

function bodyPreview(body: string | null): string {
  if (!body) {
    return "No description provided";
  }
  // Count code points so a surrogate pair is never split
  const chars = Array.from(body);
  return chars.length > BODY_PREVIEW_LENGTH
    ? `${chars.slice(0, BODY_PREVIEW_LENGTH).join("")}...`
    : body;
}

/**
 * Multi-line summary block for one issue. Optional lines (assignees, labels,
 * score) only appear when there is something to show.
 */
export function formatIssueSummary(issue: Issue, colors: Colors = pc): string[] {
  const lines = ["", RULE, colors.bold(`Issue #${issue.number}: ${issue.title}`), RULE];

  lines.push(`Status: ${issue.state}`);
  lines.push(`Created: ${issue.createdAt}`);
  lines.push(`Author: ${issue.author}`);

  if (issue.assignees.length > 0) {
    lines.push(`Assigned to: ${issue.assignees.join(", ")}`);
  }
  if (issue.labels.length > 0) {
    lines.push(`Labels: ${colors.yellow(issue.labels.join(", "))}`);
  }
  if (isPrioritized(issue)) {
    lines.push(`Priority Score: ${colors.cyan(issue.priorityScore.toFixed(2))}`);
  }

  lines.push("", "Description:", THIN_RULE, bodyPreview(issue.body));
  lines.push("", `URL: ${colors.dim(issue.htmlUrl)}`, RULE, "");
  return lines;
}

export function formatIssueList(heading: string, issues: Issue[], colors: Colors = pc): string[] {
  return ["", colors.bold(heading), ...issues.flatMap((issue) => formatIssueSummary(issue, colors))];
}

export function formatRecommendation(
  issue: PrioritizedIssue,
  rank: number,
  colors: Colors = pc
): string[] {
  const lines = ["", colors.bold(colors.green(`RECOMMENDATION #${rank}:`))];
  lines.push(...formatIssueSummary(issue, colors));
  lines.push("Why this issue:");
  for (const reason of recommendationReasons(issue)) {
    lines.push(`  ${colors.green("✓")} ${reason}`);
  }
  return lines;
}

export function formatRecommendations(
  repository: string,
  issues: PrioritizedIssue[],
  colors: Colors = pc
): string[] {
  const lines = [
    "",
    colors.bold(`Recommended issues to work on in ${repository}:`),
    RULE,
    `Based on your expertise and issue characteristics, here are the top ${issues.length} issues you could contribute to:`,
    RULE,
  ];
  issues.forEach((issue, index) => {
    lines.push(...formatRecommendation(issue, index + 1, colors));
  });
  return lines;
}

export function formatAnalysis(analysis: IssueAnalysis, colors: Colors = pc): string[] {
  const lines = formatIssueSummary(analysis.issue, colors);

  lines.push(colors.bold("Detailed Analysis:"), RULE);
  lines.push(`Complexity: ${analysis.complexity}`);
  lines.push(`Comments: ${analysis.commentsCount}`);

  if (analysis.potentialFiles.length > 0) {
    lines.push("", "Potentially related files:");
    for (const file of analysis.potentialFiles) {
      lines.push(`- ${file}`);
    }
  }

  lines.push("", "Suggested approach:", analysis.suggestedApproach, RULE, "");
  return lines;
}

export function formatRateLimit(status: RateLimitStatus, colors: Colors = pc): string[] {
  const low = status.limit > 0 && status.remaining < status.limit * 0.1;
  const remaining = low ? colors.yellow(String(status.remaining)) : colors.green(String(status.remaining));
  return [
    colors.bold("GitHub API rate limit"),
    colors.dim(THIN_RULE),
    `  Remaining: ${remaining} / ${status.limit}`,
    `  Resets at: ${status.reset.toISOString()}`,
  ];
}
