import type { PrioritizedIssue } from "../../types/issue.js";

export type RecommendationTier = "expertise-and-contributor" | "contributor" | "all";

export interface Recommendation {
  tier: RecommendationTier;
  issues: PrioritizedIssue[];
}

/** Score above which an issue is called out as high priority */
export const HIGH_PRIORITY_THRESHOLD = 30;

/**
 * Narrow a prioritized list to the issues worth suggesting, falling back
 * tier by tier so the result is empty only when the input is:
 *
 * 1. contributor-friendly and matching the user's expertise
 * 2. contributor-friendly
 * 3. everything
 *
 * Order within the chosen tier is the prioritized order.
 */
export function recommend(prioritized: PrioritizedIssue[], limit: number): Recommendation {
  const count = Math.max(0, limit);

  const both = prioritized.filter((issue) => issue.contributorFriendly && issue.expertiseMatch);
  if (both.length > 0) {
    return { tier: "expertise-and-contributor", issues: both.slice(0, count) };
  }

  const friendly = prioritized.filter((issue) => issue.contributorFriendly);
  if (friendly.length > 0) {
    return { tier: "contributor", issues: friendly.slice(0, count) };
  }

  return { tier: "all", issues: prioritized.slice(0, count) };
}

export function recommendationReasons(issue: PrioritizedIssue): string[] {
  const reasons: string[] = [];
  if (issue.contributorFriendly) {
    reasons.push("Marked as good for contributors");
  }
  if (issue.expertiseMatch) {
    reasons.push("Matches your expertise");
  }
  if (issue.complexityEstimate === "Low") {
    reasons.push("Relatively low complexity");
  }
  if (issue.priorityScore > HIGH_PRIORITY_THRESHOLD) {
    reasons.push("High priority for the project");
  }
  return reasons;
}
