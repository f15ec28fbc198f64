// issue-compass - Main entry point
// This file exports the public API for programmatic usage

export * from "./types/index.js";
export * from "./infra/index.js";
export * from "./core/github/index.js";
export * from "./oss/selection/index.js";
export * from "./oss/analysis/index.js";
export {
  formatIssueSummary,
  formatIssueList,
  formatRecommendation,
  formatRecommendations,
  formatAnalysis,
  formatRateLimit,
  type Colors,
} from "./cli/output/issue-display.js";
