export {
  IssueAnalyzer,
  analyzeIssue,
  extractFileMentions,
  classifyComplexity,
  suggestApproach,
  KNOWN_FILE_EXTENSIONS,
} from "./issue-analyzer.js";
