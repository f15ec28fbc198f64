export {
  PriorityEngine,
  buildScoringWeights,
  parseUtcTimestamp,
  countFenceMarkers,
  countCodeBlocks,
  complexityFromPenalty,
  BASIC_WEIGHTS,
  EXPERTISE_WEIGHTS,
  BASIC_LABEL_TIERS,
  CONTRIBUTOR_LABEL_PATTERNS,
  type LabelTier,
  type ScoringWeights,
  type PriorityEngineOptions,
  type PriorityBreakdown,
} from "./priority-engine.js";
export {
  recommend,
  recommendationReasons,
  HIGH_PRIORITY_THRESHOLD,
  type Recommendation,
  type RecommendationTier,
} from "./recommendation.js";
