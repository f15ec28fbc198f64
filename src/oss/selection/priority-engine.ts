import { InvalidTimestampError } from "../../infra/errors.js";
import type { Config, ScoringProfile, ScoringWeightOverrides } from "../../types/config.js";
import type { ComplexityLevel, Issue, PrioritizedIssue } from "../../types/issue.js";

/**
 * A group of label substrings sharing one bonus.
 */
export interface LabelTier {
  patterns: string[];
  bonus: number;
}

/**
 * Weights of the priority formula:
 *
 *   score = age * ageDays
 *         + comments * commentCount
 *         + Σ labelTiers        (per label, each tier at most once)
 *         + Σ contributorLabels (per issue, each tier at most once)
 *         + expertise * matchedKeywords
 *         + preference * matchedIssueTypes
 *         - (bodyLength * bodyChars + codeBlock * codeBlockPairs)
 */
export interface ScoringWeights {
  age: number;
  comments: number;
  labelTiers: LabelTier[];
  contributorLabels: LabelTier[];
  expertise: number;
  preference: number;
  bodyLength: number;
  codeBlock: number;
}

export interface PriorityEngineOptions {
  weights?: ScoringWeights | undefined;
  userExpertise?: string[] | undefined;
  preferredIssueTypes?: string[] | undefined;
  /** Current time in epoch milliseconds */
  now?: (() => number) | undefined;
}

/** Score breakdown for a single issue */
export interface PriorityBreakdown {
  ageDays: number;
  age: number;
  engagement: number;
  labels: number;
  contributor: number;
  expertise: number;
  preference: number;
  complexityPenalty: number;
  total: number;
  expertiseMatch: boolean;
  contributorFriendly: boolean;
}

const MS_PER_DAY = 1000 * 60 * 60 * 24;

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

const CODE_FENCE = "```";

export const CONTRIBUTOR_LABEL_PATTERNS = ["good first issue", "help wanted", "beginner"] as const;

/** Fixed label tiers of the basic profile */
export const BASIC_LABEL_TIERS: LabelTier[] = [
  { patterns: ["bug"], bonus: 10 },
  { patterns: ["priority"], bonus: 5 },
  { patterns: ["high-priority"], bonus: 15 },
];

export const BASIC_WEIGHTS: ScoringWeights = {
  age: 0.5,
  comments: 2,
  labelTiers: BASIC_LABEL_TIERS,
  // Still used to flag contributor-friendly issues; they add nothing to the score
  contributorLabels: CONTRIBUTOR_LABEL_PATTERNS.map((pattern) => ({ patterns: [pattern], bonus: 0 })),
  expertise: 0,
  preference: 0,
  bodyLength: 0.01,
  codeBlock: 2,
};

export const EXPERTISE_WEIGHTS: ScoringWeights = {
  age: 0.3,
  comments: 1.5,
  labelTiers: [],
  contributorLabels: [
    { patterns: ["good first issue"], bonus: 15 },
    { patterns: ["help wanted"], bonus: 10 },
    { patterns: ["beginner"], bonus: 8 },
  ],
  expertise: 5,
  preference: 8,
  bodyLength: 0.01,
  codeBlock: 2,
};

const HIGH_PRIORITY_BONUS = 10;
const MEDIUM_PRIORITY_BONUS = 5;

/**
 * Build the weights for a profile, folding in the configured priority tiers
 * (expertise profile only) and any per-weight overrides.
 */
export function buildScoringWeights(
  profile: ScoringProfile,
  priorities: { high: string[]; medium: string[] } = { high: [], medium: [] },
  overrides: ScoringWeightOverrides = {}
): ScoringWeights {
  const base = profile === "basic" ? BASIC_WEIGHTS : EXPERTISE_WEIGHTS;

  const labelTiers =
    profile === "basic"
      ? base.labelTiers
      : [
          { patterns: priorities.high, bonus: overrides.highPriority ?? HIGH_PRIORITY_BONUS },
          { patterns: priorities.medium, bonus: overrides.mediumPriority ?? MEDIUM_PRIORITY_BONUS },
        ].filter((tier) => tier.patterns.length > 0);

  return {
    age: overrides.age ?? base.age,
    comments: overrides.comments ?? base.comments,
    labelTiers,
    contributorLabels: base.contributorLabels,
    expertise: overrides.expertise ?? base.expertise,
    preference: overrides.preference ?? base.preference,
    bodyLength: overrides.bodyLength ?? base.bodyLength,
    codeBlock: overrides.codeBlock ?? base.codeBlock,
  };
}

/**
 * Parse a `YYYY-MM-DDTHH:MM:SSZ` timestamp as UTC.
 *
 * @throws InvalidTimestampError for any other format or an impossible date
 */
export function parseUtcTimestamp(value: string, issueNumber?: number): Date {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    throw new InvalidTimestampError(value, issueNumber);
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    throw new InvalidTimestampError(value, issueNumber);
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls over out-of-range parts (e.g. month 13); reject those
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    throw new InvalidTimestampError(value, issueNumber);
  }
  return date;
}

/** Number of triple-backtick fences in `text` */
export function countFenceMarkers(text: string): number {
  if (!text) return 0;
  return text.split(CODE_FENCE).length - 1;
}

/** Fence pairs; an unmatched trailing fence is not counted */
export function countCodeBlocks(text: string): number {
  return Math.floor(countFenceMarkers(text) / 2);
}

export function complexityFromPenalty(penalty: number): ComplexityLevel {
  if (penalty > 15) return "High";
  if (penalty > 5) return "Medium";
  return "Low";
}

function matchesAny(label: string, patterns: string[]): boolean {
  return patterns.some((pattern) => pattern !== "" && label.includes(pattern.toLowerCase()));
}

/**
 * PriorityEngine - Rank issues by a weighted linear score
 */
export class PriorityEngine {
  private readonly weights: ScoringWeights;
  private readonly userExpertise: string[];
  private readonly preferredIssueTypes: string[];
  private readonly now: () => number;

  constructor(options: PriorityEngineOptions = {}) {
    this.weights = options.weights ?? EXPERTISE_WEIGHTS;
    this.userExpertise = options.userExpertise ?? [];
    this.preferredIssueTypes = options.preferredIssueTypes ?? [];
    this.now = options.now ?? Date.now;
  }

  static fromConfig(config: Config, now?: () => number): PriorityEngine {
    return new PriorityEngine({
      weights: buildScoringWeights(
        config.scoring.profile,
        config.github.issuePriorities,
        config.scoring.weights
      ),
      userExpertise: config.agent.userExpertise,
      preferredIssueTypes: config.contribution.issueTypes,
      now,
    });
  }

  /**
   * Score every issue and return annotated copies, highest score first.
   * Ties keep their input order.
   *
   * @throws InvalidTimestampError if any issue has an unparsable `createdAt`
   */
  prioritize(issues: Issue[]): PrioritizedIssue[] {
    const scored = issues.map((issue) => {
      const breakdown = this.score(issue);
      const prioritized: PrioritizedIssue = {
        ...issue,
        priorityScore: breakdown.total,
        expertiseMatch: breakdown.expertiseMatch,
        contributorFriendly: breakdown.contributorFriendly,
        complexityEstimate: complexityFromPenalty(breakdown.complexityPenalty),
      };
      return prioritized;
    });

    // Array.prototype.sort is stable
    return scored.sort((a, b) => b.priorityScore - a.priorityScore);
  }

  score(issue: Issue): PriorityBreakdown {
    const w = this.weights;
    const created = parseUtcTimestamp(issue.createdAt, issue.number);
    const ageDays = Math.floor((this.now() - created.getTime()) / MS_PER_DAY);

    const labels = issue.labels.map((label) => label.toLowerCase());

    let labelScore = 0;
    for (const label of labels) {
      for (const tier of w.labelTiers) {
        if (matchesAny(label, tier.patterns)) {
          labelScore += tier.bonus;
        }
      }
    }

    let contributorScore = 0;
    let contributorFriendly = false;
    for (const tier of w.contributorLabels) {
      if (labels.some((label) => matchesAny(label, tier.patterns))) {
        contributorScore += tier.bonus;
        contributorFriendly = true;
      }
    }

    const text = `${issue.title} ${issue.body ?? ""}`.toLowerCase();
    const matchedExpertise = this.userExpertise.filter(
      (keyword) => keyword !== "" && text.includes(keyword.toLowerCase())
    ).length;

    const matchedPreferences = this.preferredIssueTypes.filter((type) =>
      labels.some((label) => matchesAny(label, [type]))
    ).length;

    const body = issue.body ?? "";
    const complexityPenalty = body.length * w.bodyLength + countCodeBlocks(body) * w.codeBlock;

    const age = ageDays * w.age;
    const engagement = issue.comments * w.comments;
    const expertise = matchedExpertise * w.expertise;
    const preference = matchedPreferences * w.preference;

    return {
      ageDays,
      age,
      engagement,
      labels: labelScore,
      contributor: contributorScore,
      expertise,
      preference,
      complexityPenalty,
      total:
        age + engagement + labelScore + contributorScore + expertise + preference - complexityPenalty,
      expertiseMatch: matchedExpertise > 0,
      contributorFriendly,
    };
  }
}
