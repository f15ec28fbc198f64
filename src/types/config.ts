import { z } from "zod";

export const IssuePrioritiesSchema = z.object({
  // Label substrings worth the high-tier bonus (case-insensitive)
  high: z.array(z.string()).default([]),
  medium: z.array(z.string()).default([]),
});

export const GitHubConfigSchema = z.object({
  // Repository in owner/repo form; --repo takes precedence
  repository: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/, "must be in owner/repo form")
    .optional(),
  token: z.string().optional(),
  // Environment variable consulted when no token is configured
  tokenEnvVar: z.string().default("GITHUB_TOKEN"),
  // REST root; point at https://<host>/api/v3 for GitHub Enterprise
  apiUrl: z.string().url().default("https://api.github.com"),
  issuePriorities: IssuePrioritiesSchema.default({}),
});

export const AgentConfigSchema = z.object({
  // Keywords matched against issue title and body
  userExpertise: z.array(z.string()).default([]),
});

export const ContributionConfigSchema = z.object({
  // Label substrings for the kinds of issues the user prefers (e.g. "bug", "docs")
  issueTypes: z.array(z.string()).default([]),
});

export const ScoringProfileSchema = z.enum(["basic", "expertise"]);

export const ScoringWeightOverridesSchema = z.object({
  age: z.number().optional(),
  comments: z.number().optional(),
  // Only the expertise profile uses the configured priority tiers
  highPriority: z.number().optional(),
  mediumPriority: z.number().optional(),
  expertise: z.number().optional(),
  preference: z.number().optional(),
  bodyLength: z.number().nonnegative().optional(),
  codeBlock: z.number().nonnegative().optional(),
});

export const ScoringConfigSchema = z.object({
  profile: ScoringProfileSchema.default("expertise"),
  weights: ScoringWeightOverridesSchema.default({}),
});

export const RateLimitConfigSchema = z.object({
  // Wait for the reset once the remaining quota drops to this value
  minRemaining: z.number().int().nonnegative().default(5),
  // Extra seconds added to every reset wait
  marginSeconds: z.number().nonnegative().default(1),
  // Retries after a "rate limit exceeded" response
  maxRetries: z.number().int().nonnegative().default(1),
});

export const ConfigSchema = z.object({
  github: GitHubConfigSchema.default({}),
  agent: AgentConfigSchema.default({}),
  contribution: ContributionConfigSchema.default({}),
  scoring: ScoringConfigSchema.default({}),
  rateLimit: RateLimitConfigSchema.default({}),
  verbose: z.boolean().default(false),
});

export type IssuePriorities = z.infer<typeof IssuePrioritiesSchema>;
export type GitHubConfig = z.infer<typeof GitHubConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type ContributionConfig = z.infer<typeof ContributionConfigSchema>;
export type ScoringProfile = z.infer<typeof ScoringProfileSchema>;
export type ScoringWeightOverrides = z.infer<typeof ScoringWeightOverridesSchema>;
export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;
export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
/** What the config file may contain before defaults are applied */
export type ConfigInput = z.input<typeof ConfigSchema>;
