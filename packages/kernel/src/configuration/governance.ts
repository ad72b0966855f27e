/**
 * Helmsman Kernel — Governance Configuration
 *
 * Startup thresholds and the default path table, validated with zod.
 * Invalid configuration is a ConfigurationError: the governor never starts
 * on thresholds it cannot trust.
 *
 * Defaults:
 *   autonomy_level           supervised
 *   confidence_threshold     0.80 (per-tier overrides; read-only bypasses)
 *   max_actions_per_hour     20
 *   max_blast_radius         3 distinct targets (scope: service)
 *   cascading_threshold      3 FAILED/ROLLED_BACK outcomes per rolling hour
 *   record_retention_minutes 1440 (never below the 60-minute cascade window)
 *
 * @see docs/governance.md §8 (configuration)
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { RiskTier } from '../types/action.js';
import type { PathConfig } from '../types/execution.js';
import { pathTableIssues } from '../dispatch/path-order.js';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const unitInterval = z.number().min(0).max(1);

export const PathConfigSchema = z.object({
  name: z.string().min(1),
  enabled: z.boolean().default(true),
  timeout_ms: z.number().int().positive(),
  priority: z.number().int().nonnegative(),
  reliability_estimate: unitInterval.default(0.5),
  terminal: z.boolean().default(false),
});

export const BLAST_RADIUS_SCOPES = ['service', 'environment', 'region'] as const;
export type BlastRadiusScope = (typeof BLAST_RADIUS_SCOPES)[number];

/**
 * How far the confidence check trusts the proposer:
 *   manual           every action escalates, read-only included
 *   supervised       per-tier thresholds
 *   autonomous       per-tier thresholds, none above AUTONOMOUS_MAX_THRESHOLD
 *   full_autonomous  the confidence check is skipped
 * Halt, rate limit and blast radius apply at every level.
 */
export const AUTONOMY_LEVELS = ['manual', 'supervised', 'autonomous', 'full_autonomous'] as const;
export type AutonomyLevel = (typeof AUTONOMY_LEVELS)[number];

export const AUTONOMOUS_MAX_THRESHOLD = 0.5;

/** Default execution paths, in dispatch order. */
export const DEFAULT_PATHS: ReadonlyArray<PathConfig> = [
  { name: 'local', enabled: true, timeout_ms: 5_000, priority: 0, reliability_estimate: 0.95, terminal: false },
  { name: 'remote-service', enabled: true, timeout_ms: 30_000, priority: 1, reliability_estimate: 0.9, terminal: false },
  { name: 'webhook', enabled: true, timeout_ms: 15_000, priority: 2, reliability_estimate: 0.85, terminal: false },
  { name: 'workflow-dispatch', enabled: true, timeout_ms: 60_000, priority: 3, reliability_estimate: 0.8, terminal: false },
  { name: 'manual', enabled: true, timeout_ms: 10_000, priority: 4, reliability_estimate: 1, terminal: true },
];

export const GovernanceConfigSchema = z
  .object({
    autonomy_level: z.enum(AUTONOMY_LEVELS).default('supervised'),
    confidence_threshold: unitInterval.default(0.8),
    confidence_thresholds: z
      .object({
        low: unitInterval.optional(),
        medium: unitInterval.optional(),
        high: unitInterval.optional(),
        critical: unitInterval.optional(),
      })
      .strict()
      .default({}),
    max_actions_per_hour: z.number().int().positive().default(20),
    max_blast_radius: z.number().int().positive().default(3),
    blast_radius_scope: z.enum(BLAST_RADIUS_SCOPES).default('service'),
    cascading_threshold: z.number().int().positive().default(3),
    record_retention_minutes: z.number().int().min(60).default(1440),
    loop_interval_seconds: z.number().positive().default(60),
    paths: z.array(PathConfigSchema).default(() => DEFAULT_PATHS.map((p) => ({ ...p }))),
  })
  .strict()
  .superRefine((config, ctx) => {
    for (const issue of pathTableIssues(config.paths)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue });
    }
  });

export type GovernanceConfigInput = z.input<typeof GovernanceConfigSchema>;
export type GovernanceConfig = z.output<typeof GovernanceConfigSchema>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Validate raw configuration (parsed JSON, CLI overrides) and fill defaults.
 *
 * @throws ConfigurationError listing every issue, one `path: message` per line
 */
export function parseGovernanceConfig(raw: unknown): GovernanceConfig {
  const result = GovernanceConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(formatZodIssues(result.error));
  }
  return result.data;
}

export function defaultGovernanceConfig(): GovernanceConfig {
  return parseGovernanceConfig({});
}

/**
 * Validate a path table on its own (hot reload).
 *
 * @throws ConfigurationError
 */
export function parsePathTable(raw: unknown): ReadonlyArray<PathConfig> {
  const result = z.array(PathConfigSchema).safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(formatZodIssues(result.error));
  }
  const issues = pathTableIssues(result.data);
  if (issues.length > 0) throw new ConfigurationError(issues);
  return result.data;
}

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.join('.');
    return where === '' ? issue.message : `${where}: ${issue.message}`;
  });
}

// ---------------------------------------------------------------------------
// Threshold lookup
// ---------------------------------------------------------------------------

/**
 * Confidence threshold for a tier, or null when the tier bypasses the check.
 */
export function confidenceThreshold(config: GovernanceConfig, tier: RiskTier): number | null {
  switch (tier) {
    case RiskTier.ReadOnly:
      return null;
    case RiskTier.Low:
      return config.confidence_thresholds.low ?? config.confidence_threshold;
    case RiskTier.Medium:
      return config.confidence_thresholds.medium ?? config.confidence_threshold;
    case RiskTier.High:
      return config.confidence_thresholds.high ?? config.confidence_threshold;
    case RiskTier.Critical:
      return config.confidence_thresholds.critical ?? config.confidence_threshold;
  }
}

export type ConfidenceGate =
  | { readonly kind: 'bypass'; readonly detail: string }
  | { readonly kind: 'escalate'; readonly detail: string }
  | { readonly kind: 'threshold'; readonly threshold: number };

/** What the confidence check does for a tier at the configured autonomy level. */
export function confidenceGate(config: GovernanceConfig, tier: RiskTier): ConfidenceGate {
  switch (config.autonomy_level) {
    case 'manual':
      return { kind: 'escalate', detail: 'autonomy level manual: operator approval required' };
    case 'full_autonomous':
      return { kind: 'bypass', detail: 'bypassed at autonomy level full_autonomous' };
    case 'supervised':
    case 'autonomous': {
      const threshold = confidenceThreshold(config, tier);
      if (threshold === null) return { kind: 'bypass', detail: `bypassed for ${tier} tier` };
      return {
        kind: 'threshold',
        threshold: config.autonomy_level === 'autonomous' ? Math.min(threshold, AUTONOMOUS_MAX_THRESHOLD) : threshold,
      };
    }
  }
}
