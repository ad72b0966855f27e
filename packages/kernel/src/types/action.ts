/**
 * Helmsman Kernel — Action Types
 *
 * An Action is a proposed autonomous operation: restart a service, scale a
 * deployment, roll back a release. It is created once (by the
 * observe-decide-act loop or an external trigger), evaluated once by the
 * SafetyGovernor, and never mutated afterwards.
 *
 * @see docs/governance.md §2 (data model)
 */

// ---------------------------------------------------------------------------
// Risk Tier
// ---------------------------------------------------------------------------

/**
 * Risk classification of an action.
 *
 * `read-only` is the only tier that bypasses the confidence check: an action
 * that cannot change a target is never escalated for low confidence.
 */
export enum RiskTier {
  ReadOnly = 'read-only',
  Low = 'low',
  Medium = 'medium',
  High = 'high',
  Critical = 'critical',
}

/** Tiers in ascending order of risk. */
export const RISK_TIER_ORDER: ReadonlyArray<RiskTier> = [
  RiskTier.ReadOnly,
  RiskTier.Low,
  RiskTier.Medium,
  RiskTier.High,
  RiskTier.Critical,
];

// ---------------------------------------------------------------------------
// Targets
// ---------------------------------------------------------------------------

/**
 * A structured target. `environment` and `region` are optional refinements
 * used by the non-default blast-radius scopes.
 */
export interface ActionTarget {
  readonly service: string;
  readonly environment?: string | undefined;
  readonly region?: string | undefined;
}

/** A bare string is shorthand for `{ service: <string> }`. */
export type TargetRef = string | ActionTarget;

// ---------------------------------------------------------------------------
// Action
// ---------------------------------------------------------------------------

export interface Action {
  /** Caller-supplied unique id. Re-submitting a known id is denied. */
  readonly id: string;
  /** Action type, e.g. `restart_service`, `deploy`, `rollback`. */
  readonly type: string;
  readonly targets: ReadonlyArray<TargetRef>;
  readonly risk_tier: RiskTier;
  /**
   * Certainty in [0, 1] that the action is correct and safe.
   * Missing or null is evaluated as 0.
   */
  readonly confidence?: number | null | undefined;
  /** ISO 8601 timestamp at which the action was proposed. */
  readonly proposed_at: string;
  /** Backend-specific parameters, passed through to executors untouched. */
  readonly params?: Readonly<Record<string, unknown>> | undefined;
  /** Name of the signal source or trigger that proposed the action. */
  readonly source?: string | undefined;
  /** Human-readable explanation shown to operators on escalation. */
  readonly rationale?: string | undefined;
}

/** Normalize a target reference to its structured form. */
export function toActionTarget(ref: TargetRef): ActionTarget {
  return typeof ref === 'string' ? { service: ref } : ref;
}
