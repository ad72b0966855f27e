/**
 * Helmsman Kernel — Decision Types
 *
 * Every evaluation produces exactly one Decision, and every Decision is
 * recorded for audit regardless of verdict.
 *
 * @see docs/governance.md §4.1 (safety governor)
 */

// ---------------------------------------------------------------------------
// Verdict
// ---------------------------------------------------------------------------

export enum Verdict {
  /** All checks passed; one unit of rate budget has been reserved. */
  Allow = 'ALLOW',
  /** A hard policy check failed. The action is terminal. */
  Deny = 'DENY',
  /** The action needs explicit operator approval before it may run. */
  Escalate = 'ESCALATE',
}

/**
 * Primary reason codes. The first failing check determines the code;
 * `all_checks_passed` and `operator_approved` accompany ALLOW.
 */
export type DecisionReason =
  | 'halted'
  | 'invalid_action'
  | 'low_confidence'
  | 'rate_limited'
  | 'blast_radius_exceeded'
  | 'duplicate_action'
  | 'all_checks_passed'
  | 'operator_approved';

/** Checks in the order the governor evaluates them. */
export type CheckName =
  | 'halt'
  | 'structure'
  | 'confidence'
  | 'rate_limit'
  | 'blast_radius'
  | 'uniqueness';

/** One entry in a decision's reason chain. */
export interface PolicyCheck {
  readonly check: CheckName;
  readonly passed: boolean;
  /** Human-readable explanation, e.g. `confidence 0.50 < threshold 0.80 (medium)`. */
  readonly detail: string;
}

// ---------------------------------------------------------------------------
// Decision
// ---------------------------------------------------------------------------

export interface Decision {
  readonly action_id: string;
  readonly action_type: string;
  readonly verdict: Verdict;
  readonly reasons: ReadonlyArray<DecisionReason>;
  /** Full reason chain: one entry per check evaluated, in order. */
  readonly checks: ReadonlyArray<PolicyCheck>;
  /** SHA-256 of the canonical action, for correlating log entries. */
  readonly input_hash: string;
  readonly decided_at: string;
  /** Set when the decision resolves an operator approval. */
  readonly approved_by: string | null;
}
