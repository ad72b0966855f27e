/**
 * Helmsman Kernel — Execution Types
 *
 * Path configuration, per-attempt records and dispatch results.
 *
 * @see docs/governance.md §4.2 (path dispatcher)
 */

// ---------------------------------------------------------------------------
// PathConfig
// ---------------------------------------------------------------------------

/**
 * Dispatch settings for one execution backend. Operator-configured and
 * hot-reloadable; the dispatcher snapshots the table per dispatch.
 */
export interface PathConfig {
  /** Must match the `name` of a registered ActionExecutor. */
  readonly name: string;
  readonly enabled: boolean;
  readonly timeout_ms: number;
  /** Lower runs first. */
  readonly priority: number;
  /** Operator's prior belief in [0, 1]; breaks priority ties (higher first). */
  readonly reliability_estimate: number;
  /**
   * The always-succeeding fallback (e.g. open a tracking ticket). At most
   * one path may be terminal and it must sort last.
   */
  readonly terminal: boolean;
}

// ---------------------------------------------------------------------------
// ExecutionAttempt
// ---------------------------------------------------------------------------

export enum AttemptOutcome {
  Success = 'SUCCESS',
  Failed = 'FAILED',
  Timeout = 'TIMEOUT',
}

/** One try of one path for one action. Append-only. */
export interface ExecutionAttempt {
  readonly action_id: string;
  readonly path: string;
  /** 1-based position within the dispatch. */
  readonly attempt: number;
  readonly started_at: string;
  readonly finished_at: string;
  readonly outcome: AttemptOutcome;
  readonly error: string | null;
  /** Executor-supplied summary on success (e.g. ticket URL, run id). */
  readonly detail: string | null;
}

// ---------------------------------------------------------------------------
// ExecutionResult
// ---------------------------------------------------------------------------

export enum DispatchOutcome {
  /** A path succeeded. */
  Success = 'SUCCESS',
  /** Every enabled path was tried and none succeeded. */
  Exhausted = 'EXHAUSTED',
  /** The halt flag was observed between attempts; remaining paths skipped. */
  Halted = 'HALTED',
}

export interface ExecutionResult {
  readonly action_id: string;
  readonly outcome: DispatchOutcome;
  /** The path that succeeded; null unless outcome is SUCCESS. */
  readonly path: string | null;
  /** Every attempt in order, including failures before the successful one. */
  readonly attempts: ReadonlyArray<ExecutionAttempt>;
}

// ---------------------------------------------------------------------------
// Path statistics
// ---------------------------------------------------------------------------

/** Observed behaviour of one path since process start. */
export interface PathStats {
  readonly name: string;
  readonly attempts: number;
  readonly successes: number;
  readonly failures: number;
  readonly timeouts: number;
  /** Exponentially weighted success rate, seeded from reliability_estimate. */
  readonly observed_reliability: number;
  readonly last_outcome: AttemptOutcome | null;
  readonly last_error: string | null;
  readonly last_attempt_at: string | null;
}
