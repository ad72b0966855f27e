/**
 * Helmsman Kernel — Halt State
 *
 * The process-wide autonomy switch. Owned by the AutonomyLedger; never
 * written anywhere else.
 *
 * @see docs/governance.md §4.4 (cascading failure monitor)
 */

export interface HaltState {
  readonly active: boolean;
  /** e.g. `cascading_failure`, or the operator's reason for a manual halt. */
  readonly reason: string | null;
  readonly tripped_at: string | null;
  /** Component or operator that tripped the halt. */
  readonly tripped_by: string | null;
  /**
   * Time of the last explicit reset. Failures at or before this instant were
   * acknowledged by the operator and no longer count toward a new trip.
   */
  readonly last_reset_at: string | null;
}

export const INITIAL_HALT_STATE: HaltState = {
  active: false,
  reason: null,
  tripped_at: null,
  tripped_by: null,
  last_reset_at: null,
};

/** Status line shown to operators, e.g. `autonomy suspended: cascading_failure since <time>`. */
export function describeHalt(state: HaltState): string {
  if (!state.active) return 'autonomy active';
  return `autonomy suspended: ${state.reason ?? 'unspecified'} since ${state.tripped_at ?? 'unknown'}`;
}
