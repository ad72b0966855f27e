/**
 * Helmsman Autopilot — Rollback Policy
 *
 * Decides whether an action that failed to dispatch is rolled back, and
 * performs the rollback. The state machine never decides this itself: the
 * pipeline asks the policy and passes the answer as `initiate_rollback` on
 * the `dispatch_finished` event.
 *
 * @see docs/governance.md §4.3 (action state machine)
 */

import { DispatchOutcome } from '@helmsman/kernel';
import type { Action, ActionRecord, DispatchObserver, ExecutionResult, PathDispatcher } from '@helmsman/kernel';

export interface RollbackOutcome {
  readonly succeeded: boolean;
  readonly detail: string | null;
}

export interface RollbackPolicy {
  /** Asked once, when a dispatch finishes without success. */
  shouldRollback(record: ActionRecord, result: ExecutionResult): boolean;
  /**
   * Undo the action. Attempts made on the way are reported through the
   * observer so they land on the original record.
   */
  rollback(record: ActionRecord, observer: DispatchObserver): Promise<RollbackOutcome>;
}

/** Default: failures stay FAILED. Operator-requested rollbacks report that nothing is configured. */
export const NEVER_ROLLBACK: RollbackPolicy = {
  shouldRollback: () => false,
  rollback: () => Promise.resolve({ succeeded: false, detail: 'no rollback policy configured' }),
};

// ---------------------------------------------------------------------------
// DispatchRollbackPolicy
// ---------------------------------------------------------------------------

/**
 * Builds the compensating action for a record, or null when the action type
 * has no rollback procedure.
 */
export type RollbackPlanner = (action: Action) => Action | null;

/**
 * Compensating action from `params.rollback_type`: same targets, id
 * `<id>:rollback`, read from the original action's parameters.
 */
export const rollbackFromParams: RollbackPlanner = (action) => {
  const rollbackType = action.params?.['rollback_type'];
  if (typeof rollbackType !== 'string' || rollbackType.trim() === '') return null;
  return {
    id: `${action.id}:rollback`,
    type: rollbackType,
    targets: action.targets,
    risk_tier: action.risk_tier,
    confidence: action.confidence,
    proposed_at: action.proposed_at,
    params: { ...action.params, rollback_of: action.id },
    source: 'rollback',
  };
};

/**
 * Rolls back exhausted dispatches by dispatching a compensating action
 * through the same path table. Halted dispatches are not rolled back
 * automatically: the operator is already involved.
 *
 * The compensating dispatch ignores the halt. It never passes through the
 * governor and holds no admission. A compensating action that only the
 * terminal path took (a ticket was filed) has not been undone: the record
 * stays FAILED and the detail names the hand-off.
 */
export class DispatchRollbackPolicy implements RollbackPolicy {
  constructor(
    private readonly dispatcher: PathDispatcher,
    private readonly planner: RollbackPlanner = rollbackFromParams,
  ) {}

  shouldRollback(record: ActionRecord, result: ExecutionResult): boolean {
    return result.outcome === DispatchOutcome.Exhausted && this.planner(record.action) !== null;
  }

  async rollback(record: ActionRecord, observer: DispatchObserver): Promise<RollbackOutcome> {
    const compensating = this.planner(record.action);
    if (compensating === null) {
      return { succeeded: false, detail: `no rollback procedure for ${record.action.type}` };
    }
    const result = await this.dispatcher.execute(compensating, { ...observer, ignoreHalt: true });
    if (result.outcome === DispatchOutcome.Success) {
      const path = result.path ?? 'unknown path';
      if (this.dispatcher.paths().some((p) => p.name === path && p.terminal)) {
        return { succeeded: false, detail: `rollback handed off via ${path}; not yet undone` };
      }
      return { succeeded: true, detail: `rolled back via ${path}` };
    }
    return { succeeded: false, detail: `rollback ${result.outcome.toLowerCase()} after ${result.attempts.length} attempt(s)` };
  }
}
