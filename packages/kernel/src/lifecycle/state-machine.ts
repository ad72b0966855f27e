/**
 * Helmsman Kernel — Action State Machine
 *
 *   PENDING ──dispatch_started──▶ EXECUTING ──dispatch_finished──▶ SUCCEEDED
 *      │                              │                      └──▶ FAILED ──rollback_started──▶ ROLLING_BACK
 *      │                              │                                                         │
 *      └──operator_override──▶ REJECTED                               ROLLED_BACK ◀──succeeded──┤
 *                                                                     FAILED      ◀──failed─────┘
 *
 * Transitions are monotonic except the FAILED → ROLLING_BACK branch, which
 * may be taken once per record. SUCCEEDED, ROLLED_BACK and REJECTED accept no
 * events; FAILED accepts only rollback_started.
 *
 * transition() is pure and throws StateTransitionError on an invalid move.
 * ActionStateMachine.fire() wraps it: the error is logged, the event dropped
 * and the record returned unchanged, so a stray event can never take the
 * governor process down.
 *
 * @see docs/governance.md §4.3 (action state machine)
 */

import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import { StateTransitionError } from '../errors.js';
import type { AuditSink } from '../logging/audit-sink.js';
import type { OperationalLogger } from '../logging/operational-logger.js';
import { silentLogger } from '../logging/operational-logger.js';
import type { Action } from '../types/action.js';
import { DispatchOutcome } from '../types/execution.js';
import type { ActionRecord, LifecycleEvent, StateChange } from '../types/record.js';
import { ActionState } from '../types/record.js';

// ---------------------------------------------------------------------------
// State classification
// ---------------------------------------------------------------------------

const FINAL_STATES: ReadonlySet<ActionState> = new Set([
  ActionState.Succeeded,
  ActionState.RolledBack,
  ActionState.Rejected,
]);

/** True when no further transition can occur for the record. */
export function isTerminal(record: ActionRecord): boolean {
  if (FINAL_STATES.has(record.state)) return true;
  return record.state === ActionState.Failed && hasRolledBack(record);
}

/**
 * True when the record has reached an outcome, even if a rollback may still
 * follow (FAILED without a rollback).
 */
export function isSettled(state: ActionState): boolean {
  return FINAL_STATES.has(state) || state === ActionState.Failed;
}

function hasRolledBack(record: ActionRecord): boolean {
  return record.history.some((h) => h.to === ActionState.RollingBack);
}

// ---------------------------------------------------------------------------
// Record construction
// ---------------------------------------------------------------------------

export function createRecord(
  action: Action,
  at: string,
  options: { escalated: boolean; admitted_at: string | null; note?: string | null },
): ActionRecord {
  return {
    action_id: action.id,
    action,
    state: ActionState.Pending,
    attempts: [],
    history: [{ from: null, to: ActionState.Pending, event: 'created', at, note: options.note ?? null }],
    created_at: at,
    updated_at: at,
    admitted_at: options.admitted_at,
    escalated: options.escalated,
    result: null,
    note: options.note ?? null,
  };
}

// ---------------------------------------------------------------------------
// Pure transition function
// ---------------------------------------------------------------------------

/**
 * Apply one event to a record.
 *
 * @throws StateTransitionError if the current state does not accept the event
 */
export function transition(record: ActionRecord, event: LifecycleEvent, at: string): ActionRecord {
  const reject = (detail?: string): never => {
    throw new StateTransitionError(record.action_id, record.state, event.kind, detail);
  };
  const move = (to: ActionState, note: string | null, extra: Partial<ActionRecord> = {}): ActionRecord => {
    const change: StateChange = { from: record.state, to, event: event.kind, at, note };
    return {
      ...record,
      ...extra,
      state: to,
      history: [...record.history, change],
      updated_at: at,
      note: note ?? record.note,
    };
  };

  if (FINAL_STATES.has(record.state)) return reject('record is terminal');

  switch (event.kind) {
    case 'dispatch_started':
      if (record.state !== ActionState.Pending) return reject();
      return move(ActionState.Executing, null);

    case 'attempt_recorded':
      if (record.state !== ActionState.Executing && record.state !== ActionState.RollingBack) return reject();
      return { ...record, attempts: [...record.attempts, event.attempt], updated_at: at };

    case 'dispatch_finished': {
      if (record.state !== ActionState.Executing) return reject();
      const { result } = event;
      if (result.outcome === DispatchOutcome.Success) {
        return move(ActionState.Succeeded, `succeeded via ${result.path ?? 'unknown path'}`, { result });
      }
      const reason = result.outcome === DispatchOutcome.Halted
        ? 'dispatch halted before a path succeeded'
        : `all ${result.attempts.length} path attempt(s) failed`;
      const failed = move(ActionState.Failed, reason, { result });
      if (!event.initiate_rollback) return failed;
      const change: StateChange = {
        from: ActionState.Failed,
        to: ActionState.RollingBack,
        event: event.kind,
        at,
        note: 'rollback initiated by policy',
      };
      return { ...failed, state: ActionState.RollingBack, history: [...failed.history, change] };
    }

    case 'rollback_started':
      if (record.state !== ActionState.Failed) return reject();
      if (hasRolledBack(record)) return reject('rollback already attempted');
      return move(ActionState.RollingBack, `rollback requested by ${event.actor}`);

    case 'rollback_finished':
      if (record.state !== ActionState.RollingBack) return reject();
      return event.succeeded
        ? move(ActionState.RolledBack, event.detail ?? 'rollback succeeded')
        : move(ActionState.Failed, event.detail ?? 'rollback failed');

    case 'operator_override': {
      const note = `${event.actor}: ${event.reason}`;
      if (event.to === ActionState.Rejected && record.state === ActionState.Pending) {
        return move(ActionState.Rejected, note);
      }
      if (
        event.to === ActionState.Failed &&
        (record.state === ActionState.Pending ||
          record.state === ActionState.Executing ||
          record.state === ActionState.RollingBack)
      ) {
        return move(ActionState.Failed, note);
      }
      return reject(`override to ${event.to} not permitted`);
    }
  }
}

// ---------------------------------------------------------------------------
// ActionStateMachine
// ---------------------------------------------------------------------------

export interface FireResult {
  readonly record: ActionRecord;
  /** False when the event was rejected and dropped. */
  readonly accepted: boolean;
}

export class ActionStateMachine {
  constructor(
    private readonly sink?: AuditSink,
    private readonly logger: OperationalLogger = silentLogger,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Apply an event. Never throws StateTransitionError: an invalid event is
   * logged and dropped and the record is returned unchanged.
   */
  fire(record: ActionRecord, event: LifecycleEvent): FireResult {
    let next: ActionRecord;
    try {
      next = transition(record, event, this.clock().toISOString());
    } catch (err: unknown) {
      if (err instanceof StateTransitionError) {
        this.logger.warn(
          { action_id: record.action_id, state: record.state, event: event.kind, err: err.message },
          'state transition rejected; event dropped',
        );
        return { record, accepted: false };
      }
      throw err;
    }

    for (const change of next.history.slice(record.history.length)) {
      this.sink?.appendTransition({ action_id: record.action_id, ...change });
    }
    return { record: next, accepted: true };
  }
}
