/**
 * Helmsman Kernel — Action Record Types
 *
 * An ActionRecord is the lifecycle instance the state machine moves through
 * PENDING → EXECUTING → terminal. Exactly one record exists per action id.
 *
 * @see docs/governance.md §4.3 (action state machine)
 */

import type { Action } from './action.js';
import type { ExecutionAttempt, ExecutionResult } from './execution.js';

// ---------------------------------------------------------------------------
// States
// ---------------------------------------------------------------------------

export enum ActionState {
  Pending = 'PENDING',
  Executing = 'EXECUTING',
  Succeeded = 'SUCCEEDED',
  Failed = 'FAILED',
  RollingBack = 'ROLLING_BACK',
  RolledBack = 'ROLLED_BACK',
  /** An escalated action the operator declined. */
  Rejected = 'REJECTED',
}

// ---------------------------------------------------------------------------
// Lifecycle events
// ---------------------------------------------------------------------------

export type LifecycleEvent =
  | { readonly kind: 'dispatch_started' }
  | { readonly kind: 'attempt_recorded'; readonly attempt: ExecutionAttempt }
  | {
      readonly kind: 'dispatch_finished';
      readonly result: ExecutionResult;
      /**
       * Rollback policy decision, made outside the state machine. Only
       * meaningful when the dispatch did not succeed.
       */
      readonly initiate_rollback: boolean;
    }
  | { readonly kind: 'rollback_started'; readonly actor: string }
  | { readonly kind: 'rollback_finished'; readonly succeeded: boolean; readonly detail: string | null }
  | {
      readonly kind: 'operator_override';
      readonly to: ActionState;
      readonly actor: string;
      readonly reason: string;
    };

export type LifecycleEventKind = LifecycleEvent['kind'];

/** One accepted state change, as stored in a record's history. */
export interface StateChange {
  readonly from: ActionState | null;
  readonly to: ActionState;
  readonly event: LifecycleEventKind | 'created';
  readonly at: string;
  readonly note: string | null;
}

/** A state change as published to the audit sink. */
export interface TransitionEvent extends StateChange {
  readonly action_id: string;
}

// ---------------------------------------------------------------------------
// ActionRecord
// ---------------------------------------------------------------------------

export interface ActionRecord {
  readonly action_id: string;
  readonly action: Action;
  readonly state: ActionState;
  readonly attempts: ReadonlyArray<ExecutionAttempt>;
  readonly history: ReadonlyArray<StateChange>;
  readonly created_at: string;
  readonly updated_at: string;
  /** When the governor admitted the action (reserved rate budget). */
  readonly admitted_at: string | null;
  /** True if the action was escalated for operator approval. */
  readonly escalated: boolean;
  /** Last dispatch result, if the action was dispatched. */
  readonly result: ExecutionResult | null;
  readonly note: string | null;
}
