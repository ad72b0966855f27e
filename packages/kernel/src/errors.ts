/**
 * Helmsman Kernel — Error Taxonomy
 *
 * Propagation rules:
 *   AdapterFailure       recovered inside the dispatcher (next path is tried)
 *   DispatchExhausted    surfaced to the submitter as an action failure
 *   PolicyViolation      terminal for the action; propose a new one to retry
 *   StateTransitionError logged by the state machine; the event is dropped
 *   ConfigurationError   stops startup
 *
 * @see docs/governance.md §7 (error handling)
 */

import type { Decision } from './types/decision.js';
import type { ExecutionResult } from './types/execution.js';
import type { ActionState, LifecycleEventKind } from './types/record.js';

export abstract class HelmsmanError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The governor denied or escalated an action. */
export class PolicyViolation extends HelmsmanError {
  readonly code = 'POLICY_VIOLATION';

  constructor(readonly decision: Decision) {
    super(
      `action ${decision.action_id} ${decision.verdict}: ${decision.reasons.join(', ')}`,
    );
  }
}

/** One path attempt failed or timed out. */
export class AdapterFailure extends HelmsmanError {
  readonly code = 'ADAPTER_FAILURE';

  constructor(
    readonly path: string,
    readonly kind: 'failed' | 'timeout',
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${path}] ${message}`, options);
  }
}

/** Every enabled path was tried without success, or dispatch was halted. */
export class DispatchExhausted extends HelmsmanError {
  readonly code = 'DISPATCH_EXHAUSTED';

  constructor(readonly result: ExecutionResult) {
    super(
      `action ${result.action_id} ${result.outcome.toLowerCase()} after ${result.attempts.length} attempt(s): ` +
        (result.attempts.map((a) => `${a.path}=${a.outcome}`).join(', ') || 'no paths tried'),
    );
  }
}

/** An event was fired that the record's current state does not accept. */
export class StateTransitionError extends HelmsmanError {
  readonly code = 'STATE_TRANSITION';

  constructor(
    readonly action_id: string,
    readonly from: ActionState,
    readonly event: LifecycleEventKind,
    detail?: string,
  ) {
    super(
      `action ${action_id}: event '${event}' not accepted in state ${from}` +
        (detail !== undefined ? ` (${detail})` : ''),
    );
  }
}

/** Thresholds or path tables failed validation. */
export class ConfigurationError extends HelmsmanError {
  readonly code = 'CONFIGURATION';

  constructor(readonly issues: ReadonlyArray<string>) {
    super(`invalid configuration:\n  ${issues.join('\n  ')}`);
  }
}
