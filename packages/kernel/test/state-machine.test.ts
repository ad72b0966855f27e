/**
 * Helmsman Kernel — ActionStateMachine Tests
 *
 *   SM-U1: PENDING → EXECUTING → SUCCEEDED on a successful dispatch
 *   SM-U2: exhausted dispatch without rollback → FAILED (terminal)
 *   SM-U3: initiate_rollback flag → FAILED then ROLLING_BACK in one event
 *   SM-U4: rollback_finished → ROLLED_BACK, or back to FAILED when the rollback fails
 *   SM-U5: FAILED → ROLLING_BACK is allowed once
 *   SM-U6: events out of a terminal state are dropped and the record is unchanged
 *   SM-U7: operator override rejects a pending record; other overrides are refused
 *   SM-U8: attempts are appended in order
 *   SM-U9: accepted transitions are published to the audit sink
 */

import { describe, it, expect } from 'vitest';
import {
  ActionState,
  ActionStateMachine,
  AttemptOutcome,
  DispatchOutcome,
  RiskTier,
  StateTransitionError,
  createRecord,
  isTerminal,
  transition,
} from '../src/index.js';
import type {
  Action,
  ActionRecord,
  AuditSink,
  ExecutionAttempt,
  ExecutionResult,
  OperationalLogger,
  TransitionEvent,
} from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const AT = '2026-02-01T12:00:00.000Z';

const ACTION: Action = {
  id: 'deploy-42',
  type: 'deploy',
  targets: ['checkout'],
  risk_tier: RiskTier.High,
  confidence: 0.9,
  proposed_at: AT,
};

function attempt(path: string, outcome: AttemptOutcome, n: number): ExecutionAttempt {
  return {
    action_id: ACTION.id,
    path,
    attempt: n,
    started_at: AT,
    finished_at: AT,
    outcome,
    error: outcome === AttemptOutcome.Success ? null : 'boom',
    detail: null,
  };
}

function result(outcome: DispatchOutcome, attempts: ExecutionAttempt[]): ExecutionResult {
  return {
    action_id: ACTION.id,
    outcome,
    path: outcome === DispatchOutcome.Success ? (attempts[attempts.length - 1]?.path ?? null) : null,
    attempts,
  };
}

const EXHAUSTED = result(DispatchOutcome.Exhausted, [attempt('local', AttemptOutcome.Failed, 1)]);

function pending(): ActionRecord {
  return createRecord(ACTION, AT, { escalated: false, admitted_at: AT });
}

function executing(): ActionRecord {
  return transition(pending(), { kind: 'dispatch_started' }, AT);
}

function failed(): ActionRecord {
  return transition(executing(), { kind: 'dispatch_finished', result: EXHAUSTED, initiate_rollback: false }, AT);
}

class CollectingLogger implements OperationalLogger {
  readonly warnings: Array<{ obj: object; msg: string | undefined }> = [];
  debug(): void {}
  info(): void {}
  warn(obj: object, msg?: string): void {
    this.warnings.push({ obj, msg });
  }
  error(): void {}
}

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

describe('transition', () => {
  it('SM-U1: success path ends SUCCEEDED', () => {
    const ok = result(DispatchOutcome.Success, [attempt('local', AttemptOutcome.Success, 1)]);

    const done = transition(executing(), { kind: 'dispatch_finished', result: ok, initiate_rollback: false }, AT);

    expect(done.state).toBe(ActionState.Succeeded);
    expect(done.result).toBe(ok);
    expect(done.note).toBe('succeeded via local');
    expect(done.history.map((h) => h.to)).toEqual([
      ActionState.Pending,
      ActionState.Executing,
      ActionState.Succeeded,
    ]);
    expect(isTerminal(done)).toBe(true);
  });

  it('SM-U2: exhausted without rollback is a terminal FAILED', () => {
    const record = failed();

    expect(record.state).toBe(ActionState.Failed);
    expect(record.note).toBe('all 1 path attempt(s) failed');
    expect(isTerminal(record)).toBe(false);
  });

  it('SM-U3: the rollback flag moves through FAILED into ROLLING_BACK', () => {
    const record = transition(
      executing(),
      { kind: 'dispatch_finished', result: EXHAUSTED, initiate_rollback: true },
      AT,
    );

    expect(record.state).toBe(ActionState.RollingBack);
    expect(record.history.slice(-2).map((h) => [h.from, h.to])).toEqual([
      [ActionState.Executing, ActionState.Failed],
      [ActionState.Failed, ActionState.RollingBack],
    ]);
  });

  it('SM-U3b: the rollback flag is ignored on success', () => {
    const ok = result(DispatchOutcome.Success, [attempt('local', AttemptOutcome.Success, 1)]);

    const record = transition(executing(), { kind: 'dispatch_finished', result: ok, initiate_rollback: true }, AT);

    expect(record.state).toBe(ActionState.Succeeded);
  });

  it('SM-U4: rollback outcome decides ROLLED_BACK or FAILED', () => {
    const rolling = transition(failed(), { kind: 'rollback_started', actor: 'policy' }, AT);

    const rolledBack = transition(rolling, { kind: 'rollback_finished', succeeded: true, detail: null }, AT);
    const rollbackFailed = transition(
      rolling,
      { kind: 'rollback_finished', succeeded: false, detail: 'previous release missing' },
      AT,
    );

    expect(rolledBack.state).toBe(ActionState.RolledBack);
    expect(isTerminal(rolledBack)).toBe(true);
    expect(rollbackFailed.state).toBe(ActionState.Failed);
    expect(rollbackFailed.note).toBe('previous release missing');
    expect(isTerminal(rollbackFailed)).toBe(true);
  });

  it('SM-U5: a record can only roll back once', () => {
    const rolling = transition(failed(), { kind: 'rollback_started', actor: 'cli:operator' }, AT);
    const failedAgain = transition(rolling, { kind: 'rollback_finished', succeeded: false, detail: null }, AT);

    expect(() => transition(failedAgain, { kind: 'rollback_started', actor: 'cli:operator' }, AT))
      .toThrow(StateTransitionError);
  });

  it('SM-U7: override rejects a pending record and refuses to reopen a finished one', () => {
    const rejected = transition(
      pending(),
      { kind: 'operator_override', to: ActionState.Rejected, actor: 'cli:operator', reason: 'not now' },
      AT,
    );
    expect(rejected.state).toBe(ActionState.Rejected);
    expect(rejected.note).toBe('cli:operator: not now');

    expect(() =>
      transition(
        executing(),
        { kind: 'operator_override', to: ActionState.Succeeded, actor: 'cli:operator', reason: 'trust me' },
        AT,
      ),
    ).toThrow('override to SUCCEEDED not permitted');
  });

  it('SM-U8: attempts are appended in order without changing state', () => {
    let record = executing();
    record = transition(record, { kind: 'attempt_recorded', attempt: attempt('local', AttemptOutcome.Timeout, 1) }, AT);
    record = transition(record, { kind: 'attempt_recorded', attempt: attempt('webhook', AttemptOutcome.Success, 2) }, AT);

    expect(record.state).toBe(ActionState.Executing);
    expect(record.attempts.map((a) => a.path)).toEqual(['local', 'webhook']);
  });
});

// ---------------------------------------------------------------------------
// ActionStateMachine.fire
// ---------------------------------------------------------------------------

describe('ActionStateMachine.fire', () => {
  it('SM-U6: an event out of a terminal state is logged and dropped', () => {
    const logger = new CollectingLogger();
    const machine = new ActionStateMachine(undefined, logger, () => new Date(AT));
    const ok = result(DispatchOutcome.Success, [attempt('local', AttemptOutcome.Success, 1)]);
    const done = transition(executing(), { kind: 'dispatch_finished', result: ok, initiate_rollback: false }, AT);

    const fired = machine.fire(done, { kind: 'dispatch_started' });

    expect(fired.accepted).toBe(false);
    expect(fired.record).toBe(done);
    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0]?.msg).toBe('state transition rejected; event dropped');
  });

  it('SM-U9: accepted transitions are published to the sink', () => {
    const transitions: TransitionEvent[] = [];
    const sink: AuditSink = {
      appendDecision: () => undefined,
      appendAttempt: () => undefined,
      appendTransition: (t) => {
        transitions.push(t);
      },
    };
    const machine = new ActionStateMachine(sink, undefined, () => new Date(AT));

    const started = machine.fire(pending(), { kind: 'dispatch_started' }).record;
    machine.fire(started, { kind: 'dispatch_finished', result: EXHAUSTED, initiate_rollback: true });

    expect(transitions.map((t) => `${t.from ?? '-'}>${t.to}`)).toEqual([
      'PENDING>EXECUTING',
      'EXECUTING>FAILED',
      'FAILED>ROLLING_BACK',
    ]);
    expect(transitions.every((t) => t.action_id === 'deploy-42')).toBe(true);
  });
});
