/**
 * Helmsman Runtime Host — FileAuditSink Tests
 *
 *   LOG-U1: decisions.jsonl line carries event_id, verdict and joined reasons
 *   LOG-U2: event_id is a 26-char uppercase ULID; two entries get distinct ids
 *   LOG-U3: attempts go to attempts.jsonl stamped with finished_at
 *   LOG-U4: transitions go to transitions.jsonl stamped with the transition time
 *
 * Isolation: MemoryStateIO — no filesystem I/O.
 */

import { describe, it, expect } from 'vitest';
import { ActionState, AttemptOutcome, Verdict } from '@helmsman/kernel';
import type { Decision, ExecutionAttempt, TransitionEvent } from '@helmsman/kernel';
import { FileAuditSink } from '../src/logging/file-audit-sink.js';
import { MemoryStateIO } from '../src/state/state-io.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const T0 = '2026-01-01T00:00:00.000Z';

function makeDecision(): Decision {
  return {
    action_id: 'act-1',
    action_type: 'restart_service',
    verdict: Verdict.Escalate,
    reasons: ['low_confidence'],
    checks: [{ check: 'confidence', passed: false, detail: 'confidence 0.50 < threshold 0.80 (medium)' }],
    input_hash: 'test-input-hash',
    decided_at: T0,
    approved_by: null,
  };
}

function makeAttempt(): ExecutionAttempt {
  return {
    action_id: 'act-1',
    path: 'local',
    attempt: 1,
    started_at: T0,
    finished_at: '2026-01-01T00:00:01.000Z',
    outcome: AttemptOutcome.Failed,
    error: 'boom',
    detail: null,
  };
}

function parseLine(line: string | undefined): Record<string, unknown> {
  const parsed: unknown = JSON.parse(line ?? 'null');
  if (typeof parsed !== 'object' || parsed === null) throw new Error('not an object');
  return { ...parsed };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('FileAuditSink', () => {
  it('LOG-U1: writes one decision line with verdict and reasons', () => {
    const stateIO = new MemoryStateIO();
    new FileAuditSink(stateIO).appendDecision(makeDecision());

    const lines = stateIO.readLines('decisions.jsonl');
    expect(lines).toHaveLength(1);
    const entry = parseLine(lines[0]);
    expect(entry['event_type']).toBe('decision');
    expect(entry['timestamp']).toBe(T0);
    expect(entry['action_id']).toBe('act-1');
    expect(entry['verdict']).toBe('ESCALATE');
    expect(entry['reason']).toBe('low_confidence');
    expect(entry['approved_by']).toBeNull();
  });

  it('LOG-U2: event_id is a ULID and unique per entry', () => {
    const stateIO = new MemoryStateIO();
    const sink = new FileAuditSink(stateIO);
    sink.appendDecision(makeDecision());
    sink.appendDecision(makeDecision());

    const [first, second] = stateIO.readLines('decisions.jsonl').map(parseLine);
    expect(first?.['event_id']).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(first?.['event_id']).not.toBe(second?.['event_id']);
  });

  it('LOG-U3: attempts are stamped with finished_at', () => {
    const stateIO = new MemoryStateIO();
    new FileAuditSink(stateIO).appendAttempt(makeAttempt());

    const entry = parseLine(stateIO.readLines('attempts.jsonl')[0]);
    expect(entry['event_type']).toBe('attempt');
    expect(entry['timestamp']).toBe('2026-01-01T00:00:01.000Z');
    expect(entry['path']).toBe('local');
    expect(entry['outcome']).toBe('FAILED');
    expect(entry['error']).toBe('boom');
  });

  it('LOG-U4: transitions are stamped with the transition time', () => {
    const stateIO = new MemoryStateIO();
    const transition: TransitionEvent = {
      action_id: 'act-1',
      from: ActionState.Pending,
      to: ActionState.Executing,
      event: 'dispatch_started',
      at: T0,
      note: null,
    };
    new FileAuditSink(stateIO).appendTransition(transition);

    const entry = parseLine(stateIO.readLines('transitions.jsonl')[0]);
    expect(entry['timestamp']).toBe(T0);
    expect(entry['from']).toBe('PENDING');
    expect(entry['to']).toBe('EXECUTING');
    expect(entry['event']).toBe('dispatch_started');
  });
});
