/**
 * Helmsman Runtime Host — File-backed Audit Sink
 *
 * Implements the kernel's AuditSink by appending one JSONL line per event:
 *
 *   logs/decisions.jsonl    every governor decision (ALLOW, DENY, ESCALATE)
 *   logs/attempts.jsonl     every path attempt
 *   logs/transitions.jsonl  every accepted state change
 *
 * Each line carries an `event_id` ULID, the dedupe key used by readLog(),
 * and a `timestamp` used for ordering. Writes are synchronous: the entry is
 * durable before the caller proceeds.
 *
 * @see docs/governance.md §6 (audit trail)
 */

import { ulid } from 'ulid';
import type { AuditSink, Decision, ExecutionAttempt, TransitionEvent } from '@helmsman/kernel';
import type { StateIO } from '../state/state-io.js';

export const DECISIONS_LOG = 'decisions.jsonl';
export const ATTEMPTS_LOG = 'attempts.jsonl';
export const TRANSITIONS_LOG = 'transitions.jsonl';

export class FileAuditSink implements AuditSink {
  constructor(private readonly stateIO: StateIO) {}

  appendDecision(decision: Decision): void {
    this.write(DECISIONS_LOG, {
      event_type: 'decision',
      timestamp: decision.decided_at,
      action_id: decision.action_id,
      action_type: decision.action_type,
      verdict: decision.verdict,
      reason: decision.reasons.join(', '),
      checks: decision.checks,
      approved_by: decision.approved_by,
      input_hash: decision.input_hash,
    });
  }

  appendAttempt(attempt: ExecutionAttempt): void {
    this.write(ATTEMPTS_LOG, {
      event_type: 'attempt',
      timestamp: attempt.finished_at,
      ...attempt,
    });
  }

  appendTransition(transition: TransitionEvent): void {
    this.write(TRANSITIONS_LOG, {
      event_type: 'transition',
      timestamp: transition.at,
      ...transition,
    });
  }

  private write(logfilename: string, fields: Record<string, unknown>): void {
    this.stateIO.appendLine(logfilename, JSON.stringify({ event_id: ulid(), ...fields }));
  }
}
