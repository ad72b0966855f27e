/**
 * Helmsman Kernel — Audit Sink Interface
 *
 * Injection point for audit persistence. The kernel owns the contract;
 * concrete sinks (JSONL files) live in runtime-host. The kernel never writes
 * to disk itself.
 *
 * Every call must complete before the caller proceeds: a decision is durable
 * before its action dispatches, an attempt before the next path is tried.
 *
 * @see docs/governance.md §6 (audit trail)
 */

import type { Decision } from '../types/decision.js';
import type { ExecutionAttempt } from '../types/execution.js';
import type { TransitionEvent } from '../types/record.js';

export interface AuditSink {
  appendDecision(decision: Decision): void;
  appendAttempt(attempt: ExecutionAttempt): void;
  appendTransition(transition: TransitionEvent): void;
}
