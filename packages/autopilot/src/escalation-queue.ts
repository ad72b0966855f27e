/**
 * Helmsman Autopilot — Escalation Queue
 *
 * The human-approval workflow for ESCALATE verdicts. An escalated action is
 * parked as a PENDING record; an operator either approves it (the governor
 * re-evaluates it without the confidence check and, on ALLOW, it dispatches)
 * or rejects it (REJECTED).
 *
 * Authority rule:
 *   Only actors with kind 'human' or 'cli' may approve or reject.
 *   Agents may propose actions but cannot approve their own escalations.
 *   Violations return ok=false; the record stays PENDING.
 *
 * State machine:
 *   PENDING → EXECUTING  approval accepted by the governor
 *   PENDING → REJECTED   explicit rejection
 *   PENDING → PENDING    recoverable errors (non-human actor, governor denial)
 *
 * @see docs/governance.md §4.3 (action state machine)
 */

import { ActionState, Verdict } from '@helmsman/kernel';
import type { ActionRecord, Decision } from '@helmsman/kernel';
import type { ActionPipeline, SubmissionResult } from './pipeline.js';

// ---------------------------------------------------------------------------
// Authority
// ---------------------------------------------------------------------------

export type ActorKind = 'human' | 'cli' | 'agent' | 'system';

export interface Actor {
  readonly kind: ActorKind;
  readonly id: string;
}

const APPROVER_KINDS: ReadonlySet<ActorKind> = new Set<ActorKind>(['human', 'cli']);

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export type ApproveResult =
  | {
      readonly ok: true;
      readonly decision: Decision;
      /** Settles when the approved action's dispatch does. */
      readonly completion: Promise<SubmissionResult>;
    }
  | { readonly ok: false; readonly error: string; readonly decision: Decision | null };

export type RejectResult =
  | { readonly ok: true; readonly record: ActionRecord }
  | { readonly ok: false; readonly error: string };

// ---------------------------------------------------------------------------
// EscalationQueue
// ---------------------------------------------------------------------------

export class EscalationQueue {
  constructor(private readonly pipeline: ActionPipeline) {}

  /** Escalated records awaiting a decision, oldest first. */
  list(): ReadonlyArray<ActionRecord> {
    return [...this.pipeline.pendingEscalations()].sort((a, b) =>
      a.created_at < b.created_at ? -1 : a.created_at > b.created_at ? 1 : 0,
    );
  }

  /**
   * Look up a pending escalation by full action id or unique id prefix.
   */
  get(idOrPrefix: string): ActionRecord | undefined {
    const pending = this.pipeline.pendingEscalations();
    const exact = pending.find((r) => r.action_id === idOrPrefix);
    if (exact !== undefined) return exact;
    const matches = pending.filter((r) => r.action_id.startsWith(idOrPrefix));
    return matches.length === 1 ? matches[0] : undefined;
  }

  approve(idOrPrefix: string, approver: Actor): ApproveResult {
    if (!APPROVER_KINDS.has(approver.kind)) {
      return {
        ok: false,
        decision: null,
        error:
          `Only human-class actors (human, cli) may approve escalations. ` +
          `Actor kind '${approver.kind}' is not permitted.`,
      };
    }
    const record = this.get(idOrPrefix);
    if (record === undefined) {
      return { ok: false, decision: null, error: `No pending escalation matches '${idOrPrefix}'` };
    }

    const handle = this.pipeline.approve(record.action_id, `${approver.kind}:${approver.id}`);
    if (handle === null) {
      return { ok: false, decision: null, error: `Action ${record.action_id} is no longer pending` };
    }
    if (handle.decision.verdict !== Verdict.Allow) {
      return {
        ok: false,
        decision: handle.decision,
        error: `Governor denied approved action ${record.action_id}: ${handle.decision.reasons.join(', ')}`,
      };
    }
    return { ok: true, decision: handle.decision, completion: handle.completion };
  }

  reject(idOrPrefix: string, rejector: Actor, reason = 'rejected by operator'): RejectResult {
    if (!APPROVER_KINDS.has(rejector.kind)) {
      return {
        ok: false,
        error:
          `Only human-class actors (human, cli) may reject escalations. ` +
          `Actor kind '${rejector.kind}' is not permitted.`,
      };
    }
    const record = this.get(idOrPrefix);
    if (record === undefined) {
      return { ok: false, error: `No pending escalation matches '${idOrPrefix}'` };
    }

    const result = this.pipeline.override(
      record.action_id,
      ActionState.Rejected,
      `${rejector.kind}:${rejector.id}`,
      reason,
    );
    if (result === null || !result.accepted) {
      return { ok: false, error: `Action ${record.action_id} could not be rejected` };
    }
    return { ok: true, record: result.record };
  }
}
