/**
 * Helmsman Autopilot — EscalationQueue Tests
 *
 *   ESC-U1: list() returns pending escalations oldest first
 *   ESC-U2: agent actors cannot approve or reject; the record stays PENDING
 *   ESC-U3: a cli approval re-evaluates without the confidence check and dispatches
 *   ESC-U4: a governor denial on approval leaves the record PENDING
 *   ESC-U5: reject moves the record to REJECTED
 *   ESC-U6: lookup by unique id prefix
 */

import { describe, it, expect } from 'vitest';
import { ActionState, Verdict } from '@helmsman/kernel';
import { EscalationQueue } from '../src/escalation-queue.js';
import type { Actor } from '../src/escalation-queue.js';
import { makeAction, makeHarness } from './fixtures.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const OPERATOR: Actor = { kind: 'cli', id: 'operator' };
const AGENT: Actor = { kind: 'agent', id: 'agent-1' };

async function withEscalations(...ids: string[]) {
  const harness = makeHarness();
  for (const [i, id] of ids.entries()) {
    harness.time.advance(1000);
    await harness.pipeline.submit(makeAction({ id, confidence: 0.2, targets: [`svc${i}`] }));
  }
  return { ...harness, queue: new EscalationQueue(harness.pipeline) };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('EscalationQueue', () => {
  it('ESC-U1: lists pending escalations oldest first', async () => {
    const { queue } = await withEscalations('deploy-b', 'deploy-a');
    expect(queue.list().map((r) => r.action_id)).toEqual(['deploy-b', 'deploy-a']);
  });

  it('ESC-U2: agents may not approve or reject', async () => {
    const { queue, pipeline } = await withEscalations('esc-1');

    const approved = queue.approve('esc-1', AGENT);
    expect(approved.ok).toBe(false);
    if (!approved.ok) {
      expect(approved.error).toBe(
        "Only human-class actors (human, cli) may approve escalations. Actor kind 'agent' is not permitted.",
      );
    }
    expect(queue.reject('esc-1', AGENT).ok).toBe(false);
    expect(pipeline.record('esc-1')?.state).toBe(ActionState.Pending);
  });

  it('ESC-U3: an operator approval dispatches the action', async () => {
    const { queue, local } = await withEscalations('esc-1');

    const approved = queue.approve('esc-1', OPERATOR);

    if (!approved.ok) throw new Error(approved.error);
    expect(approved.decision.verdict).toBe(Verdict.Allow);
    expect(approved.decision.reasons).toEqual(['operator_approved']);
    expect(approved.decision.approved_by).toBe('cli:operator');
    const settled = await approved.completion;
    expect(settled.kind === 'dispatched' ? settled.record.state : null).toBe(ActionState.Succeeded);
    expect(local.calls).toEqual(['esc-1']);
    expect(queue.list()).toEqual([]);
  });

  it('ESC-U4: a denial on approval keeps the record PENDING', async () => {
    const { queue, pipeline } = await withEscalations('esc-1');
    pipeline.halt('maintenance', 'cli:operator');

    const approved = queue.approve('esc-1', OPERATOR);

    expect(approved.ok).toBe(false);
    expect(approved.decision?.reasons).toEqual(['halted']);
    expect(pipeline.record('esc-1')?.state).toBe(ActionState.Pending);
  });

  it('ESC-U5: rejection moves the record to REJECTED with the reason', async () => {
    const { queue } = await withEscalations('esc-1');

    const rejected = queue.reject('esc-1', OPERATOR, 'wrong service');

    if (!rejected.ok) throw new Error(rejected.error);
    expect(rejected.record.state).toBe(ActionState.Rejected);
    expect(rejected.record.note).toBe('cli:operator: wrong service');
    expect(queue.list()).toEqual([]);
  });

  it('ESC-U6: a unique prefix selects the escalation; an ambiguous one does not', async () => {
    const { queue } = await withEscalations('deploy-123', 'deploy-456', 'scale-1');
    expect(queue.get('scale')?.action_id).toBe('scale-1');
    expect(queue.get('deploy')).toBeUndefined();
    expect(queue.approve('deploy', OPERATOR).ok).toBe(false);
  });
});
