/**
 * Helmsman Kernel — SafetyGovernor Tests
 *
 *   GOV-U1: high-confidence action with budget available → ALLOW, full reason chain
 *   GOV-U2: confidence below threshold → ESCALATE low_confidence, no budget reserved
 *   GOV-U3: read-only tier bypasses the confidence check
 *   GOV-U4: missing or null confidence is evaluated as 0
 *   GOV-U5: per-tier threshold overrides apply
 *   GOV-U6: active halt → DENY halted regardless of confidence
 *   GOV-U7: malformed action → DENY invalid_action, never a throw
 *   GOV-U8: blast radius counts in-flight targets; release frees them
 *   GOV-U9: blast radius scope is configurable
 *   GOV-U10: operator approval skips confidence but not rate or halt
 *   GOV-U11: every decision is recorded, whatever the verdict
 *   GOV-U12: input hash ignores key order
 *   GOV-U13: autonomy level manual escalates every action, read-only included
 *   GOV-U14: autonomy level supervised applies the per-tier thresholds
 *   GOV-U15: autonomy level autonomous caps every threshold at 0.5
 *   GOV-U16: autonomy level full_autonomous skips confidence, not the guardrails
 *
 * Property:
 *   GOV-P1: below-threshold confidence never yields ALLOW for any non-read-only tier
 *
 * Pure: synthetic clock, in-memory sink, no I/O.
 */

import { describe, it, expect } from 'vitest';
import {
  AutonomyLedger,
  DecisionLogger,
  RiskTier,
  SafetyGovernor,
  Verdict,
  computeInputHash,
  parseGovernanceConfig,
} from '../src/index.js';
import type {
  Action,
  AuditSink,
  Clock,
  Decision,
  ExecutionAttempt,
  GovernanceConfigInput,
  TransitionEvent,
} from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const T0 = '2026-01-01T00:00:00.000Z';

class RecordingSink implements AuditSink {
  readonly decisions: Decision[] = [];
  readonly attempts: ExecutionAttempt[] = [];
  readonly transitions: TransitionEvent[] = [];
  appendDecision(decision: Decision): void {
    this.decisions.push(decision);
  }
  appendAttempt(attempt: ExecutionAttempt): void {
    this.attempts.push(attempt);
  }
  appendTransition(transition: TransitionEvent): void {
    this.transitions.push(transition);
  }
}

function makeAction(overrides: Partial<Action> = {}): Action {
  return {
    id: 'act-1',
    type: 'restart_service',
    targets: ['svc1'],
    risk_tier: RiskTier.Medium,
    confidence: 0.95,
    proposed_at: T0,
    ...overrides,
  };
}

function setup(input: GovernanceConfigInput = {}) {
  const clock: Clock = () => new Date(T0);
  const sink = new RecordingSink();
  const ledger = new AutonomyLedger(clock);
  const governor = new SafetyGovernor({
    config: parseGovernanceConfig(input),
    ledger,
    logger: new DecisionLogger(sink),
    clock,
  });
  return { governor, ledger, sink };
}

// ---------------------------------------------------------------------------
// Verdicts
// ---------------------------------------------------------------------------

describe('SafetyGovernor.evaluate', () => {
  it('GOV-U1: allows a confident action and records the full reason chain', () => {
    const { governor, ledger } = setup();

    const decision = governor.evaluate(makeAction());

    expect(decision.verdict).toBe(Verdict.Allow);
    expect(decision.reasons).toEqual(['all_checks_passed']);
    expect(decision.checks.map((c) => c.check)).toEqual([
      'halt',
      'structure',
      'confidence',
      'rate_limit',
      'blast_radius',
    ]);
    expect(decision.checks.every((c) => c.passed)).toBe(true);
    expect(decision.decided_at).toBe(T0);
    expect(ledger.admissionsInWindow()).toBe(1);
    expect(ledger.inFlightActions()).toEqual(['act-1']);
  });

  it('GOV-U2: escalates low confidence without reserving budget', () => {
    const { governor, ledger } = setup();

    const decision = governor.evaluate(makeAction({ confidence: 0.5 }));

    expect(decision.verdict).toBe(Verdict.Escalate);
    expect(decision.reasons).toEqual(['low_confidence']);
    expect(decision.checks[2]).toEqual({
      check: 'confidence',
      passed: false,
      detail: 'confidence 0.50 < threshold 0.80 (medium)',
    });
    expect(ledger.admissionsInWindow()).toBe(0);
    expect(ledger.inFlightActions()).toEqual([]);
  });

  it('GOV-U3: read-only actions bypass the confidence check', () => {
    const { governor } = setup();

    const decision = governor.evaluate(makeAction({ risk_tier: RiskTier.ReadOnly, confidence: 0 }));

    expect(decision.verdict).toBe(Verdict.Allow);
    expect(decision.checks[2]?.detail).toBe('bypassed for read-only tier');
  });

  it('GOV-U4: missing and null confidence fail closed', () => {
    const { governor } = setup();

    expect(governor.evaluate(makeAction({ id: 'a', confidence: undefined })).verdict).toBe(Verdict.Escalate);
    expect(governor.evaluate(makeAction({ id: 'b', confidence: null })).verdict).toBe(Verdict.Escalate);
  });

  it('GOV-U5: per-tier thresholds override the default', () => {
    const { governor } = setup({ confidence_thresholds: { critical: 0.95, low: 0.6 } });

    const critical = governor.evaluate(makeAction({ id: 'c', risk_tier: RiskTier.Critical, confidence: 0.9 }));
    const low = governor.evaluate(makeAction({ id: 'l', risk_tier: RiskTier.Low, confidence: 0.65 }));

    expect(critical.verdict).toBe(Verdict.Escalate);
    expect(critical.checks[2]?.detail).toBe('confidence 0.90 < threshold 0.95 (critical)');
    expect(low.verdict).toBe(Verdict.Allow);
  });

  it('GOV-U6: denies every action while halted, even at full confidence', () => {
    const { governor, ledger } = setup();
    ledger.tripHalt('manual', 'operator');

    const decision = governor.evaluate(makeAction({ confidence: 1 }));

    expect(decision.verdict).toBe(Verdict.Deny);
    expect(decision.reasons).toEqual(['halted']);
    expect(decision.checks).toEqual([
      { check: 'halt', passed: false, detail: `autonomy suspended: manual since ${T0}` },
    ]);
    expect(ledger.admissionsInWindow()).toBe(0);
  });

  it('GOV-U6b: halt takes precedence over low confidence', () => {
    const { governor, ledger } = setup();
    ledger.tripHalt('cascading_failure', 'cascade-monitor');

    expect(governor.evaluate(makeAction({ confidence: 0.1 })).reasons).toEqual(['halted']);
  });

  it('GOV-U7: malformed actions are denied as invalid_action', () => {
    const { governor } = setup();
    const wrongShape: Action = JSON.parse(
      JSON.stringify({ ...makeAction({ id: 'bad-shape' }), targets: [{ name: 'svc1' }] }),
    );

    const cases: Action[] = [
      makeAction({ id: 'no-targets', targets: [] }),
      makeAction({ id: 'blank-target', targets: ['  '] }),
      makeAction({ id: 'over-one', confidence: 1.5 }),
      makeAction({ id: 'nan', confidence: Number.NaN }),
      wrongShape,
    ];

    for (const action of cases) {
      const decision = governor.evaluate(action);
      expect(decision.verdict, action.id).toBe(Verdict.Deny);
      expect(decision.reasons, action.id).toEqual(['invalid_action']);
    }
  });

  it('GOV-U8: blast radius spans in-flight actions and is freed on release', () => {
    const { governor, ledger } = setup();

    expect(governor.evaluate(makeAction({ id: 'a', targets: ['svc1', 'svc2'] })).verdict).toBe(Verdict.Allow);
    expect(governor.evaluate(makeAction({ id: 'b', targets: ['svc3'] })).verdict).toBe(Verdict.Allow);

    const denied = governor.evaluate(makeAction({ id: 'c', targets: ['svc4'] }));
    expect(denied.verdict).toBe(Verdict.Deny);
    expect(denied.reasons).toEqual(['blast_radius_exceeded']);
    expect(denied.checks[4]?.detail).toBe(
      '4/3 distinct targets in flight [service:svc1, service:svc2, service:svc3, service:svc4]',
    );

    // A target already in flight does not widen the radius.
    expect(governor.evaluate(makeAction({ id: 'd', targets: ['svc1'] })).verdict).toBe(Verdict.Allow);

    ledger.release('a');
    ledger.release('d');
    expect(governor.evaluate(makeAction({ id: 'e', targets: ['svc4'] })).verdict).toBe(Verdict.Allow);
  });

  it('GOV-U8b: a single action touching too many targets is denied', () => {
    const { governor } = setup();

    const decision = governor.evaluate(makeAction({ targets: ['s1', 's2', 's3', 's4'] }));

    expect(decision.reasons).toEqual(['blast_radius_exceeded']);
  });

  it('GOV-U9: environment scope counts environments, not services', () => {
    const { governor } = setup({ blast_radius_scope: 'environment', max_blast_radius: 1 });

    const sameEnv = governor.evaluate(
      makeAction({
        id: 'same-env',
        targets: [
          { service: 'api', environment: 'prod' },
          { service: 'worker', environment: 'prod' },
        ],
      }),
    );
    const otherEnv = governor.evaluate(
      makeAction({ id: 'other-env', targets: [{ service: 'api', environment: 'staging' }] }),
    );

    expect(sameEnv.verdict).toBe(Verdict.Allow);
    expect(otherEnv.reasons).toEqual(['blast_radius_exceeded']);
  });

  it('GOV-U10: operator approval skips confidence but still respects the halt', () => {
    const { governor, ledger } = setup();

    const approved = governor.evaluateApproved(makeAction({ id: 'p', confidence: 0.2 }), 'cli:operator');
    expect(approved.verdict).toBe(Verdict.Allow);
    expect(approved.reasons).toEqual(['operator_approved']);
    expect(approved.approved_by).toBe('cli:operator');

    ledger.tripHalt('manual', 'operator');
    expect(governor.evaluateApproved(makeAction({ id: 'q', confidence: 0.2 }), 'cli:operator').reasons)
      .toEqual(['halted']);
  });

  it('GOV-U11: records every decision regardless of verdict', () => {
    const { governor, sink } = setup();

    governor.evaluate(makeAction({ id: 'allow' }));
    governor.evaluate(makeAction({ id: 'escalate', confidence: 0.1 }));
    governor.evaluate(makeAction({ id: 'invalid', targets: [] }));
    governor.deny(makeAction({ id: 'allow' }), 'duplicate_action', 'action id already submitted');

    expect(sink.decisions.map((d) => [d.action_id, d.verdict, d.reasons[0]])).toEqual([
      ['allow', Verdict.Allow, 'all_checks_passed'],
      ['escalate', Verdict.Escalate, 'low_confidence'],
      ['invalid', Verdict.Deny, 'invalid_action'],
      ['allow', Verdict.Deny, 'duplicate_action'],
    ]);
  });

  it('GOV-U12: input hash is independent of property order', () => {
    const a = makeAction({ params: { replicas: 3, zone: 'a' } });
    const b: Action = {
      proposed_at: a.proposed_at,
      confidence: a.confidence,
      risk_tier: a.risk_tier,
      targets: a.targets,
      type: a.type,
      id: a.id,
      params: { zone: 'a', replicas: 3 },
    };

    expect(computeInputHash(a)).toBe(computeInputHash(b));
    expect(computeInputHash(a)).toMatch(/^[0-9a-f]{64}$/);
  });
});

// ---------------------------------------------------------------------------
// Autonomy levels
// ---------------------------------------------------------------------------

describe('SafetyGovernor autonomy levels', () => {
  it('GOV-U13: manual escalates even a certain read-only action; approval still admits', () => {
    const { governor, ledger } = setup({ autonomy_level: 'manual' });

    const decision = governor.evaluate(makeAction({ risk_tier: RiskTier.ReadOnly, confidence: 1 }));

    expect(decision.verdict).toBe(Verdict.Escalate);
    expect(decision.reasons).toEqual(['low_confidence']);
    expect(decision.checks[2]).toEqual({
      check: 'confidence',
      passed: false,
      detail: 'autonomy level manual: operator approval required',
    });
    expect(ledger.admissionsInWindow()).toBe(0);
    expect(governor.evaluateApproved(makeAction({ id: 'ok' }), 'cli:operator').verdict).toBe(Verdict.Allow);
  });

  it('GOV-U14: supervised is the default and keeps the tier thresholds', () => {
    const { governor } = setup({ autonomy_level: 'supervised' });

    expect(parseGovernanceConfig({}).autonomy_level).toBe('supervised');
    expect(governor.evaluate(makeAction({ id: 'm', confidence: 0.79 })).verdict).toBe(Verdict.Escalate);
    expect(governor.evaluate(makeAction({ id: 'r', risk_tier: RiskTier.ReadOnly, confidence: 0 })).verdict)
      .toBe(Verdict.Allow);
  });

  it('GOV-U15: autonomous allows from 0.5 and keeps thresholds already below it', () => {
    const { governor } = setup({ autonomy_level: 'autonomous', confidence_thresholds: { low: 0.3 } });

    const atCap = governor.evaluate(makeAction({ id: 'a', confidence: 0.5 }));
    const below = governor.evaluate(makeAction({ id: 'b', confidence: 0.49 }));
    const low = governor.evaluate(makeAction({ id: 'c', risk_tier: RiskTier.Low, confidence: 0.35 }));

    expect(atCap.verdict).toBe(Verdict.Allow);
    expect(atCap.checks[2]?.detail).toBe('confidence 0.50 >= threshold 0.50 (medium)');
    expect(below.verdict).toBe(Verdict.Escalate);
    expect(below.checks[2]?.detail).toBe('confidence 0.49 < threshold 0.50 (medium)');
    expect(low.checks[2]?.detail).toBe('confidence 0.35 >= threshold 0.30 (low)');
  });

  it('GOV-U16: full_autonomous allows without confidence but keeps halt and rate limit', () => {
    const { governor, ledger } = setup({ autonomy_level: 'full_autonomous', max_actions_per_hour: 1 });

    const first = governor.evaluate(makeAction({ id: 'a', risk_tier: RiskTier.Critical, confidence: null }));
    const second = governor.evaluate(makeAction({ id: 'b', confidence: 1 }));
    ledger.tripHalt('maintenance', 'cli:operator');
    const halted = governor.evaluate(makeAction({ id: 'c' }));

    expect(first.verdict).toBe(Verdict.Allow);
    expect(first.checks[2]?.detail).toBe('bypassed at autonomy level full_autonomous');
    expect(second.reasons).toEqual(['rate_limited']);
    expect(halted.reasons).toEqual(['halted']);
  });
});

// ---------------------------------------------------------------------------
// Properties
// ---------------------------------------------------------------------------

describe('GOV-P1: low confidence never yields ALLOW', () => {
  const tiers = [RiskTier.Low, RiskTier.Medium, RiskTier.High, RiskTier.Critical];
  const confidences = [0, 0.01, 0.25, 0.5, 0.79, 0.7999];

  it.each(tiers)('tier %s', (tier) => {
    const { governor } = setup();
    confidences.forEach((confidence, i) => {
      const decision = governor.evaluate(makeAction({ id: `${tier}-${i}`, risk_tier: tier, confidence }));
      expect(decision.verdict).not.toBe(Verdict.Allow);
    });
  });
});
