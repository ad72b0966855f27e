/**
 * Helmsman Kernel — Safety Governor
 *
 * Decides whether a proposed autonomous action may run. Checks run in strict
 * order and the first failure wins:
 *
 *   1. halt active                                  → DENY     halted
 *   2. malformed action                             → DENY     invalid_action
 *   3. confidence < threshold(risk_tier, autonomy)  → ESCALATE low_confidence
 *   4. admissions in trailing 60 min ≥ limit        → DENY     rate_limited
 *   5. |action keys ∪ in-flight keys| > max radius  → DENY     blast_radius_exceeded
 *   6. otherwise                                    → ALLOW    all_checks_passed
 *
 * Checks 1, 4 and 5 are re-evaluated inside AutonomyLedger.tryAdmit, which
 * reserves the rate unit and in-flight keys in the same critical section, so
 * two concurrent evaluations can never both spend the last unit of budget.
 *
 * Every decision is recorded through the DecisionLogger regardless of
 * verdict, in a finally block.
 *
 * @see docs/governance.md §4.1 (safety governor)
 */

import { createHash } from 'node:crypto';
import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import type { GovernanceConfig } from '../configuration/governance.js';
import { confidenceGate } from '../configuration/governance.js';
import type { DecisionLogger } from '../logging/decision-log.js';
import type { Action } from '../types/action.js';
import type { Decision, DecisionReason, PolicyCheck } from '../types/decision.js';
import { Verdict } from '../types/decision.js';
import { describeHalt } from '../types/halt.js';
import { actionIssues } from './action-schema.js';
import type { AutonomyLedger } from './autonomy-ledger.js';
import type { BlastRadiusMeasure } from './blast-radius.js';
import { blastRadiusMeasure } from './blast-radius.js';

export interface SafetyGovernorOptions {
  readonly config: GovernanceConfig;
  readonly ledger: AutonomyLedger;
  readonly logger: DecisionLogger;
  /** Overrides the measure derived from `config.blast_radius_scope`. */
  readonly measure?: BlastRadiusMeasure | undefined;
  readonly clock?: Clock | undefined;
}

export class SafetyGovernor {
  private config: GovernanceConfig;
  private readonly ledger: AutonomyLedger;
  private readonly logger: DecisionLogger;
  private readonly customMeasure: BlastRadiusMeasure | undefined;
  private measure: BlastRadiusMeasure;
  private readonly clock: Clock;

  constructor(options: SafetyGovernorOptions) {
    this.config = options.config;
    this.ledger = options.ledger;
    this.logger = options.logger;
    this.customMeasure = options.measure;
    this.measure = options.measure ?? blastRadiusMeasure(options.config.blast_radius_scope);
    this.clock = options.clock ?? systemClock;
  }

  /** Swap thresholds at runtime. Takes effect from the next evaluation. */
  reconfigure(config: GovernanceConfig): void {
    this.config = config;
    this.measure = this.customMeasure ?? blastRadiusMeasure(config.blast_radius_scope);
  }

  /** Evaluate a newly proposed action. */
  evaluate(action: Action): Decision {
    return this.decide(action, null);
  }

  /**
   * Evaluate an escalated action the operator has approved. The confidence
   * check is skipped; halt, structure, rate and blast radius still apply.
   */
  evaluateApproved(action: Action, approver: string): Decision {
    return this.decide(action, approver);
  }

  /**
   * Record an out-of-band denial (e.g. `duplicate_action`) decided by the
   * submission layer. The decision is logged like any other.
   */
  deny(action: Action, reason: DecisionReason, detail: string): Decision {
    const decision = this.buildDecision(action, Verdict.Deny, [reason], [
      { check: 'uniqueness', passed: false, detail },
    ], null);
    this.logger.record(decision);
    return decision;
  }

  private decide(action: Action, approver: string | null): Decision {
    const checks: PolicyCheck[] = [];
    let decision: Decision | undefined;
    try {
      decision = this.runChecks(action, approver, checks);
      return decision;
    } finally {
      // INVARIANT: every evaluation is logged, including one that throws.
      this.logger.record(
        decision ??
          this.buildDecision(action, Verdict.Deny, ['invalid_action'], [
            ...checks,
            { check: 'structure', passed: false, detail: 'evaluation aborted by an internal error' },
          ], approver),
      );
    }
  }

  private runChecks(action: Action, approver: string | null, checks: PolicyCheck[]): Decision {
    // 1. Halt
    const halt = this.ledger.haltState();
    if (halt.active) {
      checks.push({ check: 'halt', passed: false, detail: describeHalt(halt) });
      return this.buildDecision(action, Verdict.Deny, ['halted'], checks, approver);
    }
    checks.push({ check: 'halt', passed: true, detail: 'autonomy active' });

    // 2. Structure
    const issues = actionIssues(action);
    const keys = this.measure(action.targets);
    if (keys === null) issues.push('targets: no countable target');
    if (issues.length > 0 || keys === null) {
      checks.push({ check: 'structure', passed: false, detail: issues.join('; ') });
      return this.buildDecision(action, Verdict.Deny, ['invalid_action'], checks, approver);
    }
    checks.push({ check: 'structure', passed: true, detail: 'well-formed' });

    // 3. Confidence
    if (approver === null) {
      const gate = confidenceGate(this.config, action.risk_tier);
      const confidence = action.confidence ?? 0;
      if (gate.kind === 'bypass') {
        checks.push({ check: 'confidence', passed: true, detail: gate.detail });
      } else if (gate.kind === 'escalate') {
        checks.push({ check: 'confidence', passed: false, detail: gate.detail });
        return this.buildDecision(action, Verdict.Escalate, ['low_confidence'], checks, approver);
      } else if (confidence < gate.threshold) {
        checks.push({
          check: 'confidence',
          passed: false,
          detail: `confidence ${confidence.toFixed(2)} < threshold ${gate.threshold.toFixed(2)} (${action.risk_tier})`,
        });
        return this.buildDecision(action, Verdict.Escalate, ['low_confidence'], checks, approver);
      } else {
        checks.push({
          check: 'confidence',
          passed: true,
          detail: `confidence ${confidence.toFixed(2)} >= threshold ${gate.threshold.toFixed(2)} (${action.risk_tier})`,
        });
      }
    } else {
      checks.push({ check: 'confidence', passed: true, detail: `approved by ${approver}` });
    }

    // 4 + 5. Rate and blast radius, re-checked and reserved atomically.
    const limits = {
      max_actions_per_hour: this.config.max_actions_per_hour,
      max_blast_radius: this.config.max_blast_radius,
    };
    const admission = this.ledger.tryAdmit(action.id, keys, limits);

    if (admission.refusal === 'halted') {
      checks.push({ check: 'halt', passed: false, detail: describeHalt(admission.halt) });
      return this.buildDecision(action, Verdict.Deny, ['halted'], checks, approver);
    }

    const rateDetail = `${admission.admissions_in_window}/${limits.max_actions_per_hour} admissions in the last 60 minutes`;
    if (admission.refusal === 'rate_limited') {
      checks.push({ check: 'rate_limit', passed: false, detail: rateDetail });
      return this.buildDecision(action, Verdict.Deny, ['rate_limited'], checks, approver);
    }
    checks.push({ check: 'rate_limit', passed: true, detail: rateDetail });

    const blastDetail =
      `${admission.blast_keys.length}/${limits.max_blast_radius} distinct targets in flight` +
      (admission.blast_keys.length > 0 ? ` [${admission.blast_keys.join(', ')}]` : '');
    if (admission.refusal === 'blast_radius_exceeded') {
      checks.push({ check: 'blast_radius', passed: false, detail: blastDetail });
      return this.buildDecision(action, Verdict.Deny, ['blast_radius_exceeded'], checks, approver);
    }
    checks.push({ check: 'blast_radius', passed: true, detail: blastDetail });

    // 6. Allow
    return this.buildDecision(
      action,
      Verdict.Allow,
      [approver === null ? 'all_checks_passed' : 'operator_approved'],
      checks,
      approver,
      admission.admitted_at,
    );
  }

  private buildDecision(
    action: Action,
    verdict: Verdict,
    reasons: ReadonlyArray<DecisionReason>,
    checks: ReadonlyArray<PolicyCheck>,
    approver: string | null,
    decidedAt?: string | null,
  ): Decision {
    return {
      action_id: typeof action.id === 'string' ? action.id : String(action.id),
      action_type: typeof action.type === 'string' ? action.type : String(action.type),
      verdict,
      reasons,
      checks: [...checks],
      input_hash: computeInputHash(action),
      decided_at: decidedAt ?? this.clock().toISOString(),
      approved_by: approver,
    };
  }
}

// ---------------------------------------------------------------------------
// Input hashing
// ---------------------------------------------------------------------------

/**
 * SHA-256 of the action's canonical JSON (sorted keys at every level), so
 * two actions with the same content hash identically regardless of property
 * insertion order.
 */
export function computeInputHash(action: Action): string {
  return createHash('sha256').update(canonicalJson(action)).digest('hex');
}

function canonicalJson(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalJson).join(',') + ']';
  }
  if (typeof value !== 'object') return 'null';
  const pairs = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
  return '{' + pairs.join(',') + '}';
}
