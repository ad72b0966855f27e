/**
 * Helmsman Autopilot — ConfidenceScorer Tests
 *
 *   CONF-U1: weighted blend of detector, action safety, history and health
 *   CONF-U2: unknown action types and missing history use the defaults
 *   CONF-U3: health follows halt state and the cascade window
 *   CONF-U4: out-of-range detector scores are clamped
 */

import { describe, it, expect } from 'vitest';
import { INITIAL_HALT_STATE, defaultGovernanceConfig } from '@helmsman/kernel';
import { ConfidenceScorer, healthFromStatus } from '../src/orient/confidence.js';
import { summarizeStatus } from '../src/status.js';
import type { PipelineStatus } from '../src/status.js';
import { T0 } from './fixtures.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function statusWith(failures: number, halted = false): PipelineStatus {
  return summarizeStatus({
    config: defaultGovernanceConfig(),
    halt: halted
      ? { ...INITIAL_HALT_STATE, active: true, reason: 'cascading_failure', tripped_at: T0, tripped_by: 'cascade-monitor' }
      : INITIAL_HALT_STATE,
    admissions: 0,
    budgetRemaining: 20,
    failures,
    inFlight: [],
    records: [],
    paths: [],
  });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ConfidenceScorer', () => {
  const scorer = new ConfidenceScorer();

  it('CONF-U1: blends the four factors with weights 0.4/0.2/0.2/0.2', () => {
    const { score, factors } = scorer.score({
      detector_score: 0.5,
      action_type: 'alert',
      success_rate: 1,
      health: 'degraded',
    });
    // 0.5*0.4 + 0.95*0.2 + 1*0.2 + 0.7*0.2
    expect(score).toBe(0.73);
    expect(factors).toEqual({ detector: 0.5, action_safety: 0.95, history: 1, health: 0.7 });
  });

  it('CONF-U2: unknown type scores 0.5 and no history scores 0.6', () => {
    const { score, factors } = scorer.score({
      detector_score: 1,
      action_type: 'reboot_datacenter',
      success_rate: null,
      health: 'critical',
    });
    // 0.4 + 0.1 + 0.12 + 0.04
    expect(factors.action_safety).toBe(0.5);
    expect(factors.history).toBe(0.6);
    expect(score).toBe(0.66);
  });

  it('CONF-U3: health from halt and cascade window', () => {
    expect(healthFromStatus(statusWith(0))).toBe('healthy');
    expect(healthFromStatus(statusWith(1))).toBe('degraded');
    expect(healthFromStatus(statusWith(2))).toBe('unhealthy');
    expect(healthFromStatus(statusWith(0, true))).toBe('critical');
  });

  it('CONF-U4: clamps detector scores into [0, 1]', () => {
    expect(scorer.score({ detector_score: 7, action_type: 'alert', success_rate: 1, health: 'healthy' }).factors.detector).toBe(1);
    expect(scorer.score({ detector_score: Number.NaN, action_type: 'alert', success_rate: 1, health: 'healthy' }).factors.detector).toBe(0);
  });
});
