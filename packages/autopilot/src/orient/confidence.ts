/**
 * Confidence scoring
 *
 * Deterministic confidence for candidate actions whose source did not set
 * one. A weighted blend of four factors, each in [0, 1]:
 *
 * 1. Detector - how strongly the signal source believes the problem is real
 * 2. Action safety - how benign the action type is when it turns out wrong
 * 3. History - success rate of past executions of the same action type
 * 4. System health - how stable the platform is right now
 *
 * The same inputs always produce the same score.
 */

import type { Action } from '@helmsman/kernel';
import type { ActionTypeStats, PipelineStatus } from '../status.js';

export type SystemHealth = 'healthy' | 'degraded' | 'unhealthy' | 'critical';

export interface ConfidenceWeights {
  readonly detector: number;
  readonly action_safety: number;
  readonly history: number;
  readonly health: number;
}

export const DEFAULT_WEIGHTS: ConfidenceWeights = {
  detector: 0.4,
  action_safety: 0.2,
  history: 0.2,
  health: 0.2,
};

/** Safety score per action type. Unknown types score DEFAULT_ACTION_SAFETY. */
export const ACTION_SAFETY: Readonly<Record<string, number>> = {
  alert: 0.95,
  create_issue: 0.9,
  execute_workflow: 0.85,
  clear_cache: 0.85,
  cleanup_memory: 0.85,
  rollback: 0.75,
  reset_connections: 0.75,
  merge_pr: 0.7,
  restart_service: 0.7,
  scale: 0.65,
  scale_up: 0.65,
  deploy: 0.6,
};

export const DEFAULT_ACTION_SAFETY = 0.5;

/** History factor for an action type that has never executed. */
export const NO_HISTORY_SCORE = 0.6;

const HEALTH_SCORE: Readonly<Record<SystemHealth, number>> = {
  healthy: 1,
  degraded: 0.7,
  unhealthy: 0.4,
  critical: 0.2,
};

export interface ConfidenceInputs {
  readonly detector_score: number;
  readonly action_type: string;
  /** Past success rate for the type, or null with no history. */
  readonly success_rate: number | null;
  readonly health: SystemHealth;
}

export interface ConfidenceBreakdown {
  readonly score: number;
  readonly factors: ConfidenceWeights;
}

export class ConfidenceScorer {
  constructor(private readonly weights: ConfidenceWeights = DEFAULT_WEIGHTS) {}

  score(inputs: ConfidenceInputs): ConfidenceBreakdown {
    const factors: ConfidenceWeights = {
      detector: clampUnit(inputs.detector_score),
      action_safety: ACTION_SAFETY[inputs.action_type] ?? DEFAULT_ACTION_SAFETY,
      history: inputs.success_rate === null ? NO_HISTORY_SCORE : clampUnit(inputs.success_rate),
      health: HEALTH_SCORE[inputs.health],
    };
    const total =
      factors.detector * this.weights.detector +
      factors.action_safety * this.weights.action_safety +
      factors.history * this.weights.history +
      factors.health * this.weights.health;
    return { score: round3(clampUnit(total)), factors };
  }

  /**
   * Score an action from the status snapshot. The detector factor comes from
   * `params.detector_score` (0 when absent).
   */
  scoreAction(action: Action, status: PipelineStatus): ConfidenceBreakdown {
    const detector = action.params?.['detector_score'];
    return this.score({
      detector_score: typeof detector === 'number' ? detector : 0,
      action_type: action.type,
      success_rate: successRateFor(status.action_types, action.type),
      health: healthFromStatus(status),
    });
  }
}

/**
 * halted → critical; failures one short of the cascade threshold →
 * unhealthy; any failure in the window → degraded.
 */
export function healthFromStatus(status: PipelineStatus): SystemHealth {
  if (status.halt.active) return 'critical';
  if (status.failures_in_window > 0 && status.failures_in_window >= status.cascading_threshold - 1) {
    return 'unhealthy';
  }
  return status.failures_in_window > 0 ? 'degraded' : 'healthy';
}

function successRateFor(stats: ReadonlyArray<ActionTypeStats>, type: string): number | null {
  return stats.find((s) => s.type === type)?.success_rate ?? null;
}

function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}
