/**
 * Helmsman Autopilot — Status Summary
 *
 * Point-in-time view of the governance core for operators: autonomy state,
 * rate budget, cascade window, in-flight work, pending escalations, path
 * health and per-action-type outcomes.
 */

import { ActionState, describeHalt } from '@helmsman/kernel';
import type { ActionRecord, AutonomyLevel, GovernanceConfig, HaltState, PathStats } from '@helmsman/kernel';

export interface ActionTypeStats {
  readonly type: string;
  /** Records that reached dispatch. */
  readonly executions: number;
  readonly successes: number;
  readonly failures: number;
  /** successes / executions, or null before the first execution. */
  readonly success_rate: number | null;
  /** Mean submitted confidence across every record of the type (missing counts as 0). */
  readonly average_confidence: number;
}

export interface PipelineStatus {
  readonly autonomy: 'active' | 'suspended';
  readonly message: string;
  readonly autonomy_level: AutonomyLevel;
  readonly halt: HaltState;
  readonly admissions_in_window: number;
  readonly max_actions_per_hour: number;
  readonly rate_budget_remaining: number;
  readonly failures_in_window: number;
  readonly cascading_threshold: number;
  readonly in_flight: ReadonlyArray<string>;
  readonly pending_escalations: ReadonlyArray<string>;
  readonly records_by_state: Readonly<Record<ActionState, number>>;
  readonly paths: ReadonlyArray<PathStats>;
  readonly action_types: ReadonlyArray<ActionTypeStats>;
}

export interface StatusInputs {
  readonly config: GovernanceConfig;
  readonly halt: HaltState;
  readonly admissions: number;
  readonly budgetRemaining: number;
  readonly failures: number;
  readonly inFlight: ReadonlyArray<string>;
  readonly records: ReadonlyArray<ActionRecord>;
  readonly paths: ReadonlyArray<PathStats>;
}

export function summarizeStatus(inputs: StatusInputs): PipelineStatus {
  const byState: Record<ActionState, number> = {
    [ActionState.Pending]: 0,
    [ActionState.Executing]: 0,
    [ActionState.Succeeded]: 0,
    [ActionState.Failed]: 0,
    [ActionState.RollingBack]: 0,
    [ActionState.RolledBack]: 0,
    [ActionState.Rejected]: 0,
  };
  for (const record of inputs.records) byState[record.state]++;

  return {
    autonomy: inputs.halt.active ? 'suspended' : 'active',
    message: describeHalt(inputs.halt),
    autonomy_level: inputs.config.autonomy_level,
    halt: inputs.halt,
    admissions_in_window: inputs.admissions,
    max_actions_per_hour: inputs.config.max_actions_per_hour,
    rate_budget_remaining: inputs.budgetRemaining,
    failures_in_window: inputs.failures,
    cascading_threshold: inputs.config.cascading_threshold,
    in_flight: [...inputs.inFlight].sort(),
    pending_escalations: inputs.records
      .filter((r) => r.escalated && r.state === ActionState.Pending)
      .map((r) => r.action_id),
    records_by_state: byState,
    paths: inputs.paths,
    action_types: actionTypeStats(inputs.records),
  };
}

/** Outcome statistics per action type, sorted by type. */
export function actionTypeStats(records: ReadonlyArray<ActionRecord>): ActionTypeStats[] {
  const groups = new Map<string, ActionRecord[]>();
  for (const record of records) {
    const group = groups.get(record.action.type) ?? [];
    group.push(record);
    groups.set(record.action.type, group);
  }

  return [...groups.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([type, group]) => {
      const executed = group.filter((r) => r.result !== null);
      const successes = executed.filter((r) => r.state === ActionState.Succeeded).length;
      const failures = executed.filter(
        (r) => r.state === ActionState.Failed || r.state === ActionState.RolledBack,
      ).length;
      const confidenceSum = group.reduce((sum, r) => sum + (r.action.confidence ?? 0), 0);
      return {
        type,
        executions: executed.length,
        successes,
        failures,
        success_rate: executed.length === 0 ? null : successes / executed.length,
        average_confidence: confidenceSum / group.length,
      };
    });
}
