/**
 * Helmsman Kernel — Cascading Failure Monitor
 *
 * Counts FAILED and ROLLED_BACK outcomes in a rolling 60-minute window.
 * When the count reaches `cascading_threshold` it trips the halt with reason
 * `cascading_failure`.
 *
 * Easy to trip, hard to release: the halt does not expire when the counted
 * failures age out of the window. Only an explicit reset clears it, and the
 * reset acknowledges every failure counted so far.
 *
 * Each action id is counted once, so a FAILED record that later rolls back
 * is not counted twice.
 *
 * Outcomes forced by an operator override (including records marked FAILED
 * on restart) are not counted. The same rule applies live and on restore,
 * so a restart never changes the window.
 *
 * @see docs/governance.md §4.4 (cascading failure monitor)
 */

import type { Clock } from '../clock.js';
import { HOUR_MS, systemClock } from '../clock.js';
import type { AutonomyLedger } from '../governance/autonomy-ledger.js';
import type { OperationalLogger } from '../logging/operational-logger.js';
import { silentLogger } from '../logging/operational-logger.js';
import type { ActionRecord, StateChange } from '../types/record.js';
import { ActionState } from '../types/record.js';

export const CASCADING_FAILURE_REASON = 'cascading_failure';

const COUNTED_STATES: ReadonlySet<ActionState> = new Set([ActionState.Failed, ActionState.RolledBack]);

export class CascadingFailureMonitor {
  /** action_id → time the failure was counted (ms). */
  private readonly failures = new Map<string, number>();

  constructor(
    private readonly ledger: AutonomyLedger,
    private threshold: number,
    private readonly logger: OperationalLogger = silentLogger,
    private readonly clock: Clock = systemClock,
  ) {}

  setThreshold(threshold: number): void {
    this.threshold = threshold;
  }

  /**
   * Observe a record that reached an outcome. Records in any other state are
   * ignored.
   *
   * @returns true if this observation tripped the halt
   */
  observe(record: ActionRecord): boolean {
    if (!COUNTED_STATES.has(record.state)) return false;
    if (this.failures.has(record.action_id)) return false;
    if (countedFailure(record) === undefined) {
      this.logger.debug({ action_id: record.action_id, state: record.state }, 'override outcome not counted');
      return false;
    }

    const now = this.clock().getTime();
    this.failures.set(record.action_id, now);
    this.prune(now);

    const count = this.failures.size;
    this.logger.info(
      { action_id: record.action_id, state: record.state, failures_in_window: count, threshold: this.threshold },
      'failure counted',
    );
    if (count < this.threshold) return false;

    const tripped = this.ledger.tripHalt(CASCADING_FAILURE_REASON, 'cascade-monitor');
    if (tripped) {
      this.logger.error(
        { failures_in_window: count, threshold: this.threshold, actions: [...this.failures.keys()] },
        'cascading failure detected; autonomy suspended',
      );
    }
    return tripped;
  }

  failuresInWindow(): number {
    this.prune(this.clock().getTime());
    return this.failures.size;
  }

  /** Called on an explicit halt reset: counted failures are acknowledged. */
  acknowledge(): void {
    this.failures.clear();
  }

  /**
   * Rebuild the window from persisted records after a restart. Failures at or
   * before `acknowledgedAt` (the last reset) are not counted. Never trips the
   * halt: a halt that was active before the restart is restored separately.
   */
  restore(records: ReadonlyArray<ActionRecord>, acknowledgedAt: string | null): void {
    this.failures.clear();
    const ackMs = acknowledgedAt !== null ? Date.parse(acknowledgedAt) : Number.NEGATIVE_INFINITY;
    for (const record of records) {
      const at = failureTime(record);
      if (at === null || at <= ackMs) continue;
      this.failures.set(record.action_id, at);
    }
    this.prune(this.clock().getTime());
  }

  private prune(nowMs: number): void {
    const cutoff = nowMs - HOUR_MS;
    for (const [id, at] of this.failures) {
      if (at <= cutoff) this.failures.delete(id);
    }
  }
}

/** The first move into FAILED or ROLLED_BACK not forced by an operator override. */
function countedFailure(record: ActionRecord): StateChange | undefined {
  return record.history.find((h) => COUNTED_STATES.has(h.to) && h.event !== 'operator_override');
}

function failureTime(record: ActionRecord): number | null {
  const change = countedFailure(record);
  if (change === undefined) return null;
  const at = Date.parse(change.at);
  return Number.isFinite(at) ? at : null;
}
