/**
 * Helmsman Kernel — Decision Logger
 *
 * Records every governor decision. Recording is unconditional: ALLOW, DENY
 * and ESCALATE are all logged, and a missed entry is an integrity failure,
 * not an omission.
 *
 * The sink is optional. Without one (tests, embedded use) decisions are
 * kept only in the bounded in-memory history that backs query().
 *
 * @see docs/governance.md §6 (audit trail)
 */

import type { Decision, Verdict } from '../types/decision.js';
import type { AuditSink } from './audit-sink.js';

export interface DecisionQuery {
  readonly action_id?: string | undefined;
  readonly verdict?: Verdict | undefined;
  /** Inclusive lower bound on decided_at (ISO 8601). */
  readonly since?: string | undefined;
  readonly limit?: number | undefined;
}

const DEFAULT_HISTORY_LIMIT = 1000;

export class DecisionLogger {
  private readonly history: Decision[] = [];

  constructor(
    private readonly sink?: AuditSink,
    private readonly historyLimit: number = DEFAULT_HISTORY_LIMIT,
  ) {}

  record(decision: Decision): void {
    this.sink?.appendDecision(decision);
    this.history.push(decision);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
  }

  /**
   * Query decisions recorded by this process, newest first.
   * The persisted log is read through runtime-host's readLog().
   */
  query(filter: DecisionQuery = {}): ReadonlyArray<Decision> {
    const matches = this.history.filter(
      (d) =>
        (filter.action_id === undefined || d.action_id === filter.action_id) &&
        (filter.verdict === undefined || d.verdict === filter.verdict) &&
        (filter.since === undefined || d.decided_at >= filter.since),
    );
    matches.reverse();
    return filter.limit !== undefined ? matches.slice(0, filter.limit) : matches;
  }
}
