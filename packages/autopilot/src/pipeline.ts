/**
 * Helmsman Autopilot — Action Pipeline
 *
 * The submission interface. One pipeline per process wires the kernel
 * components together:
 *
 *   uniqueness → SafetyGovernor → ActionRecord → PathDispatcher
 *     → ActionStateMachine → RollbackPolicy → CascadingFailureMonitor
 *     → AutonomyLedger release → GovernanceStore
 *
 * Verdict handling:
 *   DENY      no record is created; the decision is the whole answer
 *   ESCALATE  a PENDING record is parked for the EscalationQueue; it holds
 *             no rate budget and no blast radius until approved
 *   ALLOW     a record is created and dispatched; the admission is released
 *             when the record settles, whatever the outcome
 *
 * Each record is owned by the task dispatching it until it settles. Every
 * accepted transition is persisted before the next one is applied, so the
 * cascade window and halt survive a restart (see restore()).
 *
 * @see docs/governance.md §4 (components)
 * @see docs/governance.md §5 (concurrency)
 */

import {
  ActionState,
  ActionStateMachine,
  AutonomyLedger,
  CascadingFailureMonitor,
  DecisionLogger,
  DispatchExhausted,
  DispatchOutcome,
  INITIAL_HALT_STATE,
  describeHalt,
  PathDispatcher,
  PolicyViolation,
  SafetyGovernor,
  Verdict,
  createRecord,
  isTerminal,
  silentLogger,
  systemClock,
} from '@helmsman/kernel';
import type {
  Action,
  ActionExecutor,
  ActionRecord,
  AuditSink,
  BlastRadiusMeasure,
  Clock,
  Decision,
  ExecutionAttempt,
  ExecutionResult,
  FireResult,
  GovernanceConfig,
  GovernanceStore,
  HaltState,
  LifecycleEvent,
  OperationalLogger,
  PathConfig,
} from '@helmsman/kernel';
import type { RollbackOutcome, RollbackPolicy } from './rollback-policy.js';
import { NEVER_ROLLBACK } from './rollback-policy.js';
import type { PipelineStatus } from './status.js';
import { summarizeStatus } from './status.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SubmissionResult =
  | { readonly kind: 'denied'; readonly decision: Decision }
  | { readonly kind: 'escalated'; readonly decision: Decision; readonly record: ActionRecord }
  | {
      readonly kind: 'dispatched';
      readonly decision: Decision;
      readonly record: ActionRecord;
      readonly result: ExecutionResult;
    };

/** Returned as soon as the governor has decided; `completion` settles with the dispatch. */
export interface SubmissionHandle {
  readonly decision: Decision;
  /** Record as created at decision time; null for a denial. */
  readonly record: ActionRecord | null;
  readonly completion: Promise<SubmissionResult>;
}

export interface RestoreReport {
  readonly records: number;
  /** EXECUTING or ROLLING_BACK records found on restart and marked FAILED. */
  readonly interrupted: number;
  readonly halted: boolean;
}

export interface ActionPipelineOptions {
  readonly config: GovernanceConfig;
  readonly executors: ReadonlyArray<ActionExecutor>;
  /** Path table override, e.g. from the PathRegistry. Defaults to `config.paths`. */
  readonly paths?: ReadonlyArray<PathConfig> | undefined;
  readonly store?: GovernanceStore | undefined;
  readonly sink?: AuditSink | undefined;
  readonly logger?: OperationalLogger | undefined;
  readonly clock?: Clock | undefined;
  readonly rollbackPolicy?: RollbackPolicy | undefined;
  readonly measure?: BlastRadiusMeasure | undefined;
}

// ---------------------------------------------------------------------------
// ActionPipeline
// ---------------------------------------------------------------------------

export class ActionPipeline {
  readonly ledger: AutonomyLedger;
  readonly decisions: DecisionLogger;
  readonly governor: SafetyGovernor;
  readonly dispatcher: PathDispatcher;
  readonly cascade: CascadingFailureMonitor;

  private config: GovernanceConfig;
  private rollbackPolicy: RollbackPolicy;
  private readonly machine: ActionStateMachine;
  private readonly store: GovernanceStore | undefined;
  private readonly logger: OperationalLogger;
  private readonly clock: Clock;
  private readonly records = new Map<string, ActionRecord>();
  private readonly inflight = new Set<Promise<SubmissionResult>>();

  constructor(options: ActionPipelineOptions) {
    this.config = options.config;
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
    this.rollbackPolicy = options.rollbackPolicy ?? NEVER_ROLLBACK;

    this.ledger = new AutonomyLedger(this.clock);
    this.decisions = new DecisionLogger(options.sink);
    this.governor = new SafetyGovernor({
      config: options.config,
      ledger: this.ledger,
      logger: this.decisions,
      measure: options.measure,
      clock: this.clock,
    });
    this.dispatcher = new PathDispatcher({
      paths: options.paths ?? options.config.paths,
      executors: options.executors,
      isHalted: () => this.ledger.isHalted(),
      sink: options.sink,
      logger: this.logger,
      clock: this.clock,
    });
    this.machine = new ActionStateMachine(options.sink, this.logger, this.clock);
    this.cascade = new CascadingFailureMonitor(
      this.ledger,
      options.config.cascading_threshold,
      this.logger,
      this.clock,
    );
  }

  // -------------------------------------------------------------------------
  // Submission
  // -------------------------------------------------------------------------

  /** Submit and wait for the dispatch (if any) to settle. */
  submit(action: Action): Promise<SubmissionResult> {
    return this.submitAsync(action).completion;
  }

  /**
   * Submit and return as soon as the governor has decided. An ALLOW starts
   * dispatching in the background; `completion` settles when the record does.
   */
  submitAsync(proposed: Action): SubmissionHandle {
    const action = freezeAction(proposed);
    const existing = typeof action.id === 'string' ? this.records.get(action.id) : undefined;
    if (existing !== undefined || this.dispatcher.isDispatching(action.id)) {
      const decision = this.governor.deny(
        action,
        'duplicate_action',
        `action id '${action.id}' already has a record in state ${existing?.state ?? ActionState.Executing}`,
      );
      return settled(decision, null, { kind: 'denied', decision });
    }

    const decision = this.governor.evaluate(action);
    switch (decision.verdict) {
      case Verdict.Deny:
        return settled(decision, null, { kind: 'denied', decision });

      case Verdict.Escalate: {
        const record = this.commit(
          createRecord(action, decision.decided_at, {
            escalated: true,
            admitted_at: null,
            note: `escalated: ${decision.reasons.join(', ')}`,
          }),
        );
        this.logger.info({ action_id: action.id, reasons: decision.reasons }, 'action escalated for approval');
        return settled(decision, record, { kind: 'escalated', decision, record });
      }

      case Verdict.Allow: {
        const record = this.commit(
          createRecord(action, decision.decided_at, { escalated: false, admitted_at: decision.decided_at }),
        );
        return { decision, record, completion: this.track(this.launch(record, decision)) };
      }
    }
  }

  /**
   * Re-evaluate an escalated PENDING record on the operator's approval.
   * ALLOW dispatches it; a denial leaves it PENDING.
   *
   * @returns null when no escalated PENDING record has this id
   */
  approve(actionId: string, approver: string): SubmissionHandle | null {
    const pending = this.records.get(actionId);
    if (pending === undefined || !pending.escalated || pending.state !== ActionState.Pending) return null;

    const decision = this.governor.evaluateApproved(pending.action, approver);
    if (decision.verdict !== Verdict.Allow) {
      this.logger.warn({ action_id: actionId, approver, reasons: decision.reasons }, 'approved action denied');
      return settled(decision, pending, { kind: 'denied', decision });
    }
    const record = this.commit({ ...pending, admitted_at: decision.decided_at });
    this.logger.info({ action_id: actionId, approver }, 'escalated action approved');
    return { decision, record, completion: this.track(this.launch(record, decision)) };
  }

  // -------------------------------------------------------------------------
  // Operator controls
  // -------------------------------------------------------------------------

  /** Manual kill switch. Returns false if already halted. */
  halt(reason: string, actor: string): boolean {
    const tripped = this.ledger.tripHalt(reason, actor);
    if (tripped) {
      this.logger.warn({ reason, actor }, 'autonomy halted by operator');
      this.persist();
    }
    return tripped;
  }

  /**
   * Clear the halt. Failures counted so far are acknowledged and do not
   * count toward the next trip.
   *
   * @returns the halt state that was cleared
   */
  resume(actor: string): HaltState {
    const previous = this.ledger.resetHalt();
    this.cascade.acknowledge();
    this.persist();
    this.logger.info({ actor, previous_reason: previous.reason }, 'autonomy resumed');
    return previous;
  }

  /**
   * Force a record to REJECTED (from PENDING) or FAILED (from PENDING,
   * EXECUTING or ROLLING_BACK). An EXECUTING record keeps dispatching in
   * the background; its outcome is dropped.
   *
   * @returns null for an unknown id; `accepted: false` when the move is not permitted
   */
  override(actionId: string, to: ActionState, actor: string, reason: string): FireResult | null {
    const record = this.records.get(actionId);
    if (record === undefined) return null;
    const result = this.fire(record, { kind: 'operator_override', to, actor, reason });
    if (result.accepted) {
      this.logger.warn({ action_id: actionId, to, actor, reason }, 'operator override applied');
    }
    return result;
  }

  /**
   * Roll back a FAILED record on the operator's request, through the
   * configured rollback policy. A record is rolled back at most once.
   *
   * @returns null for an unknown id; `accepted: false` when the record cannot roll back
   */
  async rollback(actionId: string, actor: string): Promise<FireResult | null> {
    const record = this.records.get(actionId);
    if (record === undefined) return null;
    const started = this.fire(record, { kind: 'rollback_started', actor });
    if (!started.accepted) return started;

    const finished = await this.runRollback(started.record);
    this.cascade.observe(finished);
    this.persist();
    return { record: finished, accepted: true };
  }

  /**
   * Adopt a halt or resume that another process wrote to the store after
   * this one last saved. Runs before every save, so an operator's halt from
   * a separate CLI invocation is never overwritten, and dispatches notice it
   * before their next attempt.
   *
   * @returns true when the local halt state changed
   */
  syncHalt(): boolean {
    if (this.store === undefined) return false;
    const stored = this.store.loadHalt();
    const local = this.ledger.haltState();
    if (stored === null || stored.active === local.active) return false;

    const newer = stored.active
      ? stored.tripped_at !== null && (local.last_reset_at === null || stored.tripped_at > local.last_reset_at)
      : stored.last_reset_at !== null && (local.tripped_at === null || stored.last_reset_at >= local.tripped_at);
    if (!newer) return false;

    this.ledger.adoptHalt(stored);
    if (!stored.active) this.cascade.acknowledge();
    this.logger.warn({ halt: describeHalt(stored) }, 'halt state changed by another process');
    return true;
  }

  setRollbackPolicy(policy: RollbackPolicy): void {
    this.rollbackPolicy = policy;
  }

  /** Swap thresholds at runtime. Paths are replaced through the dispatcher. */
  reconfigure(config: GovernanceConfig): void {
    this.config = config;
    this.governor.reconfigure(config);
    this.cascade.setThreshold(config.cascading_threshold);
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  record(actionId: string): ActionRecord | undefined {
    return this.records.get(actionId);
  }

  listRecords(): ReadonlyArray<ActionRecord> {
    return [...this.records.values()];
  }

  /** Escalated records awaiting a decision, oldest first. */
  pendingEscalations(): ReadonlyArray<ActionRecord> {
    return this.listRecords().filter((r) => r.escalated && r.state === ActionState.Pending);
  }

  status(): PipelineStatus {
    return summarizeStatus({
      config: this.config,
      halt: this.ledger.haltState(),
      admissions: this.ledger.admissionsInWindow(),
      budgetRemaining: this.ledger.rateBudgetRemaining(this.config.max_actions_per_hour),
      failures: this.cascade.failuresInWindow(),
      inFlight: this.ledger.inFlightActions(),
      records: this.listRecords(),
      paths: this.dispatcher.pathStats(),
    });
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /** Wait for every dispatch started so far to settle. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  /**
   * Rebuild state from the store after a restart: records, halt, rate
   * admissions and the cascade window. Records that were mid-dispatch are
   * marked FAILED; their backend calls are gone.
   */
  restore(): RestoreReport {
    if (this.store === undefined) return { records: 0, interrupted: 0, halted: false };

    const halt = this.store.loadHalt() ?? INITIAL_HALT_STATE;
    this.records.clear();
    let interrupted = 0;
    for (const stored of this.store.loadRecords()) {
      let record = stored;
      if (record.state === ActionState.Executing || record.state === ActionState.RollingBack) {
        record = this.machine.fire(record, {
          kind: 'operator_override',
          to: ActionState.Failed,
          actor: 'restore',
          reason: 'interrupted by restart',
        }).record;
        interrupted++;
      }
      this.records.set(record.action_id, record);
    }

    const admissions = this.listRecords().flatMap((r) =>
      r.admitted_at === null ? [] : [{ action_id: r.action_id, admitted_at: r.admitted_at }],
    );
    this.ledger.restore(halt, admissions);
    this.cascade.restore(this.listRecords(), halt.last_reset_at);
    this.evictExpired();
    this.persist();

    const report = { records: this.records.size, interrupted, halted: halt.active };
    this.logger.info({ ...report, failures_in_window: this.cascade.failuresInWindow() }, 'governance state restored');
    return report;
  }

  /**
   * Archive terminal records last updated before the retention period.
   *
   * @returns number of records evicted
   */
  evictExpired(): number {
    const cutoff = this.clock().getTime() - this.config.record_retention_minutes * 60_000;
    const expired = this.listRecords().filter((r) => isTerminal(r) && Date.parse(r.updated_at) < cutoff);
    if (expired.length === 0) return 0;

    for (const record of expired) this.records.delete(record.action_id);
    this.store?.archiveRecords(expired);
    this.persist();
    this.logger.debug({ evicted: expired.length }, 'expired records archived');
    return expired.length;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async launch(admitted: ActionRecord, decision: Decision): Promise<SubmissionResult> {
    const id = admitted.action_id;
    let record = admitted;
    try {
      record = this.fire(record, { kind: 'dispatch_started' }).record;
      const result = await this.dispatcher.execute(record.action, {
        onAttempt: (attempt: ExecutionAttempt) => {
          this.fire(this.current(id, record), { kind: 'attempt_recorded', attempt });
        },
      });

      record = this.current(id, record);
      const initiateRollback =
        result.outcome !== DispatchOutcome.Success &&
        record.state === ActionState.Executing &&
        this.rollbackPolicy.shouldRollback(record, result);
      record = this.fire(record, { kind: 'dispatch_finished', result, initiate_rollback: initiateRollback }).record;
      if (record.state === ActionState.RollingBack) {
        record = await this.runRollback(record);
      }
      this.cascade.observe(record);
      return { kind: 'dispatched', decision, record, result };
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ action_id: id, err: message }, 'dispatch aborted by an internal error');
      this.fire(this.current(id, record), {
        kind: 'operator_override',
        to: ActionState.Failed,
        actor: 'pipeline',
        reason: `dispatch error: ${message}`,
      });
      throw err;
    } finally {
      this.ledger.release(id);
      this.persist();
    }
  }

  private async runRollback(rollingBack: ActionRecord): Promise<ActionRecord> {
    const id = rollingBack.action_id;
    let outcome: RollbackOutcome;
    try {
      outcome = await this.rollbackPolicy.rollback(rollingBack, {
        onAttempt: (attempt: ExecutionAttempt) => {
          this.fire(this.current(id, rollingBack), { kind: 'attempt_recorded', attempt });
        },
      });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ action_id: id, err: message }, 'rollback raised an error');
      outcome = { succeeded: false, detail: `rollback error: ${message}` };
    }
    return this.fire(this.current(id, rollingBack), { kind: 'rollback_finished', ...outcome }).record;
  }

  /** Apply an event, store the result and persist it when accepted. */
  private fire(record: ActionRecord, event: LifecycleEvent): FireResult {
    const result = this.machine.fire(record, event);
    if (result.accepted) this.commit(result.record);
    return result;
  }

  private commit(record: ActionRecord): ActionRecord {
    this.records.set(record.action_id, record);
    this.persist();
    return record;
  }

  private current(actionId: string, fallback: ActionRecord): ActionRecord {
    return this.records.get(actionId) ?? fallback;
  }

  private persist(): void {
    if (this.store === undefined) return;
    this.syncHalt();
    this.store.saveRecords(this.listRecords());
    this.store.saveHalt(this.ledger.haltState());
  }

  private track(completion: Promise<SubmissionResult>): Promise<SubmissionResult> {
    this.inflight.add(completion);
    const forget = (): void => {
      this.inflight.delete(completion);
    };
    void completion.then(forget, forget);
    return completion;
  }
}

// ---------------------------------------------------------------------------
// unwrapSubmission
// ---------------------------------------------------------------------------

/**
 * Convert a submission into the error taxonomy for callers that want
 * exceptions: DENY and ESCALATE become PolicyViolation, an exhausted or
 * halted dispatch becomes DispatchExhausted.
 *
 * @throws PolicyViolation
 * @throws DispatchExhausted
 */
export function unwrapSubmission(
  submission: SubmissionResult,
): Extract<SubmissionResult, { kind: 'dispatched' }> {
  if (submission.kind !== 'dispatched') throw new PolicyViolation(submission.decision);
  if (submission.result.outcome !== DispatchOutcome.Success) throw new DispatchExhausted(submission.result);
  return submission;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function settled(decision: Decision, record: ActionRecord | null, result: SubmissionResult): SubmissionHandle {
  return { decision, record, completion: Promise.resolve(result) };
}

/** Actions are immutable once submitted: a frozen deep copy, the caller's object untouched. */
function freezeAction(action: Action): Action {
  return deepFreeze(structuredClone(action));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) deepFreeze(nested);
    Object.freeze(value);
  }
  return value;
}
