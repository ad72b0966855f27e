/**
 * Helmsman Kernel — Path Dispatcher
 *
 * Executes an allowed action by trying enabled paths in order until one
 * succeeds:
 *   - success           → stop, return SUCCESS with every prior attempt
 *   - failure / timeout → record the attempt, try the next path
 *   - all exhausted     → EXHAUSTED
 *   - halt observed     → HALTED, remaining paths skipped
 *
 * Attempts for one action are strictly sequential: most backends are not
 * idempotent, and two deployment triggers for the same action must never run
 * at once. Independent actions dispatch concurrently. The halt flag is
 * checked before every attempt; a call already started is not aborted, only
 * no further path is tried.
 *
 * The path table is hot-reloadable. Each dispatch snapshots the table when
 * it starts, so a reload never reorders a dispatch in progress.
 *
 * @see docs/governance.md §4.2 (path dispatcher)
 */

import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import { parsePathTable } from '../configuration/governance.js';
import { AdapterFailure, ConfigurationError, StateTransitionError } from '../errors.js';
import type { AuditSink } from '../logging/audit-sink.js';
import type { OperationalLogger } from '../logging/operational-logger.js';
import { silentLogger } from '../logging/operational-logger.js';
import type { Action } from '../types/action.js';
import type { ExecutionAttempt, ExecutionResult, PathConfig, PathStats } from '../types/execution.js';
import { AttemptOutcome, DispatchOutcome } from '../types/execution.js';
import { ActionState } from '../types/record.js';
import type { ActionExecutor, ExecutorOutcome } from './executor.js';
import { orderPaths } from './path-order.js';

/** Weight of the newest attempt in the observed reliability average. */
const RELIABILITY_SMOOTHING = 0.2;

export interface PathDispatcherOptions {
  readonly paths: ReadonlyArray<PathConfig>;
  readonly executors: ReadonlyArray<ActionExecutor>;
  /** Polled before every attempt. */
  readonly isHalted: () => boolean;
  readonly sink?: AuditSink | undefined;
  readonly logger?: OperationalLogger | undefined;
  readonly clock?: Clock | undefined;
}

export interface DispatchObserver {
  /** Called after each attempt completes, before the next one starts. */
  readonly onAttempt?: ((attempt: ExecutionAttempt) => void) | undefined;
  /** Dispatch even while halted. Used only for rollbacks. */
  readonly ignoreHalt?: boolean | undefined;
}

interface MutablePathStats {
  attempts: number;
  successes: number;
  failures: number;
  timeouts: number;
  observed_reliability: number;
  last_outcome: AttemptOutcome | null;
  last_error: string | null;
  last_attempt_at: string | null;
}

type AttemptSettlement =
  | { readonly kind: 'outcome'; readonly outcome: ExecutorOutcome }
  | { readonly kind: 'timeout' };

export class PathDispatcher {
  private table: ReadonlyArray<PathConfig>;
  private readonly executors = new Map<string, ActionExecutor>();
  private readonly active = new Set<string>();
  private readonly stats = new Map<string, MutablePathStats>();
  private readonly isHalted: () => boolean;
  private readonly sink: AuditSink | undefined;
  private readonly logger: OperationalLogger;
  private readonly clock: Clock;

  constructor(options: PathDispatcherOptions) {
    for (const executor of options.executors) {
      this.executors.set(executor.name, executor);
    }
    this.isHalted = options.isHalted;
    this.sink = options.sink;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
    this.table = this.validate(options.paths);
  }

  // -------------------------------------------------------------------------
  // Configuration
  // -------------------------------------------------------------------------

  /**
   * Replace the path table. Dispatches already running keep the table they
   * started with.
   *
   * @throws ConfigurationError if the table is invalid or an enabled path has no executor
   */
  replacePaths(paths: ReadonlyArray<PathConfig>): void {
    this.table = this.validate(paths);
    this.logger.info({ paths: this.table.map((p) => `${p.name}${p.enabled ? '' : ' (disabled)'}`) }, 'path table replaced');
  }

  /** Register or replace an executor. */
  registerExecutor(executor: ActionExecutor): void {
    this.executors.set(executor.name, executor);
  }

  /** Current table in dispatch order. */
  paths(): ReadonlyArray<PathConfig> {
    return this.table;
  }

  pathStats(): ReadonlyArray<PathStats> {
    return this.table.map((p) => ({ name: p.name, ...this.statsFor(p) }));
  }

  isDispatching(actionId: string): boolean {
    return this.active.has(actionId);
  }

  // -------------------------------------------------------------------------
  // Dispatch
  // -------------------------------------------------------------------------

  /**
   * Execute an allowed action.
   *
   * @throws StateTransitionError if the same action id is already dispatching
   * @throws ConfigurationError if an enabled path has no registered executor
   */
  async execute(action: Action, observer: DispatchObserver = {}): Promise<ExecutionResult> {
    if (this.active.has(action.id)) {
      throw new StateTransitionError(action.id, ActionState.Executing, 'dispatch_started', 'already dispatching');
    }
    const snapshot = this.table.filter((p) => p.enabled);
    this.active.add(action.id);
    const attempts: ExecutionAttempt[] = [];

    try {
      for (const path of snapshot) {
        if (observer.ignoreHalt !== true && this.isHalted()) {
          this.logger.warn(
            { action_id: action.id, skipped: snapshot.length - attempts.length },
            'halt observed; remaining paths skipped',
          );
          return { action_id: action.id, outcome: DispatchOutcome.Halted, path: null, attempts };
        }

        const attempt = await this.attempt(action, path, attempts.length + 1);
        attempts.push(attempt);
        this.sink?.appendAttempt(attempt);
        observer.onAttempt?.(attempt);

        if (attempt.outcome === AttemptOutcome.Success) {
          this.logger.info({ action_id: action.id, path: path.name, attempts: attempts.length }, 'action dispatched');
          return { action_id: action.id, outcome: DispatchOutcome.Success, path: path.name, attempts };
        }
        this.logger.warn(
          { action_id: action.id, path: path.name, outcome: attempt.outcome, err: attempt.error },
          'path attempt failed; trying next path',
        );
      }

      this.logger.error({ action_id: action.id, attempts: attempts.length }, 'all execution paths exhausted');
      return { action_id: action.id, outcome: DispatchOutcome.Exhausted, path: null, attempts };
    } finally {
      this.active.delete(action.id);
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async attempt(action: Action, path: PathConfig, position: number): Promise<ExecutionAttempt> {
    const executor = this.executors.get(path.name);
    if (executor === undefined) {
      throw new ConfigurationError([`paths: no executor registered for path '${path.name}'`]);
    }

    const startedAt = this.clock().toISOString();
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<AttemptSettlement>((resolve) => {
      timer = setTimeout(() => {
        controller.abort(new AdapterFailure(path.name, 'timeout', `timed out after ${path.timeout_ms}ms`));
        resolve({ kind: 'timeout' });
      }, path.timeout_ms);
    });
    const call = Promise.resolve().then(() =>
      executor.execute(action, { timeoutMs: path.timeout_ms, signal: controller.signal }),
    );

    let outcome: AttemptOutcome;
    let error: string | null = null;
    let detail: string | null = null;
    try {
      const settled = await Promise.race([
        call.then((o): AttemptSettlement => ({ kind: 'outcome', outcome: o })),
        timeout,
      ]);
      if (settled.kind === 'timeout') {
        outcome = AttemptOutcome.Timeout;
        error = `timed out after ${path.timeout_ms}ms`;
        this.observeLateSettlement(call, action.id, path.name);
      } else if (settled.outcome.ok) {
        outcome = AttemptOutcome.Success;
        detail = settled.outcome.detail ?? null;
      } else {
        outcome = AttemptOutcome.Failed;
        error = settled.outcome.error;
      }
    } catch (err: unknown) {
      outcome = AttemptOutcome.Failed;
      error = err instanceof Error ? err.message : String(err);
    } finally {
      clearTimeout(timer);
    }

    const finishedAt = this.clock().toISOString();
    this.recordStats(path, outcome, error, finishedAt);
    return {
      action_id: action.id,
      path: path.name,
      attempt: position,
      started_at: startedAt,
      finished_at: finishedAt,
      outcome,
      error,
      detail,
    };
  }

  /**
   * A timed-out call keeps running; its eventual settlement is logged so it
   * does not surface as an unhandled rejection.
   */
  private observeLateSettlement(call: Promise<ExecutorOutcome>, actionId: string, path: string): void {
    void call.then(
      (late) => this.logger.debug({ action_id: actionId, path, ok: late.ok }, 'timed-out call settled late'),
      (err: unknown) =>
        this.logger.debug(
          { action_id: actionId, path, err: err instanceof Error ? err.message : String(err) },
          'timed-out call failed late',
        ),
    );
  }

  private validate(paths: ReadonlyArray<PathConfig>): ReadonlyArray<PathConfig> {
    const ordered = orderPaths(parsePathTable(paths));
    const missing = ordered.filter((p) => p.enabled && !this.executors.has(p.name)).map((p) => p.name);
    if (missing.length > 0) {
      throw new ConfigurationError(missing.map((name) => `paths: no executor registered for path '${name}'`));
    }
    return ordered;
  }

  private statsFor(path: PathConfig): MutablePathStats {
    let s = this.stats.get(path.name);
    if (s === undefined) {
      s = {
        attempts: 0,
        successes: 0,
        failures: 0,
        timeouts: 0,
        observed_reliability: path.reliability_estimate,
        last_outcome: null,
        last_error: null,
        last_attempt_at: null,
      };
      this.stats.set(path.name, s);
    }
    return s;
  }

  private recordStats(path: PathConfig, outcome: AttemptOutcome, error: string | null, at: string): void {
    const s = this.statsFor(path);
    s.attempts++;
    if (outcome === AttemptOutcome.Success) s.successes++;
    if (outcome === AttemptOutcome.Failed) s.failures++;
    if (outcome === AttemptOutcome.Timeout) s.timeouts++;
    const hit = outcome === AttemptOutcome.Success ? 1 : 0;
    s.observed_reliability =
      (1 - RELIABILITY_SMOOTHING) * s.observed_reliability + RELIABILITY_SMOOTHING * hit;
    s.last_outcome = outcome;
    s.last_error = error;
    s.last_attempt_at = at;
  }
}
