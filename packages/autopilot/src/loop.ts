/**
 * Helmsman Autopilot — Observe-Decide-Act Loop
 *
 * Each tick:
 *   1. Observe  poll every SignalSource concurrently; a failing source is
 *               logged and skipped for this tick
 *   2. Orient   drop duplicate candidate ids, score confidence where the
 *               source left it unset
 *   3. Act      submit every candidate through the ActionPipeline
 *               concurrently and wait for all of them to settle
 *
 * run() ticks on a fixed interval until its AbortSignal fires. Cancellation
 * stops scheduling at once; a tick already running finishes (including its
 * dispatches) before run() returns. trigger() cuts the current wait short.
 *
 * @see docs/governance.md §4.5 (observe-decide-act loop)
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { Verdict, silentLogger, systemClock } from '@helmsman/kernel';
import type { Action, Clock, OperationalLogger } from '@helmsman/kernel';
import { ConfidenceScorer } from './orient/confidence.js';
import type { ActionPipeline, SubmissionResult } from './pipeline.js';
import type { SignalSource } from './signals/signal-source.js';

export interface TickReport {
  readonly tick: number;
  readonly started_at: string;
  readonly finished_at: string;
  readonly candidates: number;
  readonly duplicates_dropped: number;
  readonly source_errors: ReadonlyArray<{ readonly source: string; readonly error: string }>;
  readonly allowed: number;
  readonly escalated: number;
  readonly denied: number;
  /** Submissions that threw instead of settling with a result. */
  readonly errors: number;
  readonly results: ReadonlyArray<SubmissionResult>;
}

export interface ObserveDecideActLoopOptions {
  readonly pipeline: ActionPipeline;
  readonly sources: ReadonlyArray<SignalSource>;
  readonly intervalMs: number;
  readonly scorer?: ConfidenceScorer | undefined;
  readonly logger?: OperationalLogger | undefined;
  readonly clock?: Clock | undefined;
}

export class ObserveDecideActLoop {
  private readonly pipeline: ActionPipeline;
  private readonly sources: ReadonlyArray<SignalSource>;
  private readonly intervalMs: number;
  private readonly scorer: ConfidenceScorer;
  private readonly logger: OperationalLogger;
  private readonly clock: Clock;

  private ticks = 0;
  private wake: AbortController | null = null;
  private triggered = false;

  constructor(options: ObserveDecideActLoopOptions) {
    this.pipeline = options.pipeline;
    this.sources = options.sources;
    this.intervalMs = options.intervalMs;
    this.scorer = options.scorer ?? new ConfidenceScorer();
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
  }

  /** Request a tick now instead of at the end of the current interval. */
  trigger(): void {
    this.triggered = true;
    this.wake?.abort();
  }

  async run(token: AbortSignal): Promise<void> {
    this.logger.info({ interval_ms: this.intervalMs, sources: this.sources.map((s) => s.name) }, 'loop started');
    while (!token.aborted) {
      await this.tick(token);
      if (token.aborted) break;
      await this.waitForNextTick(token);
    }
    this.logger.info({ ticks: this.ticks }, 'loop stopped');
  }

  async tick(signal: AbortSignal = new AbortController().signal): Promise<TickReport> {
    const tick = ++this.ticks;
    const startedAt = this.clock().toISOString();
    this.pipeline.syncHalt();
    this.pipeline.evictExpired();

    // Observe
    const sourceErrors: Array<{ source: string; error: string }> = [];
    const observed = await Promise.allSettled(this.sources.map((s) => s.getCandidateActions(signal)));
    const raw: Action[] = [];
    observed.forEach((outcome, i) => {
      const source = this.sources[i]?.name ?? `source-${i}`;
      if (outcome.status === 'fulfilled') {
        raw.push(...outcome.value);
        return;
      }
      const error = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
      sourceErrors.push({ source, error });
      this.logger.error({ source, err: error }, 'signal source failed; skipped this tick');
    });

    // Orient
    const candidates = this.orient(raw);

    // Act
    const settled = await Promise.allSettled(candidates.map((action) => this.pipeline.submit(action)));
    const results: SubmissionResult[] = [];
    let errors = 0;
    settled.forEach((outcome, i) => {
      if (outcome.status === 'fulfilled') {
        results.push(outcome.value);
        return;
      }
      errors++;
      this.logger.error(
        {
          action_id: candidates[i]?.id,
          err: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
        },
        'submission failed',
      );
    });

    const report: TickReport = {
      tick,
      started_at: startedAt,
      finished_at: this.clock().toISOString(),
      candidates: candidates.length,
      duplicates_dropped: raw.length - candidates.length,
      source_errors: sourceErrors,
      allowed: results.filter((r) => r.decision.verdict === Verdict.Allow).length,
      escalated: results.filter((r) => r.decision.verdict === Verdict.Escalate).length,
      denied: results.filter((r) => r.decision.verdict === Verdict.Deny).length,
      errors,
      results,
    };
    this.logger.info(
      {
        tick,
        candidates: report.candidates,
        allowed: report.allowed,
        escalated: report.escalated,
        denied: report.denied,
        errors,
      },
      'tick complete',
    );
    return report;
  }

  private orient(raw: ReadonlyArray<Action>): Action[] {
    const seen = new Set<string>();
    const status = this.pipeline.status();
    const candidates: Action[] = [];
    for (const action of raw) {
      if (seen.has(action.id)) {
        this.logger.debug({ action_id: action.id }, 'duplicate candidate dropped');
        continue;
      }
      seen.add(action.id);
      if (action.confidence === undefined) {
        const { score, factors } = this.scorer.scoreAction(action, status);
        this.logger.debug({ action_id: action.id, confidence: score, factors }, 'confidence scored');
        candidates.push({ ...action, confidence: score });
      } else {
        candidates.push(action);
      }
    }
    return candidates;
  }

  private async waitForNextTick(token: AbortSignal): Promise<void> {
    if (this.triggered) {
      this.triggered = false;
      return;
    }
    const wake = new AbortController();
    const onAbort = (): void => wake.abort();
    token.addEventListener('abort', onAbort, { once: true });
    this.wake = wake;
    try {
      await sleep(this.intervalMs, undefined, { signal: wake.signal });
    } catch (err: unknown) {
      if (!(err instanceof Error && err.name === 'AbortError')) throw err;
    } finally {
      token.removeEventListener('abort', onAbort);
      this.wake = null;
      this.triggered = false;
    }
  }
}
