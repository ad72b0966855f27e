/**
 * Helmsman Kernel — Autonomy Ledger
 *
 * The only shared mutable governance state in the process:
 *   - HaltState (the kill switch)
 *   - admission timestamps in the rolling 60-minute rate window
 *   - blast-radius keys held by in-flight actions
 *
 * All state is private and every operation is a single synchronous method.
 * On the Node.js event loop a synchronous method body cannot interleave with
 * any other callback, so each method is one bounded critical section:
 * tryAdmit is test-and-increment, tripHalt is test-and-set. Callers are
 * served in the order they reach the ledger (FIFO admission).
 *
 * @see docs/governance.md §5 (concurrency)
 */

import type { Clock } from '../clock.js';
import { HOUR_MS, systemClock } from '../clock.js';
import type { HaltState } from '../types/halt.js';
import { INITIAL_HALT_STATE } from '../types/halt.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AdmissionLimits {
  readonly max_actions_per_hour: number;
  readonly max_blast_radius: number;
}

export type AdmissionRefusal = 'halted' | 'rate_limited' | 'blast_radius_exceeded';

export interface AdmissionOutcome {
  readonly admitted: boolean;
  readonly refusal: AdmissionRefusal | null;
  /** Admissions in the window before this call. */
  readonly admissions_in_window: number;
  /** Union of this action's keys with every in-flight action's keys. */
  readonly blast_keys: ReadonlyArray<string>;
  readonly admitted_at: string | null;
  readonly halt: HaltState;
}

export interface Admission {
  readonly action_id: string;
  readonly admitted_at: string;
}

// ---------------------------------------------------------------------------
// AutonomyLedger
// ---------------------------------------------------------------------------

export class AutonomyLedger {
  private halt: HaltState = INITIAL_HALT_STATE;
  private admissions: Array<{ readonly action_id: string; readonly at: number }> = [];
  private readonly inFlight = new Map<string, ReadonlySet<string>>();

  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Atomically check halt, rate budget and blast radius, and on success
   * reserve one unit of rate budget and register the action's keys as
   * in flight. Nothing is reserved on refusal.
   */
  tryAdmit(actionId: string, keys: ReadonlySet<string>, limits: AdmissionLimits): AdmissionOutcome {
    const now = this.clock();
    this.prune(now.getTime());

    const union = new Set<string>(keys);
    for (const held of this.inFlight.values()) {
      for (const k of held) union.add(k);
    }
    const base = {
      admissions_in_window: this.admissions.length,
      blast_keys: [...union].sort(),
      halt: this.halt,
    };

    if (this.halt.active) {
      return { ...base, admitted: false, refusal: 'halted', admitted_at: null };
    }
    if (this.admissions.length >= limits.max_actions_per_hour) {
      return { ...base, admitted: false, refusal: 'rate_limited', admitted_at: null };
    }
    if (union.size > limits.max_blast_radius) {
      return { ...base, admitted: false, refusal: 'blast_radius_exceeded', admitted_at: null };
    }

    this.admissions.push({ action_id: actionId, at: now.getTime() });
    this.inFlight.set(actionId, new Set(keys));
    return { ...base, admitted: true, refusal: null, admitted_at: now.toISOString() };
  }

  /** Release an action's in-flight blast-radius keys. Rate budget is not refunded. */
  release(actionId: string): void {
    this.inFlight.delete(actionId);
  }

  /**
   * Test-and-set the halt flag.
   *
   * @returns true if this call tripped the halt; false if it was already active
   */
  tripHalt(reason: string, trippedBy: string): boolean {
    if (this.halt.active) return false;
    this.halt = {
      ...this.halt,
      active: true,
      reason,
      tripped_at: this.clock().toISOString(),
      tripped_by: trippedBy,
    };
    return true;
  }

  /**
   * Clear the halt flag. The only way to resume autonomy after a trip.
   *
   * @returns the state before the reset
   */
  resetHalt(): HaltState {
    const previous = this.halt;
    this.halt = { ...INITIAL_HALT_STATE, last_reset_at: this.clock().toISOString() };
    return previous;
  }

  haltState(): HaltState {
    return this.halt;
  }

  /** Replace the halt state with one written by another process. */
  adoptHalt(halt: HaltState): void {
    this.halt = halt;
  }

  isHalted(): boolean {
    return this.halt.active;
  }

  admissionsInWindow(): number {
    this.prune(this.clock().getTime());
    return this.admissions.length;
  }

  rateBudgetRemaining(maxActionsPerHour: number): number {
    return Math.max(0, maxActionsPerHour - this.admissionsInWindow());
  }

  inFlightActions(): ReadonlyArray<string> {
    return [...this.inFlight.keys()];
  }

  inFlightKeys(): ReadonlySet<string> {
    const keys = new Set<string>();
    for (const held of this.inFlight.values()) {
      for (const k of held) keys.add(k);
    }
    return keys;
  }

  /** Rebuild from persisted state after a restart. Replaces current state. */
  restore(halt: HaltState, admissions: ReadonlyArray<Admission>): void {
    this.halt = halt;
    this.admissions = admissions
      .map((a) => ({ action_id: a.action_id, at: Date.parse(a.admitted_at) }))
      .filter((a) => Number.isFinite(a.at))
      .sort((a, b) => a.at - b.at);
    this.inFlight.clear();
    this.prune(this.clock().getTime());
  }

  /** Strict rolling window: an admission exactly 60 minutes old has left it. */
  private prune(nowMs: number): void {
    const cutoff = nowMs - HOUR_MS;
    this.admissions = this.admissions.filter((a) => a.at > cutoff);
  }
}
