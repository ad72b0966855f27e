/**
 * Helmsman Autopilot — Signal Source Interface
 *
 * Monitoring collaborators implement SignalSource; the
 * ObserveDecideActLoop polls every source once per tick.
 */

import type { Action } from '@helmsman/kernel';

export interface SignalSource {
  readonly name: string;
  /**
   * Candidate actions proposed this tick. Confidence may be left unset for
   * the loop to score. The signal aborts when the loop shuts down.
   */
  getCandidateActions(signal: AbortSignal): Promise<ReadonlyArray<Action>>;
}
