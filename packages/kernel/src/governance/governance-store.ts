/**
 * Helmsman Kernel — Governance Store Interface
 *
 * Persistence contract for ActionRecords and HaltState, so the cascade
 * window and the halt survive a restart. The kernel defines the contract;
 * runtime-host provides FileGovernanceStore.
 */

import type { HaltState } from '../types/halt.js';
import type { ActionRecord } from '../types/record.js';

export interface GovernanceStore {
  loadRecords(): ReadonlyArray<ActionRecord>;
  saveRecords(records: ReadonlyArray<ActionRecord>): void;
  loadHalt(): HaltState | null;
  saveHalt(halt: HaltState): void;
  /** Move evicted records to long-term storage (or drop them). */
  archiveRecords(records: ReadonlyArray<ActionRecord>): void;
}
