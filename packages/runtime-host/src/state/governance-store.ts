/**
 * Helmsman Runtime Host — File Governance Store
 *
 * StateIO-backed implementation of the kernel's GovernanceStore.
 *
 *   state/records.json               live ActionRecords (retention window)
 *   state/halt.json                  current HaltState
 *   logs/records-archive.jsonl       evicted records, one per line
 *
 * Both state files are validated on load. An invalid records file stops
 * startup with a ConfigurationError. An invalid halt file loads as an active
 * halt with reason `halt_state_unreadable`, so autonomy stays suspended until
 * an operator resumes it and a valid file is written.
 *
 * @see docs/governance.md §8 (persistence)
 */

import {
  ConfigurationError,
  parseActionRecords,
  parseHaltState,
  systemClock,
} from '@helmsman/kernel';
import type { ActionRecord, Clock, GovernanceStore, HaltState } from '@helmsman/kernel';
import type { StateIO } from './state-io.js';

export const RECORDS_FILE = 'records.json';
export const HALT_FILE = 'halt.json';
export const RECORDS_ARCHIVE_LOG = 'records-archive.jsonl';
export const HALT_UNREADABLE_REASON = 'halt_state_unreadable';

type Loaded = { readonly ok: true; readonly value: unknown } | { readonly ok: false; readonly issues: string[] };

export class FileGovernanceStore implements GovernanceStore {
  constructor(
    private readonly stateIO: StateIO,
    private readonly clock: Clock = systemClock,
  ) {}

  /** @throws ConfigurationError when records.json is not a valid record list */
  loadRecords(): ReadonlyArray<ActionRecord> {
    const loaded = this.load(RECORDS_FILE);
    if (loaded === null) return [];
    const parsed = loaded.ok ? parseActionRecords(loaded.value) : loaded;
    if (!parsed.ok) {
      throw new ConfigurationError(parsed.issues.map((issue) => `state/${RECORDS_FILE}: ${issue}`));
    }
    return parsed.value;
  }

  saveRecords(records: ReadonlyArray<ActionRecord>): void {
    this.stateIO.writeJson(RECORDS_FILE, records);
  }

  loadHalt(): HaltState | null {
    const loaded = this.load(HALT_FILE);
    if (loaded === null) return null;
    const parsed = loaded.ok ? parseHaltState(loaded.value) : loaded;
    if (parsed.ok) return parsed.value;
    return {
      active: true,
      reason: HALT_UNREADABLE_REASON,
      tripped_at: this.clock().toISOString(),
      tripped_by: 'governance-store',
      last_reset_at: null,
    };
  }

  saveHalt(halt: HaltState): void {
    this.stateIO.writeJson(HALT_FILE, halt);
  }

  archiveRecords(records: ReadonlyArray<ActionRecord>): void {
    for (const record of records) {
      this.stateIO.appendLine(RECORDS_ARCHIVE_LOG, JSON.stringify(record));
    }
  }

  /** null when the file does not exist. */
  private load(filename: string): Loaded | null {
    const raw = this.stateIO.readStateRaw(filename);
    if (raw === null) return null;
    try {
      return { ok: true, value: JSON.parse(raw) };
    } catch (err: unknown) {
      if (err instanceof SyntaxError) return { ok: false, issues: [`not valid JSON (${err.message})`] };
      throw err;
    }
  }
}

/** Keeps nothing. For embedded use where restart recovery is not wanted. */
export class NullGovernanceStore implements GovernanceStore {
  loadRecords(): ReadonlyArray<ActionRecord> {
    return [];
  }
  saveRecords(): void {}
  loadHalt(): HaltState | null {
    return null;
  }
  saveHalt(): void {}
  archiveRecords(): void {}
}
