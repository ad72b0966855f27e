/**
 * Helmsman Runtime Host — Candidate Inbox
 *
 * A JSONL drop box for externally proposed actions. Producers append one
 * JSON action per line to `<home>/inbox/candidates.jsonl`; the loop drains
 * it each tick. Draining renames the file before reading, so a line is
 * consumed exactly once even while producers keep appending.
 */

import { appendFileSync, mkdirSync, readFileSync, renameSync, rmSync } from 'node:fs';
import { dirname } from 'node:path';
import { isNodeError } from '../state/state-io.js';

export interface CandidateInbox {
  /** Append one line. */
  append(line: string): void;
  /** Remove and return every non-empty line currently in the inbox. */
  drain(): string[];
}

export class FileCandidateInbox implements CandidateInbox {
  private drains = 0;

  constructor(private readonly inboxPath: string) {}

  append(line: string): void {
    mkdirSync(dirname(this.inboxPath), { recursive: true });
    appendFileSync(this.inboxPath, line + '\n', 'utf-8');
  }

  drain(): string[] {
    const claimed = `${this.inboxPath}.${process.pid}.${++this.drains}.draining`;
    try {
      renameSync(this.inboxPath, claimed);
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return [];
      throw err;
    }
    const raw = readFileSync(claimed, 'utf-8');
    rmSync(claimed, { force: true });
    return raw.split('\n').filter((line) => line.trim().length > 0);
  }
}

export class MemoryCandidateInbox implements CandidateInbox {
  private lines: string[] = [];

  append(line: string): void {
    this.lines.push(line);
  }

  drain(): string[] {
    const drained = this.lines.filter((line) => line.trim().length > 0);
    this.lines = [];
    return drained;
  }
}
