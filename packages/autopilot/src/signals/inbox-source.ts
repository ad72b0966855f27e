/**
 * Helmsman Autopilot — Inbox Signal Source
 *
 * Candidate actions appended by external producers to
 * `<home>/inbox/candidates.jsonl`, one JSON action per line. Each line is
 * consumed once. Lines that do not parse as an action are logged and
 * dropped.
 */

import { silentLogger, systemClock } from '@helmsman/kernel';
import type { Action, Clock, OperationalLogger } from '@helmsman/kernel';
import type { CandidateInbox } from '@helmsman/runtime-host';
import { parseActionJson } from '../action-input.js';
import type { SignalSource } from './signal-source.js';

export class InboxSignalSource implements SignalSource {
  readonly name = 'inbox';

  constructor(
    private readonly inbox: CandidateInbox,
    private readonly logger: OperationalLogger = silentLogger,
    private readonly clock: Clock = systemClock,
  ) {}

  getCandidateActions(): Promise<ReadonlyArray<Action>> {
    const actions: Action[] = [];
    for (const line of this.inbox.drain()) {
      const parsed = parseActionJson(line, this.clock());
      if (parsed.ok) {
        actions.push(parsed.action.source === undefined ? { ...parsed.action, source: this.name } : parsed.action);
      } else {
        this.logger.warn({ issues: parsed.issues, line: line.slice(0, 200) }, 'inbox line dropped');
      }
    }
    return Promise.resolve(actions);
  }
}
