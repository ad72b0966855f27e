/**
 * Helmsman CLI — File Ticket Sink
 *
 * Manual-path tickets appended to `<home>/logs/tickets.jsonl` when no issue
 * tracker is configured, so a ticket outlives the CLI process that filed it.
 */

import { ulid } from 'ulid';
import { systemClock } from '@helmsman/kernel';
import type { Clock } from '@helmsman/kernel';
import type { Ticket, TicketSink } from '@helmsman/executors';
import type { StateIO } from '@helmsman/runtime-host';

export const TICKETS_LOG = 'tickets.jsonl';

export class FileTicketSink implements TicketSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly clock: Clock = systemClock,
  ) {}

  file(ticket: Ticket): Promise<string> {
    const id = ulid();
    this.stateIO.appendLine(
      TICKETS_LOG,
      JSON.stringify({ event_id: id, timestamp: this.clock().toISOString(), event_type: 'ticket', ...ticket }),
    );
    return Promise.resolve(`${TICKETS_LOG}#${id}`);
  }
}
