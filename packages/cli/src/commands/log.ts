/**
 * helmsman log — Query the audit trail
 *
 * Reads decisions.jsonl, attempts.jsonl and transitions.jsonl, drops
 * duplicate and malformed lines, and prints the events in time order.
 *
 * @see docs/governance.md §6 (audit trail)
 */

import { Command } from 'commander';
import { ATTEMPTS_LOG, DECISIONS_LOG, TRANSITIONS_LOG, filterLogEvents, readLog } from '@helmsman/runtime-host';
import type { LogEvent, LogReadStats, StateIO } from '@helmsman/runtime-host';
import { renderLogEvent } from '../output/format.js';
import { t } from '../output/theme.js';
import { fail, parseNumberOption, print, printJson, runtimeFor } from './shared.js';

const SOURCES: Readonly<Record<string, ReadonlyArray<string>>> = {
  decisions: [DECISIONS_LOG],
  attempts: [ATTEMPTS_LOG],
  transitions: [TRANSITIONS_LOG],
  all: [DECISIONS_LOG, ATTEMPTS_LOG, TRANSITIONS_LOG],
};

export interface LogQuery {
  readonly kind: string;
  readonly verdict?: string | undefined;
  readonly action_id?: string | undefined;
  readonly since?: string | undefined;
  readonly until?: string | undefined;
  readonly limit: number;
}

export interface LogQueryResult {
  readonly events: ReadonlyArray<LogEvent>;
  readonly skipped: number;
}

/** Read, merge and filter the audit logs; keeps the newest `limit` events. */
export function queryLogs(stateIO: StateIO, query: LogQuery): LogQueryResult {
  const files = SOURCES[query.kind];
  if (files === undefined) {
    throw new Error(`Unknown log '${query.kind}'. Valid: ${Object.keys(SOURCES).join(', ')}`);
  }
  const events: LogEvent[] = [];
  let skipped = 0;
  for (const file of files) {
    const { events: parsed, stats } = readLog(stateIO.readLogRaw(file));
    events.push(...parsed);
    skipped += droppedLines(stats);
  }
  events.sort((a, b) => {
    const x = a.timestamp ?? '';
    const y = b.timestamp ?? '';
    return x < y ? -1 : x > y ? 1 : 0;
  });
  const filtered = filterLogEvents(events, {
    verdict: query.verdict?.toUpperCase(),
    action_id: query.action_id,
    since: query.since,
    until: query.until,
  });
  return { events: filtered.slice(Math.max(0, filtered.length - query.limit)), skipped };
}

function droppedLines(stats: LogReadStats): number {
  return stats.parseErrors + (stats.partialTrailingLine ? 1 : 0);
}

function checkTimestamp(name: string, value: string | undefined): string | undefined {
  if (value !== undefined && Number.isNaN(Date.parse(value))) {
    throw new Error(`${name}: '${value}' is not an ISO 8601 timestamp`);
  }
  return value;
}

export const logCommand = new Command('log')
  .description('Query the audit trail')
  .option('--type <log>', 'decisions, attempts, transitions or all', 'all')
  .option('--verdict <verdict>', 'Filter decisions by verdict (ALLOW|DENY|ESCALATE)')
  .option('--action <id>', 'Filter by action id')
  .option('--since <iso-date>', 'Entries at or after this ISO 8601 timestamp')
  .option('--until <iso-date>', 'Entries before this ISO 8601 timestamp')
  .option('--limit <n>', 'Maximum number of entries (newest kept)', '100')
  .option('--json', 'Output as JSON')
  .action(
    (
      options: {
        type: string;
        verdict?: string;
        action?: string;
        since?: string;
        until?: string;
        limit: string;
        json?: boolean;
      },
      command: Command,
    ) => {
      try {
        const limit = parseNumberOption('--limit', options.limit) ?? 100;
        const { stateIO } = runtimeFor(command);
        const { events, skipped } = queryLogs(stateIO, {
          kind: options.type,
          verdict: options.verdict,
          action_id: options.action,
          since: checkTimestamp('--since', options.since),
          until: checkTimestamp('--until', options.until),
          limit,
        });

        if (options.json === true) {
          printJson(events);
          return;
        }
        if (events.length === 0) {
          print('No matching entries.');
        } else {
          print(events.map(renderLogEvent).join('\n'));
        }
        if (skipped > 0) print(t.amber(`\n${skipped} malformed line(s) skipped`));
      } catch (err: unknown) {
        fail('log', err);
      }
    },
  );
