/**
 * Helmsman Runtime Host — LogReader
 *
 * Pure functions for reading the audit JSONL files with dedupe-on-read,
 * and for filtering the result the way `helmsman log` does.
 *
 * Guarantees:
 *   LOGR-U1: parse all valid JSONL events; drop malformed lines (counted in parseErrors)
 *   LOGR-U2: deduplicate events by event_id — first-seen wins; later occurrences counted in duplicates
 *   LOGR-U3: detect partial trailing line — content not ending with '\n'; last line dropped + flagged
 *   LOGR-U4: detect out-of-order events — > 1 timestamp regressions in file order
 *   LOGR-U5: output events are sorted by (timestamp asc, event_id asc)
 *   LOGR-U6: empty input returns empty result with zero stats
 *
 * No I/O here. Callers obtain raw content via StateIO.readLogRaw().
 *
 * @see docs/governance.md §6 (audit trail)
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * A single parsed audit event.
 *
 * Fields beyond event_id are optional: decisions, attempts and transitions
 * each carry their own set. The index signature exposes the rest.
 */
export interface LogEvent {
  /** ULID — the deduplication key. */
  event_id: string;
  /** ISO 8601 timestamp. Used for ordering and range filters. */
  timestamp?: string;
  /** 'decision' | 'attempt' | 'transition' */
  event_type?: string;
  action_id?: string;
  /** Present on decision events only. */
  verdict?: string;
  [key: string]: unknown;
}

/** Counts reflect the raw file content before deduplication and sorting. */
export interface LogReadStats {
  /** Non-empty lines processed. */
  totalLines: number;
  /** Events included in output (after dedup). */
  parsedEvents: number;
  /** Events dropped because their event_id was already seen. */
  duplicates: number;
  /** Lines dropped due to JSON parse error or missing event_id. */
  parseErrors: number;
  /** True if the content did not end with '\n'; the last line was dropped. */
  partialTrailingLine: boolean;
  /** True if more than one timestamp regression appeared in file order. */
  outOfOrder: boolean;
}

export interface LogReadResult {
  /** Deduplicated, time-sorted events. */
  events: ReadonlyArray<LogEvent>;
  stats: LogReadStats;
}

export interface LogFilter {
  readonly verdict?: string | undefined;
  readonly action_id?: string | undefined;
  /** Inclusive lower bound, ISO 8601. */
  readonly since?: string | undefined;
  /** Exclusive upper bound, ISO 8601. */
  readonly until?: string | undefined;
}

// ---------------------------------------------------------------------------
// readLog
// ---------------------------------------------------------------------------

/**
 * Parse, deduplicate, and sort a JSONL log given its raw text content.
 */
export function readLog(rawContent: string): LogReadResult {
  if (rawContent.length === 0) {
    return {
      events: [],
      stats: {
        totalLines: 0,
        parsedEvents: 0,
        duplicates: 0,
        parseErrors: 0,
        partialTrailingLine: false,
        outOfOrder: false,
      },
    };
  }

  // The element after the last '\n' is either '' or an incomplete line.
  const partialTrailingLine = !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lineList = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter(
    (l) => l.length > 0,
  );

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const orderedEvents: LogEvent[] = [];

  for (const line of lineList) {
    const event = parseEvent(line);
    if (event === null) {
      parseErrors++;
      continue;
    }
    if (seen.has(event.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(event.event_id);
    orderedEvents.push(event);
  }

  // A single regression is tolerated (clock skew).
  let regressions = 0;
  let previous: string | undefined;
  for (const event of orderedEvents) {
    if (previous !== undefined && event.timestamp !== undefined && event.timestamp < previous) {
      regressions++;
    }
    previous = event.timestamp ?? previous;
  }

  const sorted = [...orderedEvents].sort((a, b) => {
    const ta = a.timestamp ?? '';
    const tb = b.timestamp ?? '';
    if (ta !== tb) return ta < tb ? -1 : 1;
    if (a.event_id === b.event_id) return 0;
    return a.event_id < b.event_id ? -1 : 1;
  });

  return {
    events: sorted,
    stats: {
      totalLines: lineList.length,
      parsedEvents: orderedEvents.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
      outOfOrder: regressions > 1,
    },
  };
}

// ---------------------------------------------------------------------------
// filterLogEvents
// ---------------------------------------------------------------------------

/**
 * Apply verdict, action id and time-range filters. Events without a
 * timestamp are excluded as soon as a time bound is given.
 */
export function filterLogEvents(
  events: ReadonlyArray<LogEvent>,
  filter: LogFilter,
): LogEvent[] {
  return events.filter((event) => {
    if (filter.verdict !== undefined && event.verdict !== filter.verdict) return false;
    if (filter.action_id !== undefined && event.action_id !== filter.action_id) return false;
    if (filter.since !== undefined || filter.until !== undefined) {
      if (event.timestamp === undefined) return false;
      const at = Date.parse(event.timestamp);
      if (filter.since !== undefined && at < Date.parse(filter.since)) return false;
      if (filter.until !== undefined && at >= Date.parse(filter.until)) return false;
    }
    return true;
  });
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function parseEvent(line: string): LogEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;
  const fields: Record<string, unknown> = { ...parsed };
  const eventId = fields['event_id'];
  if (typeof eventId !== 'string') return null;

  const event: LogEvent = { ...fields, event_id: eventId };
  for (const key of ['timestamp', 'event_type', 'action_id', 'verdict'] as const) {
    const value = fields[key];
    if (value !== undefined && typeof value !== 'string') delete event[key];
  }
  return event;
}
