/**
 * Helmsman Runtime Host — LogReader Tests
 *
 *   LOGR-U1: valid events parsed; malformed lines and lines without event_id counted
 *   LOGR-U2: duplicate event_ids dropped, first-seen wins
 *   LOGR-U3: partial trailing line dropped and flagged
 *   LOGR-U4: more than one timestamp regression flags outOfOrder
 *   LOGR-U5: output sorted by timestamp, then event_id
 *   LOGR-U6: empty input yields zero stats
 *   LOGR-F1: verdict and action id filters
 *   LOGR-F2: time range filter, inclusive since and exclusive until
 *
 * Pure: no I/O.
 */

import { describe, it, expect } from 'vitest';
import { filterLogEvents, readLog } from '../src/logging/log-reader.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function makeEvent(id: string, timestamp?: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify(timestamp === undefined ? { event_id: id, ...extra } : { event_id: id, timestamp, ...extra });
}

function jsonl(lines: string[]): string {
  return lines.join('\n') + '\n';
}

const ID1 = '01HX0000000000000000000001';
const ID2 = '01HX0000000000000000000002';
const ID3 = '01HX0000000000000000000003';

// ---------------------------------------------------------------------------
// readLog
// ---------------------------------------------------------------------------

describe('readLog', () => {
  it('LOGR-U1: parses valid events and counts malformed lines', () => {
    const result = readLog(jsonl([makeEvent(ID1), 'not json', JSON.stringify({ no_event_id: true }), '[1,2]']));

    expect(result.events.map((e) => e.event_id)).toEqual([ID1]);
    expect(result.stats.totalLines).toBe(4);
    expect(result.stats.parseErrors).toBe(3);
    expect(result.stats.parsedEvents).toBe(1);
  });

  it('LOGR-U2: keeps the first occurrence of a duplicated event_id', () => {
    const result = readLog(
      jsonl([
        makeEvent(ID1, '2026-01-01T00:00:01.000Z', { value: 'first' }),
        makeEvent(ID1, '2026-01-01T00:00:02.000Z', { value: 'second' }),
        makeEvent(ID1, '2026-01-01T00:00:03.000Z', { value: 'third' }),
      ]),
    );

    expect(result.stats.duplicates).toBe(2);
    expect(result.events).toHaveLength(1);
    expect(result.events[0]?.['value']).toBe('first');
  });

  it('LOGR-U3: drops and flags a partial trailing line', () => {
    const raw = makeEvent(ID1, '2026-01-01T00:00:01.000Z') + '\n' + '{"event_id":"' + ID2 + '","partial":tr';
    const result = readLog(raw);

    expect(result.stats.partialTrailingLine).toBe(true);
    expect(result.stats.parseErrors).toBe(0);
    expect(result.events.map((e) => e.event_id)).toEqual([ID1]);
  });

  it('LOGR-U4: a single regression is tolerated, two are flagged', () => {
    const tolerated = readLog(
      jsonl([
        makeEvent(ID1, '2026-01-01T00:00:03.000Z'),
        makeEvent(ID2, '2026-01-01T00:00:04.000Z'),
        makeEvent(ID3, '2026-01-01T00:00:02.000Z'),
      ]),
    );
    expect(tolerated.stats.outOfOrder).toBe(false);

    const flagged = readLog(
      jsonl([
        makeEvent(ID1, '2026-01-01T00:00:05.000Z'),
        makeEvent(ID2, '2026-01-01T00:00:03.000Z'),
        makeEvent(ID3, '2026-01-01T00:00:01.000Z'),
      ]),
    );
    expect(flagged.stats.outOfOrder).toBe(true);
  });

  it('LOGR-U5: sorts by timestamp with event_id as tiebreaker', () => {
    const result = readLog(
      jsonl([
        makeEvent(ID3, '2026-01-01T00:00:01.000Z'),
        makeEvent(ID2, '2026-01-01T00:00:00.000Z'),
        makeEvent(ID1, '2026-01-01T00:00:01.000Z'),
      ]),
    );
    expect(result.events.map((e) => e.event_id)).toEqual([ID2, ID1, ID3]);
  });

  it('LOGR-U6: empty input yields an empty result', () => {
    expect(readLog('')).toEqual({
      events: [],
      stats: {
        totalLines: 0,
        parsedEvents: 0,
        duplicates: 0,
        parseErrors: 0,
        partialTrailingLine: false,
        outOfOrder: false,
      },
    });
  });
});

// ---------------------------------------------------------------------------
// filterLogEvents
// ---------------------------------------------------------------------------

describe('filterLogEvents', () => {
  const { events } = readLog(
    jsonl([
      makeEvent(ID1, '2026-01-01T00:00:00.000Z', { action_id: 'a', verdict: 'ALLOW' }),
      makeEvent(ID2, '2026-01-01T00:05:00.000Z', { action_id: 'b', verdict: 'DENY' }),
      makeEvent(ID3, '2026-01-01T00:10:00.000Z', { action_id: 'a', verdict: 'DENY' }),
    ]),
  );

  it('LOGR-F1: filters by verdict and action id together', () => {
    expect(filterLogEvents(events, { verdict: 'DENY' }).map((e) => e.event_id)).toEqual([ID2, ID3]);
    expect(filterLogEvents(events, { verdict: 'DENY', action_id: 'a' }).map((e) => e.event_id)).toEqual([ID3]);
  });

  it('LOGR-F2: since is inclusive and until is exclusive', () => {
    const ranged = filterLogEvents(events, {
      since: '2026-01-01T00:05:00.000Z',
      until: '2026-01-01T00:10:00.000Z',
    });
    expect(ranged.map((e) => e.event_id)).toEqual([ID2]);
  });
});
