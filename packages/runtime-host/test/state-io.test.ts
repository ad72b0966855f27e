/**
 * Helmsman Runtime Host — StateIO Contract Tests
 *
 *   SIO-U1: MemoryStateIO returns '' for a log file that has never been written
 *   SIO-U2: MemoryStateIO returns lines joined with '\n' plus a terminal newline
 *   SIO-U3: FileStateIO returns '' for a non-existent log file (ENOENT)
 *   SIO-U4: FileStateIO appendLine writes under <home>/logs
 *   SIO-U5: FileStateIO writeJson replaces the file and leaves no temp file
 *   SIO-U6: FileStateIO readJson returns the fallback for missing or corrupt files
 *   SIO-U7: readStateRaw returns null only for a missing file, corrupt text as is
 *
 * Isolation: MemoryStateIO tests have no I/O. FileStateIO tests use temp dirs.
 */

import { describe, it, expect } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function tempHome(label: string): string {
  return mkdtempSync(join(tmpdir(), `helmsman-sio-${label}-`));
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

describe('MemoryStateIO', () => {
  it('SIO-U1: returns empty string for a log that was never written', () => {
    const stateIO = new MemoryStateIO();
    stateIO.appendLine('other.jsonl', 'some line');
    expect(stateIO.readLogRaw('decisions.jsonl')).toBe('');
  });

  it('SIO-U2: returns lines joined with newlines and a terminal newline', () => {
    const stateIO = new MemoryStateIO();
    stateIO.appendLine('decisions.jsonl', '{"event_id":"A"}');
    stateIO.appendLine('decisions.jsonl', '{"event_id":"B"}');
    expect(stateIO.readLogRaw('decisions.jsonl')).toBe('{"event_id":"A"}\n{"event_id":"B"}\n');
  });

  it('round-trips JSON through serialization', () => {
    const stateIO = new MemoryStateIO();
    stateIO.writeJson('halt.json', { active: true, dropped: undefined });
    expect(stateIO.readJson('halt.json', {})).toEqual({ active: true });
  });
});

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

describe('FileStateIO', () => {
  it('SIO-U3: returns empty string for a non-existent log file', () => {
    const stateIO = new FileStateIO(tempHome('u3'));
    expect(stateIO.readLogRaw('decisions.jsonl')).toBe('');
  });

  it('SIO-U4: appendLine writes to <home>/logs and readLogRaw returns it verbatim', () => {
    const home = tempHome('u4');
    const stateIO = new FileStateIO(home);
    stateIO.appendLine('attempts.jsonl', '{"event_id":"A"}');
    stateIO.appendLine('attempts.jsonl', '{"event_id":"B"}');

    const onDisk = readFileSync(join(home, 'logs', 'attempts.jsonl'), 'utf-8');
    expect(onDisk).toBe('{"event_id":"A"}\n{"event_id":"B"}\n');
    expect(stateIO.readLogRaw('attempts.jsonl')).toBe(onDisk);
  });

  it('SIO-U5: writeJson replaces the file and leaves no temp file behind', () => {
    const home = tempHome('u5');
    const stateIO = new FileStateIO(home);
    stateIO.writeJson('records.json', [{ action_id: 'a' }]);
    stateIO.writeJson('records.json', [{ action_id: 'b' }]);

    expect(stateIO.readJson('records.json', [])).toEqual([{ action_id: 'b' }]);
    expect(existsSync(join(home, 'state', 'records.json.tmp'))).toBe(false);
  });

  it('SIO-U6: readJson returns the fallback for missing and corrupt files', () => {
    const home = tempHome('u6');
    const stateIO = new FileStateIO(home);
    expect(stateIO.readJson('halt.json', null)).toBeNull();

    mkdirSync(join(home, 'state'), { recursive: true });
    writeFileSync(join(home, 'state', 'halt.json'), '{"active": tr', 'utf-8');
    expect(stateIO.readJson('halt.json', 'fallback')).toBe('fallback');
  });

  it('SIO-U7: readStateRaw tells a missing file from a corrupt one', () => {
    const home = tempHome('u7');
    const stateIO = new FileStateIO(home);
    expect(stateIO.readStateRaw('halt.json')).toBeNull();

    mkdirSync(join(home, 'state'), { recursive: true });
    writeFileSync(join(home, 'state', 'halt.json'), '{"active": tr', 'utf-8');
    expect(stateIO.readStateRaw('halt.json')).toBe('{"active": tr');

    const memory = new MemoryStateIO();
    expect(memory.readStateRaw('halt.json')).toBeNull();
    memory.writeStateRaw('halt.json', 'not json');
    expect(memory.readStateRaw('halt.json')).toBe('not json');
  });
});
