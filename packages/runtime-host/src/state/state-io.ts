/**
 * Helmsman Runtime Host — StateIO Interface
 *
 * An injectable I/O abstraction for reading/writing JSON state files and
 * appending to JSONL log files under one helmsman home directory.
 *
 * Two implementations are provided:
 *   - FileStateIO   — durable file I/O under a home directory
 *   - MemoryStateIO — in-memory I/O for tests and embedded (non-persistent) use
 *
 * Every stateful class (audit sink, governance store, path registry) injects
 * StateIO rather than touching the filesystem, so tests run against
 * MemoryStateIO with identical semantics.
 *
 * @see docs/governance.md §8 (persistence)
 */

import { appendFileSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * Invariants:
 * - readJson and writeJson address the `state/` subdirectory of the home
 * - appendLine and readLogRaw address the `logs/` subdirectory
 * - File names are relative; callers never construct absolute paths
 */
export interface StateIO {
  /**
   * Read a JSON file and parse it.
   *
   * Returns `fallback` if the file does not exist or cannot be parsed.
   * Type parameter T is trusted — callers are responsible for validating
   * persisted JSON they cannot trust.
   *
   * @param filename - Filename within the state subdirectory (e.g. 'records.json')
   */
  readJson<T>(filename: string, fallback: T): T;

  /**
   * Return the raw text of a state file, or null if it does not exist.
   * For callers that must tell a missing file from a corrupt one.
   */
  readStateRaw(filename: string): string | null;

  /**
   * Serialize a value as JSON and replace the file atomically.
   * Creates the state subdirectory if it does not exist.
   */
  writeJson<T>(filename: string, value: T): void;

  /**
   * Append a line to a log file. A newline is appended after the content.
   * Creates the logs subdirectory if it does not exist.
   *
   * @param logfilename - Filename within the logs subdirectory (e.g. 'decisions.jsonl')
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Return the raw text content of a log file, or '' if it does not exist.
   * Used by readLog() for dedupe-on-read.
   */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable file-system StateIO for a helmsman home directory.
 *
 * Reads and writes JSON state at `<home>/state/<filename>`.
 * Appends log lines to          `<home>/logs/<logfilename>`.
 *
 * Writes go to `<filename>.tmp` and are renamed into place, so a crash
 * mid-write leaves the previous state intact. Synchronous I/O: a decision
 * or record is durable before the call returns.
 *
 * ENOENT and SyntaxError are recoverable (return fallback). Other I/O errors
 * are rethrown: the operator must address them.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson<T>(filename: string, fallback: T): T {
    const filePath = join(this.homeDir, 'state', filename);
    try {
      const raw = readFileSync(filePath, 'utf-8');
      return JSON.parse(raw) as T;
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) {
        return fallback;
      }
      throw err;
    }
  }

  readStateRaw(filename: string): string | null {
    try {
      return readFileSync(join(this.homeDir, 'state', filename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return null;
      }
      throw err;
    }
  }

  writeJson<T>(filename: string, value: T): void {
    const subDir = join(this.homeDir, 'state');
    mkdirSync(subDir, { recursive: true });
    const filePath = join(subDir, filename);
    const tmpPath = `${filePath}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(value, null, 2), 'utf-8');
    renameSync(tmpPath, filePath);
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    const logPath = join(this.homeDir, 'logs', logfilename);
    try {
      return readFileSync(logPath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. No file system access.
 *
 * readJson round-trips through JSON serialization to match FileStateIO
 * semantics (undefined values disappear, Dates become strings).
 */
export class MemoryStateIO implements StateIO {
  private readonly store: Map<string, string> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson<T>(filename: string, fallback: T): T {
    const raw = this.store.get(filename);
    if (raw === undefined) {
      return fallback;
    }
    return JSON.parse(raw) as T;
  }

  readStateRaw(filename: string): string | null {
    return this.store.get(filename) ?? null;
  }

  writeJson<T>(filename: string, value: T): void {
    this.store.set(filename, JSON.stringify(value));
  }

  /** Replace a state file with arbitrary text. Test-only, like readLines. */
  writeStateRaw(filename: string, raw: string): void {
    this.store.set(filename, raw);
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /**
   * Return all lines appended to a log file.
   *
   * Specific to MemoryStateIO, not part of the StateIO interface. Use it in
   * tests to verify audit output without touching the file system.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    // Match FileStateIO: each appendLine call adds 'line\n'.
    return lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
