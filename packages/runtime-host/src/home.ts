/**
 * Helmsman Runtime Host — HELMSMAN_HOME Resolution
 *
 * Resolves the helmsman home directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from the --home CLI flag)
 *   2. HELMSMAN_HOME environment variable
 *   3. Default: ~/.helmsman
 *
 * Everything the runtime persists lives under the resolved home:
 *
 *   <HELMSMAN_HOME>/
 *     config.json          optional governance configuration
 *     state/               records.json, halt.json, paths.json
 *     logs/                decisions, attempts, transitions (JSONL)
 *     inbox/               candidates.jsonl
 *
 * @see docs/governance.md §8 (configuration)
 */

import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';

export interface ResolveHelmsmanHomeOptions {
  /** Explicit override — highest precedence. */
  readonly home?: string | undefined;
  /** Create the directory when missing. Default: true. */
  readonly create?: boolean | undefined;
}

export interface HelmsmanPaths {
  readonly home: string;
  readonly config: string;
  readonly state: string;
  readonly logs: string;
  readonly inbox: string;
  /** Anomaly readings appended by an external detector. */
  readonly anomalies: string;
}

export function resolveHelmsmanHome(opts?: ResolveHelmsmanHomeOptions): string {
  let home: string;
  if (typeof opts?.home === 'string' && opts.home !== '') {
    home = opts.home;
  } else if (typeof process.env['HELMSMAN_HOME'] === 'string' && process.env['HELMSMAN_HOME'] !== '') {
    home = process.env['HELMSMAN_HOME'];
  } else {
    home = join(homedir(), '.helmsman');
  }

  if (opts?.create !== false && !existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }
  return home;
}

export function helmsmanPaths(home: string): HelmsmanPaths {
  return {
    home,
    config: join(home, 'config.json'),
    state: join(home, 'state'),
    logs: join(home, 'logs'),
    inbox: join(home, 'inbox', 'candidates.jsonl'),
    anomalies: join(home, 'inbox', 'anomalies.jsonl'),
  };
}
