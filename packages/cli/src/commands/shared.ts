/**
 * Helpers shared by every command: runtime construction from the global
 * options, output, and the error exit.
 */

import type { Command } from 'commander';
import { ConfigurationError } from '@helmsman/kernel';
import { LOG_LEVELS } from '@helmsman/runtime-host';
import type { LogLevel } from '@helmsman/runtime-host';
import { buildRuntime } from '../runtime.js';
import type { Runtime } from '../runtime.js';

/** The CLI acts as a human-class actor. */
export const CLI_ACTOR_KIND = 'cli';

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Build the runtime from the program-level `--home` and `--log-level`. */
export function runtimeFor(command: Command): Runtime {
  const globals = command.optsWithGlobals();
  const home: unknown = globals['home'];
  const logLevel: unknown = globals['logLevel'];
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ConfigurationError([`--log-level: expected one of ${LOG_LEVELS.join(', ')}`]);
  }
  return buildRuntime({
    home: typeof home === 'string' ? home : undefined,
    logLevel,
  });
}

export function print(text: string): void {
  // eslint-disable-next-line no-console
  console.log(text);
}

export function printJson(value: unknown): void {
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(value, null, 2));
}

/** Report an error as `[helmsman <scope>] ...` and exit with status 1. */
export function fail(scope: string, err: unknown): never {
  if (err instanceof ConfigurationError) {
    process.stderr.write(`[helmsman ${scope}] invalid configuration:\n`);
    for (const issue of err.issues) process.stderr.write(`  ${issue}\n`);
  } else {
    process.stderr.write(`[helmsman ${scope}] ${err instanceof Error ? err.message : String(err)}\n`);
  }
  process.exit(1);
}

export function parseNumberOption(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new ConfigurationError([`${name}: '${raw}' is not a number`]);
  return value;
}
