/**
 * Helmsman Runtime Host — Operational Logger
 *
 * pino-backed implementation of the kernel's OperationalLogger. Structured
 * JSON lines go to stdout; the audit trail is separate (FileAuditSink).
 *
 * Level precedence: explicit option, HELMSMAN_LOG_LEVEL, 'info'.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CreateLoggerOptions {
  readonly level?: LogLevel | undefined;
  /** Component name, added to every line as `component`. */
  readonly name?: string | undefined;
  /** Destination override; defaults to stdout. Used by tests. */
  readonly destination?: pino.DestinationStream | undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(explicit?: LogLevel): LogLevel {
  if (explicit !== undefined) return explicit;
  const fromEnv = process.env['HELMSMAN_LOG_LEVEL']?.toLowerCase();
  return fromEnv !== undefined && isLogLevel(fromEnv) ? fromEnv : 'info';
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const base = options.name === undefined
    ? { system: 'helmsman' }
    : { system: 'helmsman', component: options.name };
  const config = { level: resolveLogLevel(options.level), base };
  return options.destination === undefined ? pino(config) : pino(config, options.destination);
}
